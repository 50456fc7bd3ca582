export interface LessonRecord {
  subject?: string;
  type?: string; // Л, Пр, Лаб...
  teachers?: string[];
  groups?: string[];
  links?: string[];
  subgroup?: string;
}
export interface LessonSlot {
  lesson_number: string;
  time: string;
  lessons_info: LessonRecord[];
}
export interface ScheduleDay {
  day_of_week: string;
  lessons: LessonSlot[];
}
// key is the date exactly as the site renders it, in page order
export type Schedule = Map<string, ScheduleDay>;

export interface UserSettings {
  group_id: string | null;
  group_name: string | null;
  subjects: string[];
}
export type SettingsKey = keyof UserSettings;

export type ErrorReason = "fetch" | "parse" | "not_found";
export interface ResponseError {
  status: "error";
  reason: ErrorReason;
  message: string;
}
export interface ResponseSchedule {
  status: "ok";
  schedule: Schedule;
}
export interface ResponseSubjects {
  status: "ok";
  subjects: string[];
}
export interface ResponseGroup {
  status: "ok";
  group_name: string;
  group_id: string | null;
}
export interface ResponseMessages {
  status: "ok";
  messages: string[];
}
