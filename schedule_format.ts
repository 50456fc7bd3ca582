import dayjs from "dayjs";
import type { LessonRecord, Schedule, ScheduleDay } from "./types";

const UNKNOWN_SUBJECT = "невідомо";
const DAY_RULE = "──────────────";

// MarkdownV2 reserved characters
export function escapeMarkdown(text: string) {
  return text.replace(/([_*\[\]()~`>#+\-=|{}.!\\])/g, "\\$1");
}
function escapeUrl(url: string) {
  return url.replace(/([)\\])/g, "\\$1");
}

/**
 * Keeps lessons whose subject contains any of `subjects`, case-insensitive.
 * Slots and days left empty are dropped. An empty filter keeps everything.
 */
export function filterSchedule(schedule: Schedule, subjects: string[]): Schedule {
  if (subjects.length === 0) return schedule;
  const wanted = subjects.map((s) => s.toLowerCase());
  const filtered: Schedule = new Map();
  for (const [date, day] of schedule) {
    const lessons = day.lessons.flatMap((slot) => {
      const lessons_info = slot.lessons_info.filter((info) => {
        const subject = (info.subject ?? "").toLowerCase();
        return wanted.some((s) => subject.includes(s));
      });
      return lessons_info.length ? [{ ...slot, lessons_info }] : [];
    });
    if (lessons.length) filtered.set(date, { ...day, lessons });
  }
  return filtered;
}

function formatLesson(info: LessonRecord) {
  const type = info.type ? ` (${info.type})` : "";
  const lines = [`  • ${escapeMarkdown(`${info.subject ?? UNKNOWN_SUBJECT}${type}`)}`];
  if (info.subgroup) lines.push(`    ${escapeMarkdown(info.subgroup)}`);
  if (info.groups)
    lines.push(`    Групи: ${escapeMarkdown(info.groups.join(", "))}`);
  if (info.teachers)
    lines.push(`    Викладач: ${escapeMarkdown(info.teachers.join(", "))}`);
  for (const link of info.links ?? [])
    lines.push(`    [Посилання](${escapeUrl(link)})`);
  return lines;
}

function formatDay(date: string, day: ScheduleDay) {
  const title = day.day_of_week ? `${day.day_of_week}, ${date}` : date;
  const lines = [`📅 *${escapeMarkdown(title)}*`, DAY_RULE];
  if (day.lessons.length === 0) lines.push("Пар немає\\.");
  for (const slot of day.lessons) {
    lines.push(`*${escapeMarkdown(`${slot.lesson_number}. (${slot.time})`)}*`);
    for (const info of slot.lessons_info) lines.push(...formatLesson(info));
    lines.push("");
  }
  return lines;
}

export interface FormatOptions {
  group_name: string;
  subjects?: string[];
  now?: Date;
}
export function formatScheduleMessage(schedule: Schedule, options: FormatOptions) {
  const lines = [`Розклад групи *${escapeMarkdown(options.group_name)}*`];
  if (options.subjects?.length)
    lines.push(`_Фільтр: ${escapeMarkdown(options.subjects.join(", "))}_`);
  lines.push("");
  for (const [date, day] of schedule) lines.push(...formatDay(date, day), "");
  const fetched = dayjs(options.now).format("DD.MM.YY [о] HH:mm");
  lines.push(`_Отримано: ${escapeMarkdown(fetched)}_`);
  return lines.join("\n");
}

// a hard cut must not end on a lone escape backslash or half a surrogate pair
function cutPoint(line: string, limit: number) {
  let cut = limit;
  while (cut > 1) {
    const code = line.charCodeAt(cut - 1);
    let slashes = 0;
    while (slashes < cut && line[cut - 1 - slashes] === "\\") slashes++;
    if (code < 0xd800 || code > 0xdbff) {
      if (slashes % 2 === 0) break;
    }
    cut--;
  }
  return cut;
}

/**
 * Cuts `text` into pieces of at most `limit` characters on line breaks,
 * so that no formatting entity is split. Longer lines are cut hard, keeping
 * escape pairs and surrogate pairs together.
 */
export function splitMessage(text: string, limit: number) {
  const chunks: string[] = [];
  let current = "";
  for (const line of text.split("\n")) {
    const joined = current ? `${current}\n${line}` : line;
    if (joined.length <= limit) {
      current = joined;
      continue;
    }
    if (current.trim()) chunks.push(current);
    current = line;
    while (current.length > limit) {
      const cut = cutPoint(current, limit);
      chunks.push(current.slice(0, cut));
      current = current.slice(cut);
    }
  }
  if (current.trim()) chunks.push(current);
  return chunks;
}
