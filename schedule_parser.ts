import * as chr from "cheerio";
import { hasChildren, isText } from "domhandler";
import type { AnyNode, Element } from "domhandler";
import {
  isSubjectCandidate,
  matchGroups,
  matchSubgroup,
  matchSubject,
  matchTeacher,
  normalizeSubject,
  splitTypeAnnotation,
} from "./lesson_rules";
import type { LessonRecord, LessonSlot, Schedule } from "./types";

const LESSON_SEPARATOR = "LESSON_SEPARATOR";

function textRuns(nodes: AnyNode[], runs: string[] = []) {
  for (const node of nodes) {
    if (isText(node)) runs.push(node.data);
    else if (hasChildren(node)) textRuns(node.children, runs);
  }
  return runs;
}
// stripped non-empty text runs glued with `sep`
function flatText(nodes: AnyNode[], sep = "") {
  return textRuns(nodes)
    .map((run) => run.trim())
    .filter((run) => run !== "")
    .join(sep);
}
function textLines(nodes: AnyNode[]) {
  return textRuns(nodes)
    .flatMap((run) => run.split("\n"))
    .map((line) => line.trim())
    .filter((line) => line !== "");
}
function unique(values: string[]) {
  return [...new Set(values)];
}

/**
 * Splits one details cell into lesson blocks. Every lesson on the site starts
 * with a small icon, so a block begins right before each `<img`.
 * Blocks without visible text are dropped.
 */
export function segmentLessons(cellHtml: string): string[] {
  return cellHtml
    .replaceAll("<img", `${LESSON_SEPARATOR}<img`)
    .split(LESSON_SEPARATOR)
    .filter((part) => part.trim() !== "")
    .filter((part) => flatText(chr.load(part).root().toArray()) !== "");
}

export function classifyLesson(blockHtml: string): LessonRecord {
  const $ = chr.load(blockHtml);
  const lesson: LessonRecord = {};

  // hrefs, the visible text of a link is often cut short
  const links = $("a[href]")
    .toArray()
    .flatMap((a) => $(a).attr("href") ?? []);
  const lines = textLines($.root().toArray());
  const teachers: string[] = [];
  const groups: string[] = [];

  for (const line of lines) {
    if (lesson.subject === undefined) {
      const subject = matchSubject(line);
      if (subject) {
        lesson.type = subject.type;
        lesson.subject = subject.subject;
        continue;
      }
    }
    const teacher = matchTeacher(line);
    if (teacher !== null) teachers.push(teacher);
    groups.push(...matchGroups(line));
    const subgroup = matchSubgroup(line);
    if (subgroup !== null) lesson.subgroup = subgroup;
  }

  if (lesson.subject === undefined) {
    const candidate = lines.find(isSubjectCandidate);
    if (candidate !== undefined) {
      const { subject, type } = splitTypeAnnotation(candidate);
      lesson.subject = subject;
      if (type !== undefined) lesson.type = type;
    }
  }

  if (teachers.length) lesson.teachers = unique(teachers);
  if (groups.length) lesson.groups = unique(groups).sort();
  if (links.length) lesson.links = unique(links).sort();
  return lesson;
}

function parseSlots($: chr.CheerioAPI, table: Element) {
  const slots: LessonSlot[] = [];
  $(table)
    .find("tr")
    .each((_, tr) => {
      const tds = $(tr).find("td").toArray();
      const [number, time, details] = tds;
      if (tds.length !== 3 || !number || !time || !details) return;
      if (flatText([details]) === "") return;
      slots.push({
        lesson_number: flatText([number]),
        time: flatText([time], "-"),
        lessons_info: segmentLessons($.html(details)).map(classifyLesson),
      });
    });
  return slots;
}

/**
 * Builds the schedule from the group page, days in page order.
 * Returns null when the page has no day blocks at all.
 */
export function parseSchedule(html: string): Schedule | null {
  const $ = chr.load(html);
  const schedule: Schedule = new Map();

  $("div.col-md-6").each((_, div) => {
    const h4 = $(div).find("h4").first();
    if (h4.length === 0) return;
    const first = h4.contents().toArray()[0];
    const date = first ? flatText([first]) : "";
    const day_of_week = flatText(h4.find("small").first().toArray());

    const table = $(div).find("table.table").toArray()[0];
    schedule.set(date, {
      day_of_week,
      lessons: table ? parseSlots($, table) : [],
    });
  });
  return schedule.size ? schedule : null;
}

/** Every subject on the page without its lesson type, sorted. */
export function parseSubjects(html: string): string[] {
  const $ = chr.load(html);
  const subjects = new Set<string>();
  $("div.col-md-6 tr").each((_, tr) => {
    const tds = $(tr).find("td").toArray();
    const [, , details] = tds;
    if (tds.length !== 3 || !details || flatText([details]) === "") return;
    for (const block of segmentLessons($.html(details))) {
      const { subject } = classifyLesson(block);
      if (subject !== undefined) subjects.add(normalizeSubject(subject));
    }
  });
  return [...subjects].sort();
}

export function isGroupPage(html: string, marker: string) {
  return html.includes(marker);
}

/** Stable numeric group id from the header link, e.g. `group=-1985`. */
export function parseGroupId(html: string) {
  const $ = chr.load(html);
  const href = $('h4.hidden-xs a[href*="group="]').first().attr("href") ?? "";
  return href.match(/group=(-?\d+)/)?.[1] ?? null;
}
