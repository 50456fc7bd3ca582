import { createHash } from "crypto";
import { InlineKeyboard } from "grammy";
import type { InlineKeyboardButton } from "grammy/types";
import { appconfig } from "./config";

export interface KBButton {
  text: string;
  data: string;
}

export function buildKB(values: KBButton[], buttons_per_row: number = 3) {
  const rows: InlineKeyboardButton[][] = [];
  values.forEach((val, i) => {
    if (i % buttons_per_row === 0) rows.push([]);
    rows[rows.length - 1]?.push({ text: val.text, callback_data: val.data });
  });
  return rows;
}

export function pageCount(total: number, per_page: number) {
  return Math.max(1, Math.ceil(total / per_page));
}

// callback data is limited to 64 bytes, so a button carries a hash prefix, not the name
export function subjectTag(subject: string) {
  return createHash("sha1").update(subject).digest("hex").slice(0, 8);
}

/** Catalog entry behind a picker button, or null when the catalog has changed since. */
export function pickSubject(catalog: string[], index: number, tag: string) {
  const subject = catalog[index];
  return subject !== undefined && subjectTag(subject) === tag ? subject : null;
}

/** Subject picker. Buttons carry the subject index in `catalog` and its tag. */
export function subjectsKB(
  catalog: string[],
  selected: string[],
  page: number,
  per_page: number = appconfig.bot.subjects_per_page,
) {
  const pages = pageCount(catalog.length, per_page);
  const current = Math.min(Math.max(page, 0), pages - 1);
  const chosen = new Set(selected.map((s) => s.toLowerCase()));
  const start = current * per_page;
  const buttons = catalog.slice(start, start + per_page).map((subject, i) => ({
    text: `${chosen.has(subject.toLowerCase()) ? "✅" : "▫️"} ${subject}`,
    data: `subj:t:${current}:${start + i}:${subjectTag(subject)}`,
  }));
  const rows = buildKB(buttons, 1);
  if (pages > 1)
    rows.push(
      buildKB(
        [
          { text: "⬅️", data: `subj:p:${(current - 1 + pages) % pages}` },
          { text: `${current + 1}/${pages}`, data: "subj:noop" },
          { text: "➡️", data: `subj:p:${(current + 1) % pages}` },
        ],
        3,
      )[0] ?? [],
    );
  rows.push([{ text: "Готово", callback_data: "subj:done" }]);
  return new InlineKeyboard(rows);
}
