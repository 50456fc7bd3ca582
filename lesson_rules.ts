// Line rules for lesson details. The site has no markup for the fields,
// so each one is recognised by how its text looks.

const SUBJECT_RE = /^\*\((.+?)\)\s*(.+)$/u;
const TEACHER_RE = /викладач\s(.+)/iu;
const GROUPS_RE = /[\p{L}\p{N}_\s-]+-\d+-\d+/gu;
const SUBGROUP_RE = /підгр\.\s*\d/iu;
const LINK_RE = /https?:\/\/\S+/u;
const TYPE_RE = /\((.+?)\)/u;
const REMOTE_WORD = "дистанційно";
// trailing lesson type left in subject names, "Економіка (Пр)"
const TYPE_SUFFIX_RE = /\s*\((Л|Пр|Лаб)\)$/iu;

/** `*(Л) Вища математика` */
export function matchSubject(line: string) {
  const m = line.match(SUBJECT_RE);
  if (!m) return null;
  const [, type = "", subject = ""] = m;
  return { type: type.trim(), subject: subject.trim() };
}

/** `викладач Іванов І.І.` gives `Іванов І.І.` */
export function matchTeacher(line: string) {
  const name = line.match(TEACHER_RE)?.[1]?.trim();
  return name ? name : null;
}

/** Every group code in the line: `ІПм-24-1, ІПм-24-2`. */
export function matchGroups(line: string) {
  return (line.match(GROUPS_RE) ?? []).map((g) => g.trim());
}

export function matchSubgroup(line: string) {
  return line.match(SUBGROUP_RE)?.[0]?.trim() ?? null;
}

export function hasLink(line: string) {
  return LINK_RE.test(line);
}

export function isRemoteMarker(line: string) {
  return line.toLowerCase().includes(REMOTE_WORD);
}

/** Fallback subject: a line none of the other rules claims. */
export function isSubjectCandidate(line: string) {
  return (
    matchTeacher(line) === null &&
    !hasLink(line) &&
    matchGroups(line).length === 0 &&
    !isRemoteMarker(line)
  );
}

/** `Економіка (Пр)` gives subject `Економіка` and type `Пр`. */
export function splitTypeAnnotation(line: string): {
  subject: string;
  type?: string;
} {
  const type = line.match(TYPE_RE)?.[1];
  if (type === undefined) return { subject: line };
  return { subject: line.replaceAll(`(${type})`, "").trim(), type };
}

export function normalizeSubject(subject: string) {
  return subject.replace(TYPE_SUFFIX_RE, "").trim();
}
