import type { SettingsStore } from "./db";

function sameSubject(a: string, b: string) {
  return a.toLowerCase() === b.toLowerCase();
}

/** Returns false when the subject is already in the list. */
export async function addSubject(
  store: SettingsStore,
  uid: number | string,
  subject: string,
) {
  let added = false;
  await store.update(uid, "subjects", [], (subjects) => {
    added = !subjects.some((s) => sameSubject(s, subject));
    return added ? [...subjects, subject] : subjects;
  });
  return added;
}

/** Returns false when there was nothing to remove. */
export async function removeSubject(
  store: SettingsStore,
  uid: number | string,
  subject: string,
) {
  let removed = false;
  await store.update(uid, "subjects", [], (subjects) => {
    const left = subjects.filter((s) => !sameSubject(s, subject));
    removed = left.length < subjects.length;
    return left;
  });
  return removed;
}

/** Adds or removes the subject, returns whether it is selected afterwards. */
export async function toggleSubject(
  store: SettingsStore,
  uid: number | string,
  subject: string,
) {
  const subjects = await store.update(uid, "subjects", [], (subjects) =>
    subjects.some((s) => sameSubject(s, subject))
      ? subjects.filter((s) => !sameSubject(s, subject))
      : [...subjects, subject],
  );
  return subjects.some((s) => sameSubject(s, subject));
}

export async function clearSubjects(store: SettingsStore, uid: number | string) {
  await store.set(uid, "subjects", []);
}
