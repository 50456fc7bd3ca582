import { describe, expect, it } from "vitest";
import { MemoryStore } from "./memory_store";
import {
  addSubject,
  clearSubjects,
  removeSubject,
  toggleSubject,
} from "./subjects";

describe("subject filter", () => {
  it("adds a subject once, ignoring case", async () => {
    const store = new MemoryStore();
    expect(await addSubject(store, 7, "Економіка")).toBe(true);
    expect(await addSubject(store, 7, "економіка")).toBe(false);
    expect(await store.get(7, "subjects", [])).toEqual(["Економіка"]);
  });
  it("removes a subject ignoring case", async () => {
    const store = new MemoryStore();
    await store.set(7, "subjects", ["Економіка", "Фізика"]);
    expect(await removeSubject(store, 7, "ФІЗИКА")).toBe(true);
    expect(await removeSubject(store, 7, "Хімія")).toBe(false);
    expect(await store.get(7, "subjects", [])).toEqual(["Економіка"]);
  });
  it("toggles a subject", async () => {
    const store = new MemoryStore();
    expect(await toggleSubject(store, 7, "Фізика")).toBe(true);
    expect(await store.get(7, "subjects", [])).toEqual(["Фізика"]);
    expect(await toggleSubject(store, 7, "фізика")).toBe(false);
    expect(await store.get(7, "subjects", [])).toEqual([]);
  });
  it("clears the filter", async () => {
    const store = new MemoryStore();
    await addSubject(store, 7, "Фізика");
    await clearSubjects(store, 7);
    expect(await store.get(7, "subjects", ["x"])).toEqual([]);
  });
});
