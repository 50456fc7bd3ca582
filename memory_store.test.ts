import { describe, expect, it } from "vitest";
import { MemoryStore } from "./memory_store";

describe("MemoryStore", () => {
  it("returns the fallback for unknown users and keys", async () => {
    const store = new MemoryStore();
    expect(await store.get(1, "group_name", null)).toBeNull();
    expect(await store.get(1, "subjects", [])).toEqual([]);
  });
  it("keeps values per user and key", async () => {
    const store = new MemoryStore();
    await store.set(1, "group_name", "ІПм-24-1");
    await store.set(1, "group_id", "-1985");
    await store.set(2, "group_name", "КН-23");
    expect(await store.get(1, "group_name", null)).toBe("ІПм-24-1");
    expect(await store.get("1", "group_id", null)).toBe("-1985");
    expect(await store.get(2, "group_name", null)).toBe("КН-23");
    expect(await store.get(2, "group_id", null)).toBeNull();
  });
  it("stores null as a value", async () => {
    const store = new MemoryStore();
    await store.set(1, "group_id", "-1985");
    await store.set(1, "group_id", null);
    expect(await store.get(1, "group_id", "fallback")).toBeNull();
  });
  it("does not lose concurrent updates of one user", async () => {
    const store = new MemoryStore();
    const names = Array.from({ length: 20 }, (_, i) => `subject ${i}`);
    await Promise.all(
      names.map((name) =>
        store.update(1, "subjects", [], (subjects) => [...subjects, name]),
      ),
    );
    expect(await store.get(1, "subjects", [])).toEqual(names);
  });
  it("keeps working after a failed update", async () => {
    const store = new MemoryStore();
    await expect(
      store.update(1, "subjects", [], () => {
        throw new Error("boom");
      }),
    ).rejects.toThrow("boom");
    expect(await store.update(1, "subjects", [], (s) => [...s, "Фізика"])).toEqual([
      "Фізика",
    ]);
  });
  it("registers users once", async () => {
    const store = new MemoryStore();
    await store.userAdd(1, "student");
    await store.set(1, "subjects", ["Фізика"]);
    await store.userAdd(1, "student2");
    expect(await store.get(1, "subjects", [])).toEqual(["Фізика"]);
  });
  it("finishes queued updates before closing", async () => {
    const store = new MemoryStore();
    const pending = store.update(1, "subjects", [], (s) => [...s, "Фізика"]);
    await store.close();
    await expect(pending).resolves.toEqual(["Фізика"]);
    expect(await store.get(1, "subjects", [])).toEqual([]);
  });
});
