import dayjs from "dayjs";
import { log } from "./logger";
import { pickSetting } from "./db";
import type { SettingsStore, StoredSettings } from "./db";
import type { SettingsKey, UserSettings } from "./types";

interface MemoryUser {
  username: string;
  settings: StoredSettings;
  stats: { join: string };
}

/** Keeps settings in process memory. Everything is lost on restart. */
export class MemoryStore implements SettingsStore {
  private users = new Map<string, MemoryUser>();
  private locks = new Map<string, Promise<unknown>>();

  private user(id: number | string) {
    const key = String(id);
    let user = this.users.get(key);
    if (!user) {
      user = { username: "", settings: {}, stats: { join: dayjs().toString() } };
      this.users.set(key, user);
    }
    return user;
  }
  // runs `task` after every earlier task of the same user has settled
  private serialize<T>(id: number | string, task: () => Promise<T> | T) {
    const key = String(id);
    const prev = this.locks.get(key) ?? Promise.resolve();
    const next = prev.then(task, task);
    const tail = next.catch(() => undefined);
    this.locks.set(key, tail);
    void tail.then(() => {
      if (this.locks.get(key) === tail) this.locks.delete(key);
    });
    return next;
  }

  async userAdd(id: number | string, username: string) {
    const isNew = !this.users.has(String(id));
    this.user(id).username = username;
    if (isNew) log.info(`add user: ${id} - '${username}'`);
  }
  async get<K extends SettingsKey>(
    id: number | string,
    key: K,
    fallback: UserSettings[K],
  ) {
    return pickSetting(this.users.get(String(id))?.settings ?? {}, key, fallback);
  }
  async set<K extends SettingsKey>(
    id: number | string,
    key: K,
    value: UserSettings[K],
  ) {
    await this.serialize(id, () => {
      const user = this.user(id);
      user.settings = { ...user.settings, [key]: value };
    });
  }
  async update<K extends SettingsKey>(
    id: number | string,
    key: K,
    fallback: UserSettings[K],
    fn: (value: UserSettings[K]) => UserSettings[K],
  ) {
    return await this.serialize(id, () => {
      const user = this.user(id);
      const value = fn(pickSetting(user.settings, key, fallback));
      user.settings = { ...user.settings, [key]: value };
      return value;
    });
  }
  // waits for queued updates, then drops everything
  async close() {
    await Promise.all(this.locks.values());
    this.users.clear();
  }
}
