import { Pool } from "pg";
import dayjs from "dayjs";
import { z } from "zod";
import { appconfig } from "./config";
import { log } from "./logger";
import type { SettingsKey, UserSettings } from "./types";

/**
 * Per-user settings. `update` is a read-modify-write that must not lose
 * writes when the same user sends several commands at once.
 */
export interface SettingsStore {
  userAdd(id: number | string, username: string): Promise<void>;
  get<K extends SettingsKey>(
    id: number | string,
    key: K,
    fallback: UserSettings[K],
  ): Promise<UserSettings[K]>;
  set<K extends SettingsKey>(
    id: number | string,
    key: K,
    value: UserSettings[K],
  ): Promise<void>;
  update<K extends SettingsKey>(
    id: number | string,
    key: K,
    fallback: UserSettings[K],
    fn: (value: UserSettings[K]) => UserSettings[K],
  ): Promise<UserSettings[K]>;
  close(): Promise<void>;
}

export type StoredSettings = Partial<UserSettings>;
export const settings_schema: z.ZodType<StoredSettings> = z
  .object({
    group_id: z.string().nullable(),
    group_name: z.string().nullable(),
    subjects: z.array(z.string()),
  })
  .partial();

export function readSettings(id: number | string, raw: unknown): StoredSettings {
  const parsed = settings_schema.safeParse(raw ?? {});
  if (parsed.success) return parsed.data;
  log.warn(`broken settings of ${id}, ignoring them: ${parsed.error.message}`);
  return {};
}
export function pickSetting<K extends SettingsKey>(
  settings: StoredSettings,
  key: K,
  fallback: UserSettings[K],
): UserSettings[K] {
  const value = settings[key];
  return value === undefined ? fallback : value;
}

export class ScheduleDatabase implements SettingsStore {
  constructor(
    public db = new Pool({
      host: appconfig.db.host,
      port: appconfig.db.port,
      user: appconfig.db.user,
      password: appconfig.db.password,
      database: appconfig.db.database,
    }),
  ) {}
  async connect() {
    await this.db.query(`
    CREATE TABLE IF NOT EXISTS users (
      id TEXT PRIMARY KEY,
      username TEXT,
      settings JSONB NOT NULL DEFAULT '{}',
      stats JSONB NOT NULL DEFAULT '{}'
    )`);
    return this;
  }
  async userAdd(id: number | string, username: string) {
    const res = await this.db.query<{ inserted: boolean }>(
      `INSERT INTO users (id, username, stats) VALUES ($1, $2, $3)
       ON CONFLICT (id) DO UPDATE SET username = EXCLUDED.username
       RETURNING (xmax = 0) AS inserted`,
      [String(id), username, JSON.stringify({ join: dayjs().toString() })],
    );
    if (res.rows[0]?.inserted) log.info(`add user: ${id} - '${username}'`);
  }
  async get<K extends SettingsKey>(
    id: number | string,
    key: K,
    fallback: UserSettings[K],
  ) {
    const res = await this.db.query<{ settings: unknown }>(
      "SELECT settings FROM users WHERE id = $1",
      [String(id)],
    );
    return pickSetting(readSettings(id, res.rows[0]?.settings), key, fallback);
  }
  async set<K extends SettingsKey>(
    id: number | string,
    key: K,
    value: UserSettings[K],
  ) {
    // one statement, so concurrent writes of other keys are kept
    await this.db.query(
      `INSERT INTO users (id, settings) VALUES ($1, jsonb_build_object($2::text, $3::jsonb))
       ON CONFLICT (id) DO UPDATE SET settings = users.settings || EXCLUDED.settings`,
      [String(id), key, JSON.stringify(value)],
    );
    log.debug(`updated settings: ${id} - ${key} = '${JSON.stringify(value)}'`);
  }
  async update<K extends SettingsKey>(
    id: number | string,
    key: K,
    fallback: UserSettings[K],
    fn: (value: UserSettings[K]) => UserSettings[K],
  ) {
    const client = await this.db.connect();
    try {
      await client.query("BEGIN");
      await client.query(
        "INSERT INTO users (id) VALUES ($1) ON CONFLICT (id) DO NOTHING",
        [String(id)],
      );
      const res = await client.query<{ settings: unknown }>(
        "SELECT settings FROM users WHERE id = $1 FOR UPDATE",
        [String(id)],
      );
      const value = fn(
        pickSetting(readSettings(id, res.rows[0]?.settings), key, fallback),
      );
      await client.query(
        "UPDATE users SET settings = settings || jsonb_build_object($2::text, $3::jsonb) WHERE id = $1",
        [String(id), key, JSON.stringify(value)],
      );
      await client.query("COMMIT");
      log.debug(`updated settings: ${id} - ${key} = '${JSON.stringify(value)}'`);
      return value;
    } catch (err) {
      await client.query("ROLLBACK");
      throw err;
    } finally {
      client.release();
    }
  }
  async close() {
    await this.db.end();
    log.debug("database - closed");
  }
}
