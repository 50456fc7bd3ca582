import { z } from "zod";
import { existsSync, readFileSync, writeFileSync } from "fs";

const config_schema = z.object({
  db: z
    .object({
      enabled: z.boolean().default(false),
      host: z.string().default("localhost"),
      port: z.number().default(5432),
      user: z.string().default("timetable"),
      password: z.string().default("timetable"),
      database: z.string().default("timetabledb"),
    })
    .default({}),
  bot: z
    .object({
      // telegram rejects longer messages
      message_limit: z.number().int().positive().max(4096).default(4096),
      subjects_per_page: z.number().int().positive().default(8),
    })
    .default({}),
  logger: z
    .object({
      level: z.string().default("debug"),
      use_colors: z.boolean().default(false),
      time_format: z.string().default("dd mmm yyyy, HH:MM:ss.l"),
      ignore: z.string().default("pid,hostname"),
      to_files: z.boolean().default(true),
      use_ntfy: z.boolean().default(false),
      ntfy_url: z.string().default("https://ntfy.sh/timetable_notifications"),
    })
    .default({}),
  source: z
    .object({
      base_url: z
        .string()
        .default("https://dekanat.nung.edu.ua/cgi-bin/timetable.cgi"),
      n: z.string().default("700"),
      encoding: z.string().default("win1251"),
      timeout_ms: z.number().int().positive().default(15000),
      found_marker: z.string().default("Розклад групи"),
    })
    .default({}),
});
export type Config = z.infer<typeof config_schema>;

export const DEFAULT_CONFIG: Config = config_schema.parse({});
const CONFIG_PATH = process.env.CONFIG_PATH ?? "./config.json";

export function parseConfig(raw: unknown): Config {
  return config_schema.parse(raw);
}

function loadConfig(): Config {
  if (existsSync(CONFIG_PATH)) {
    try {
      return parseConfig(JSON.parse(readFileSync(CONFIG_PATH, "utf-8")));
    } catch (err) {
      const e = err as Error;
      console.error(`Config error: ${e.message}`);
      console.warn("Using default config for now.");
      return DEFAULT_CONFIG;
    }
  } else {
    console.warn(`File '${CONFIG_PATH}' not found. Writing default.`);
    writeFileSync(CONFIG_PATH, JSON.stringify(DEFAULT_CONFIG, null, 2));
    return DEFAULT_CONFIG;
  }
}

export const appconfig: Config = loadConfig();
