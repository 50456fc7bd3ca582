import { run } from "@grammyjs/runner";
import { createBot, shutdown } from "./bot";
import { appconfig } from "./config";
import { ScheduleDatabase } from "./db";
import type { SettingsStore } from "./db";
import { log, notify } from "./logger";
import { MemoryStore } from "./memory_store";

const BOT_TOKEN = process.env.TOKEN;
if (!BOT_TOKEN) {
  log.fatal("no token");
  process.exit(1);
}

let store: SettingsStore;
if (appconfig.db.enabled) {
  store = await new ScheduleDatabase().connect();
  log.debug("database - ok");
} else {
  store = new MemoryStore();
  log.warn("database is disabled, settings are kept in memory only");
}

const runner = run(createBot(BOT_TOKEN, store));
log.info("started");
if (appconfig.logger.use_ntfy) await notify("info", "yeah", "1", "timetable bot started");

const stop = () => {
  shutdown(runner, store).catch((err: Error) => {
    log.error(`shutdown failed: ${err.message}`);
    process.exitCode = 1;
  });
};
process.once("SIGINT", stop);
process.once("SIGTERM", stop);
