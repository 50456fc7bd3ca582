import pino from "pino";
import type { TransportTargetOptions } from "pino";
import { appconfig } from "./config";

let USE_NTFY = appconfig.logger.use_ntfy;
const NTFY_URL = appconfig.logger.ntfy_url;
const LOG_LEVEL = process.env.LOG_LEVEL ?? appconfig.logger.level;

export async function notify(
  level: string,
  message: string,
  priority: string = "3",
  title: string = "timetable bot notify",
  tags: string = "",
) {
  try {
    await fetch(NTFY_URL, {
      method: "POST",
      headers: {
        Title: level === "error" ? "timetable bot error" : title,
        Priority: level === "error" ? "5" : priority,
        Tags: tags,
      },
      body: message,
    });
  } catch (err) {
    const e = err as Error;
    console.error(
      `failed to send notification - ${e.message}.\nDisabled notifications until next launch`,
    );
    appconfig.logger.use_ntfy = false;
    USE_NTFY = false;
  }
}

function prettyTarget(level: string, destination?: string): TransportTargetOptions {
  return {
    level,
    target: "pino-pretty",
    options: {
      ...(destination ? { destination } : {}),
      colorize: appconfig.logger.use_colors,
      translateTime: appconfig.logger.time_format,
      ignore: appconfig.logger.ignore,
    },
  };
}

function createLogger() {
  // no worker threads when muted, the tests run this way
  if (LOG_LEVEL === "silent") return pino({ level: "silent" });
  const targets = [prettyTarget(LOG_LEVEL)];
  if (appconfig.logger.to_files)
    targets.push(prettyTarget("info", "info.log"), prettyTarget("debug", "debug.log"));
  return pino({
    level: LOG_LEVEL,
    hooks: {
      logMethod(inputArgs, method, level) {
        const [msg, ...args] = inputArgs;
        const formatted = typeof msg === "string" ? msg : JSON.stringify(msg);
        if (level >= 40 && USE_NTFY) {
          void notify(pino.levels.labels[level] ?? "", formatted);
        }
        method.apply(this, [msg, ...args]);
      },
    },
    transport: { targets },
  });
}

export const log = createLogger();

log.info("---");
log.debug("logger - ok");
