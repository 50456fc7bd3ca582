import { appconfig } from "./config";
import type { Config } from "./config";
import { ScheduleFetcher } from "./fetcher";
import { log } from "./logger";
import {
  isGroupPage,
  parseGroupId,
  parseSchedule,
  parseSubjects,
} from "./schedule_parser";
import {
  filterSchedule,
  formatScheduleMessage,
  splitMessage,
} from "./schedule_format";
import type {
  ErrorReason,
  ResponseError,
  ResponseGroup,
  ResponseMessages,
  ResponseSchedule,
  ResponseSubjects,
} from "./types";

const ERROR_MESSAGES: Record<ErrorReason, string> = {
  fetch: "Не вдалося завантажити розклад, спробуйте пізніше.",
  parse: "Не вдалося розпізнати дані розкладу.",
  not_found: "Групу не знайдено, перевірте назву.",
};
function fail(reason: ErrorReason): ResponseError {
  return { status: "error", reason, message: ERROR_MESSAGES[reason] };
}

export class ScheduleAPI {
  constructor(
    public fetcher = new ScheduleFetcher(),
    public SOURCE: Config["source"] = appconfig.source,
    public MESSAGE_LIMIT: number = appconfig.bot.message_limit,
  ) {}

  async getSchedule(identifier: string): Promise<ResponseSchedule | ResponseError> {
    const html = await this.fetcher.fetch(identifier);
    if (html === null) return fail("fetch");
    const schedule = parseSchedule(html);
    if (schedule === null) {
      log.debug(`no day blocks on the page for '${identifier}'`);
      return fail("parse");
    }
    return { status: "ok", schedule };
  }
  async getSubjects(identifier: string): Promise<ResponseSubjects | ResponseError> {
    const html = await this.fetcher.fetch(identifier);
    if (html === null) return fail("fetch");
    return { status: "ok", subjects: parseSubjects(html) };
  }
  /**
   * Looks the group up by name, or by id when it is numeric, and picks its
   * numeric id when the page has one.
   */
  async resolveGroup(group_name: string): Promise<ResponseGroup | ResponseError> {
    const html = await this.fetcher.fetch(group_name);
    if (html === null) return fail("fetch");
    if (!isGroupPage(html, this.SOURCE.found_marker)) return fail("not_found");
    const group_id = parseGroupId(html);
    log.debug(`resolved group '${group_name}' - id ${group_id ?? "none"}`);
    return { status: "ok", group_name, group_id };
  }
  async getScheduleMessages(
    identifier: string,
    group_name: string,
    subjects: string[] = [],
    now: Date = new Date(),
  ): Promise<ResponseMessages | ResponseError> {
    const j = await this.getSchedule(identifier);
    if (j.status === "error") return j;
    const schedule = filterSchedule(j.schedule, subjects);
    if (schedule.size === 0)
      return {
        status: "ok",
        messages: ["За обраними предметами пар не знайдено\\."],
      };
    const text = formatScheduleMessage(schedule, { group_name, subjects, now });
    return { status: "ok", messages: splitMessage(text, this.MESSAGE_LIMIT) };
  }
}
