import { Bot, Context } from "grammy";
import { sequentialize } from "@grammyjs/runner";
import type { RunnerHandle } from "@grammyjs/runner";
import type { SettingsStore } from "./db";
import { pickSubject, subjectsKB } from "./helper";
import { log } from "./logger";
import { ScheduleAPI } from "./schedule_api";
import { escapeMarkdown } from "./schedule_format";
import {
  addSubject,
  clearSubjects,
  removeSubject,
  toggleSubject,
} from "./subjects";

const COMMANDS = `/setgroup - вибрати групу, наприклад /setgroup ІПм-24-1
/schedule - розклад вашої групи
/subjects - вибрати предмети зі списку
/addsubject - додати предмет (або частину назви) до фільтра
/removesubject - прибрати предмет з фільтра
/mysubjects - предмети, за якими фільтрується розклад
/showall - скинути фільтр і показати весь розклад
/help - допомога`;

export function createBot(
  token: string,
  store: SettingsStore,
  sapi: ScheduleAPI = new ScheduleAPI(),
) {
  const bot = new Bot(token);
  bot.use(
    sequentialize((ctx) => {
      const chat = ctx.chat?.id.toString();
      const user = ctx.from?.id.toString();
      return [chat, user].filter((con) => con !== undefined);
    }),
  );

  function userId(c: Context) {
    return c.from?.id ?? c.chatId ?? -1;
  }
  async function groupOf(uid: number) {
    const group_name = await store.get(uid, "group_name", null);
    const group_id = await store.get(uid, "group_id", null);
    return group_name ? { group_name, identifier: group_id ?? group_name } : null;
  }

  async function sendSchedule(c: Context) {
    const uid = userId(c);
    const group = await groupOf(uid);
    if (!group) {
      await c.reply(
        "Спочатку вкажіть групу командою /setgroup.\nНаприклад: /setgroup ІПм-24-1",
      );
      log.debug(`did not send schedule - group is not set (${uid})`);
      return;
    }
    await c.reply(`Отримую розклад групи ${group.group_name}...`);
    const subjects = await store.get(uid, "subjects", []);
    const j = await sapi.getScheduleMessages(
      group.identifier,
      group.group_name,
      subjects,
    );
    if (j.status === "error") {
      await c.reply(j.message);
      log.debug(`did not send schedule - ${j.reason} (${uid})`);
      return;
    }
    for (const text of j.messages)
      await c.reply(text, {
        parse_mode: "MarkdownV2",
        link_preview_options: { is_disabled: true },
      });
    log.debug(`sent schedule ${group.group_name} (${uid})`);
  }
  async function sendSubjects(c: Context) {
    const subjects = await store.get(userId(c), "subjects", []);
    if (subjects.length)
      await c.reply(
        `Розклад фільтрується за предметами:\n${subjects.map((s) => `- ${s}`).join("\n")}\n\n` +
          "/removesubject прибирає предмет, /showall показує весь розклад.",
      );
    else
      await c.reply(
        "Фільтр порожній, /schedule показує всі пари.\nДодати предмет: /addsubject або /subjects.",
      );
  }
  async function loadCatalog(c: Context) {
    const group = await groupOf(userId(c));
    if (!group) return null;
    return await sapi.getSubjects(group.identifier);
  }

  bot.command("start", async (c) => {
    const uid = userId(c);
    await store.userAdd(uid, c.from?.username ?? "");
    await c.reply(
      `Привіт! Я показую розклад занять з сайту деканату.\nСпочатку вкажіть групу, а потім користуйтеся /schedule.\n\n${COMMANDS}`,
    );
  });
  bot.command("help", async (c) => {
    await c.reply(COMMANDS);
  });
  bot.command("setgroup", async (c) => {
    const uid = userId(c);
    const group_name = c.match.trim();
    if (!group_name) {
      await c.reply("Вкажіть назву групи.\nНаприклад: /setgroup ІПм-24-1");
      return;
    }
    await c.reply(`Перевіряю групу '${group_name}'...`);
    const j = await sapi.resolveGroup(group_name);
    if (j.status === "error") {
      await c.reply(
        j.reason === "not_found"
          ? `Не вдалося знайти групу '${group_name}'. Перевірте назву і спробуйте ще раз.`
          : j.message,
      );
      return;
    }
    await store.set(uid, "group_name", j.group_name);
    await store.set(uid, "group_id", j.group_id);
    log.info(`set group '${j.group_name}' (${j.group_id ?? "no id"}) for ${uid}`);
    await c.reply(
      `Готово! Ваша група: ${j.group_name}.\n\nДодайте предмети через /subjects або /addsubject, або подивіться весь розклад: /schedule.`,
    );
  });
  bot.command("schedule", sendSchedule);
  bot.command("addsubject", async (c) => {
    const subject = c.match.trim();
    if (!subject) {
      await c.reply(
        "Вкажіть назву предмета (або її частину).\nНаприклад: /addsubject Креативна економіка",
      );
      return;
    }
    const added = await addSubject(store, userId(c), subject);
    await c.reply(
      added ? `'${subject}' додано до фільтра.` : `'${subject}' вже є у фільтрі.`,
    );
    await sendSubjects(c);
  });
  bot.command("removesubject", async (c) => {
    const subject = c.match.trim();
    if (!subject) {
      await c.reply(
        "Вкажіть предмет, який треба прибрати.\nНаприклад: /removesubject Креативна економіка",
      );
      return;
    }
    const removed = await removeSubject(store, userId(c), subject);
    await c.reply(
      removed ? `'${subject}' прибрано з фільтра.` : `'${subject}' немає у фільтрі.`,
    );
    await sendSubjects(c);
  });
  bot.command("mysubjects", sendSubjects);
  bot.command("showall", async (c) => {
    await clearSubjects(store, userId(c));
    await c.reply("Фільтр скинуто. Отримую весь розклад...");
    await sendSchedule(c);
  });
  bot.command("subjects", async (c) => {
    const j = await loadCatalog(c);
    if (j === null) {
      await c.reply("Спочатку вкажіть групу командою /setgroup.");
      return;
    }
    if (j.status === "error") {
      await c.reply(j.message);
      return;
    }
    if (j.subjects.length === 0) {
      await c.reply("У розкладі зараз немає жодного предмета.");
      return;
    }
    const selected = await store.get(userId(c), "subjects", []);
    await c.reply("Оберіть предмети для фільтра:", {
      reply_markup: subjectsKB(j.subjects, selected, 0),
    });
  });

  // callback query handlers
  bot.callbackQuery(/^subj:p:(\d+)$/, async (c) => {
    const page = Number(c.match[1] ?? 0);
    await c.answerCallbackQuery();
    const j = await loadCatalog(c);
    if (j === null || j.status === "error") {
      await c.editMessageText(j?.message ?? "Спочатку вкажіть групу командою /setgroup.");
      return;
    }
    const selected = await store.get(userId(c), "subjects", []);
    await c.editMessageReplyMarkup({
      reply_markup: subjectsKB(j.subjects, selected, page),
    });
  });
  bot.callbackQuery(/^subj:t:(\d+):(\d+):([0-9a-f]+)$/, async (c) => {
    const page = Number(c.match[1] ?? 0),
      index = Number(c.match[2] ?? -1),
      tag = c.match[3] ?? "";
    const j = await loadCatalog(c);
    if (j === null || j.status === "error") {
      await c.answerCallbackQuery();
      await c.editMessageText(j?.message ?? "Спочатку вкажіть групу командою /setgroup.");
      return;
    }
    const subject = pickSubject(j.subjects, index, tag);
    if (subject === null) {
      // the timetable changed since the keyboard was sent
      await c.answerCallbackQuery({ text: "Список предметів змінився" });
    } else {
      const selected = await toggleSubject(store, userId(c), subject);
      await c.answerCallbackQuery({
        text: selected ? `Додано: ${subject}` : `Прибрано: ${subject}`,
      });
    }
    const selected = await store.get(userId(c), "subjects", []);
    await c.editMessageReplyMarkup({
      reply_markup: subjectsKB(j.subjects, selected, page),
    });
  });
  bot.callbackQuery("subj:done", async (c) => {
    await c.answerCallbackQuery();
    const subjects = await store.get(userId(c), "subjects", []);
    const text = subjects.length
      ? `*Фільтр збережено:*\n${subjects.map((s) => escapeMarkdown(`- ${s}`)).join("\n")}`
      : "*Фільтр порожній*, /schedule покаже всі пари\\.";
    await c.editMessageText(text, { parse_mode: "MarkdownV2" });
  });
  bot.callbackQuery("subj:noop", async (c) => {
    await c.answerCallbackQuery();
  });

  bot.catch(async (err) => {
    const c = err.ctx;
    if (err.message.includes("message is not modified")) {
      try {
        await c.answerCallbackQuery();
      } catch (err1) {
        log.debug(`400: ${(err1 as Error).message}`);
      }
      return;
    }
    log.error(`update ${c.update.update_id}: ${err.message}`);
    try {
      if (c.callbackQuery) await c.answerCallbackQuery({ text: "Сталася помилка" });
      else await c.reply("Сталася помилка, спробуйте пізніше.");
    } catch (err2) {
      log.warn(`can't report the error to ${c.chatId}: ${(err2 as Error).message}`);
    }
  });
  return bot;
}

/** Stops taking updates, then releases the store. */
export async function shutdown(
  runner: Pick<RunnerHandle, "isRunning" | "stop">,
  store: SettingsStore,
) {
  if (runner.isRunning()) await runner.stop();
  await store.close();
  log.info("stopped");
}
