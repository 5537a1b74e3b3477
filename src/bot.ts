// src/bot.ts
import { FONT_MISSING_TEXT, startupText } from "./telegram/phrases.ts";
import { errorMessage } from "./errors.ts";
import { log } from "./utils/misc.ts";
import type { AppContext } from "./context.ts";
import type { ScheduleChecker } from "./schedule/checker.ts";

export type BotContext = Pick<AppContext, "config" | "api" | "messenger" | "loadFont"> & {
  checker: Pick<ScheduleChecker, "run">;
};

async function notifyAdmin(ctx: BotContext, text: string): Promise<void> {
  try {
    await ctx.messenger.sendMessage(ctx.config.adminChatId, text);
  } catch (error) {
    log("WARN", `Could not notify the admin chat: ${errorMessage(error)}`);
  }
}

/**
 * Initializes the bot and runs the schedule checker until the signal aborts.
 */
export async function startBot(ctx: BotContext, signal: AbortSignal): Promise<void> {
  // Pre-fetch critical resources at startup
  const font = await ctx.loadFont();
  if (!font) {
    await notifyAdmin(ctx, FONT_MISSING_TEXT);
  }

  const botInfo = await ctx.api.getMe();
  if (!botInfo) {
    throw new Error("Could not read the bot identity from the Telegram API. Check BOT_TOKEN.");
  }

  if (ctx.config.notifyOnStartup) {
    await notifyAdmin(ctx, startupText(botInfo));
  }

  // Always log this info to the console
  log("INFO", `Bot is running. ID: ${botInfo.id}, Username: @${botInfo.username}`);

  await ctx.checker.run(signal);
}
