// src/telegram/phrases.ts
import { escapeMarkdown, formatElapsed } from "../utils/misc.ts";
import type { ScheduleDate } from "../utils/date.ts";
import type { BotInfo, EntityRef } from "../types.ts";

export const UPDATED_CAPTION = "🆕 Расписание изменилось!";

const ENTITY_LABEL = {
  group: "группы",
  mentor: "преподавателя",
} as const;

export function noScheduleText(entity: EntityRef, date: ScheduleDate): string {
  return `📭 ${date.weekdayName}, ${date}: для ${ENTITY_LABEL[entity.kind]} *${escapeMarkdown(entity.key)}* занятий нет.`;
}

export function startupText(botInfo: BotInfo): string {
  return `✅ *Bot Started!*\nID: \`${botInfo.id}\`\nUsername: @${escapeMarkdown(botInfo.username)}\nMode: schedule checker`;
}

export interface BroadcastSummary {
  reason: "new" | "changes" | "resume";
  dates: readonly ScheduleDate[];
  delivered: number;
  failed: number;
  skipped: number;
  elapsedMs: number;
}

const REASON_TITLE: Record<BroadcastSummary["reason"], string> = {
  new: "📤 *Рассылка нового расписания*",
  changes: "🔁 *Рассылка изменений*",
  resume: "♻️ *Возобновлённая рассылка*",
};

export function broadcastReportText(summary: BroadcastSummary): string {
  return [
    REASON_TITLE[summary.reason],
    `Даты: ${summary.dates.map(String).join(", ")}`,
    `✅ Доставлено: ${summary.delivered}`,
    `❌ Не доставлено: ${summary.failed}`,
    `⏭ Пропущено: ${summary.skipped}`,
    `⏱ Время: ${formatElapsed(summary.elapsedMs)}`,
  ].join("\n");
}

export const FONT_MISSING_TEXT =
  "⚠️ *Шрифт расписания не загружен.*\nЛисты будут собраны встроенным шрифтом, кириллица в них может не отображаться.";
