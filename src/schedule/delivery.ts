// src/schedule/delivery.ts
import { CHAT_THEME } from "../config.ts";
import { errorMessage } from "../errors.ts";
import { noScheduleText } from "../telegram/phrases.ts";
import { isAbortError, log } from "../utils/misc.ts";
import type { Broadcaster } from "../telegram/broadcast.ts";
import type { ScheduleDate } from "../utils/date.ts";
import type {
  ChatSubscription,
  EntityRef,
  Recipient,
  RenderedSchedule,
  ScheduleArchiveStore,
  ScheduleRenderer,
  SubscriberDirectory,
  ThemeName,
} from "../types.ts";

export interface DeliveryDependencies {
  store: ScheduleArchiveStore;
  directory: SubscriberDirectory;
  renderer: ScheduleRenderer;
  broadcaster: Broadcaster;
}

export interface DeliveryOptions {
  /** Sheets go out with the "changed" caption, silently. */
  updated: boolean;
  /** Entities to leave out, e.g. those whose fetch failed this cycle. */
  skip?: (entity: EntityRef) => boolean;
  /** Restricts delivery to these entities. */
  include?: (entity: EntityRef) => boolean;
  /** Restricts which chats take part. */
  includeChat?: (chat: ChatSubscription) => boolean;
  signal?: AbortSignal;
}

export interface DeliveryTally {
  delivered: number;
  failed: number;
  skipped: number;
}

export function emptyTally(): DeliveryTally {
  return { delivered: 0, failed: 0, skipped: 0 };
}

export function addTally(into: DeliveryTally, other: DeliveryTally): void {
  into.delivered += other.delivered;
  into.failed += other.failed;
  into.skipped += other.skipped;
}

interface Audience {
  entity: EntityRef;
  recipients: Recipient[];
}

function audienceKey(entity: EntityRef): string {
  return `${entity.kind}:${entity.key}`;
}

function collect(into: Map<string, Audience>, entity: EntityRef, recipient: Recipient): void {
  const key = audienceKey(entity);
  const audience = into.get(key);
  if (audience) audience.recipients.push(recipient);
  else into.set(key, { entity, recipients: [recipient] });
}

/** Chats always get the fixed chat theme; individuals their own. */
export function partitionByTheme(recipients: readonly Recipient[]): Map<ThemeName, Recipient[]> {
  const byTheme = new Map<ThemeName, Recipient[]>();
  for (const recipient of recipients) {
    const theme = recipient.kind === "chat" ? CHAT_THEME : recipient.theme;
    const list = byTheme.get(theme);
    if (list) list.push(recipient);
    else byTheme.set(theme, [recipient]);
  }
  return byTheme;
}

async function mentorPass(deps: DeliveryDependencies): Promise<Audience[]> {
  const audiences = new Map<string, Audience>();
  for (const subscription of await deps.directory.listMentorSubscriptions()) {
    collect(audiences, { kind: "mentor", key: subscription.mentorName }, subscription.recipient);
  }
  return [...audiences.values()];
}

async function chatPass(deps: DeliveryDependencies, includeChat: (chat: ChatSubscription) => boolean): Promise<Audience[]> {
  const audiences = new Map<string, Audience>();
  for (const chat of await deps.directory.listChatSubscriptions()) {
    if (!includeChat(chat)) continue;
    const recipient: Recipient = { kind: "chat", id: chat.chatId };
    if (chat.group) collect(audiences, { kind: "group", key: chat.group }, recipient);
    if (chat.mentor) collect(audiences, { kind: "mentor", key: chat.mentor }, recipient);
  }
  return [...audiences.values()];
}

async function groupPass(deps: DeliveryDependencies, include: (entity: EntityRef) => boolean): Promise<Audience[]> {
  const audiences: Audience[] = [];
  for (const group of await deps.directory.listSubscribedGroups()) {
    const entity: EntityRef = { kind: "group", key: group };
    if (!include(entity)) continue;
    audiences.push({ entity, recipients: await deps.directory.recipientsForGroup(group) });
  }
  return audiences;
}

async function deliverToAudience(
  deps: DeliveryDependencies,
  { entity, recipients }: Audience,
  date: ScheduleDate,
  options: DeliveryOptions,
): Promise<DeliveryTally> {
  const tally = emptyTally();
  if (recipients.length === 0) return tally;

  if (options.skip?.(entity)) {
    log("WARN", `[Delivery] Skipping ${entity.kind} ${entity.key} on ${date}: fetch failed this cycle`);
    tally.skipped++;
    return tally;
  }

  const table = await deps.store.get(entity.key, date);
  if (table === undefined) {
    log("WARN", `[Delivery] Nothing archived for ${entity.kind} ${entity.key} on ${date}`);
    tally.skipped++;
    return tally;
  }

  if (table.length === 0) {
    const report = await deps.broadcaster.sendTextToMany(recipients, noScheduleText(entity, date), {
      silent: recipient => recipient.kind === "individual",
      signal: options.signal,
    });
    tally.delivered += report.delivered;
    tally.failed += report.failed.length;
    return tally;
  }

  for (const [theme, themed] of partitionByTheme(recipients)) {
    let sheet: RenderedSchedule;
    try {
      sheet = await deps.renderer.render({ entity, date, table, theme });
    } catch (error) {
      if (isAbortError(error)) throw error;
      log("ERROR", `[Delivery] Rendering ${entity.key} on ${date} (${theme}) failed: ${errorMessage(error)}`, error);
      tally.skipped++;
      continue;
    }
    const report = await deps.broadcaster.sendImageToMany(themed, sheet, options.updated, options.signal);
    tally.delivered += report.delivered;
    tally.failed += report.failed.length;
  }
  return tally;
}

/**
 * Delivers one date to every subscriber: mentors first, then chats, then groups.
 * A failure for one entity is logged and counted as skipped; cancellation propagates.
 */
export async function deliverDate(
  deps: DeliveryDependencies,
  date: ScheduleDate,
  options: DeliveryOptions,
): Promise<DeliveryTally> {
  const include = options.include ?? (() => true);
  const includeChat = options.includeChat ?? (() => true);
  const tally = emptyTally();

  const passes: [string, () => Promise<Audience[]>][] = [
    ["mentors", () => mentorPass(deps)],
    ["chats", () => chatPass(deps, includeChat)],
    ["groups", () => groupPass(deps, include)],
  ];

  for (const [name, pass] of passes) {
    let audiences: Audience[];
    try {
      audiences = (await pass()).filter(audience => include(audience.entity));
    } catch (error) {
      log("ERROR", `[Delivery] Could not list ${name} subscribers for ${date}`, error);
      tally.skipped++;
      continue;
    }
    for (const audience of audiences) {
      if (options.signal?.aborted) return tally;
      try {
        addTally(tally, await deliverToAudience(deps, audience, date, options));
      } catch (error) {
        if (isAbortError(error)) throw error;
        log("ERROR", `[Delivery] ${audience.entity.kind} ${audience.entity.key} on ${date} failed`, error);
        tally.skipped++;
      }
    }
    log("INFO", `[Delivery] ${name} pass for ${date} done`, tally);
  }
  return tally;
}
