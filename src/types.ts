// src/types.ts
import type { ScheduleDate } from "./utils/date.ts";

// --- Telegram API Types ---
export interface ResponseParameters {
  retry_after?: number;
  migrate_to_chat_id?: number;
}

export type TelegramResponse<T> =
  | { ok: true; result: T }
  | { ok: false; description?: string; error_code?: number; parameters?: ResponseParameters };

export interface BotInfo {
  id: number;
  username: string;
  first_name: string;
}

// --- Schedule Types ---
export interface ScheduleEntry {
  slot: string;
  subject: string;
  room: string;
}

/** Period-ordered rows of one entity's day. An empty table means "no classes". */
export type ScheduleTable = ScheduleEntry[];

/** A row whose cells have not been checked yet (e.g. straight out of jsonb). */
export type ScheduleEntryLike = { [K in keyof ScheduleEntry]: unknown };

export type ContentDigest = string;

export type EntityKind = "group" | "mentor";

export interface EntityRef {
  kind: EntityKind;
  key: string;
}

export type ThemeName = "Classic" | "MidNight" | "Night" | "LightFog" | "Fog" | "DarkFog" | "MtecCore";

export type Recipient =
  | { kind: "individual"; id: number; theme: ThemeName }
  | { kind: "chat"; id: number };

export interface MentorSubscription {
  mentorName: string;
  recipient: Recipient;
}

export interface ChatSubscription {
  chatId: number;
  group: string | null;
  mentor: string | null;
  sendChanges: boolean;
}

export type UpsertOutcome = "created" | "unchanged" | "changed";

export interface RenderedSchedule {
  bytes: Uint8Array;
  mimeType: string;
  filename: string;
}

export interface RenderRequest {
  entity: EntityRef;
  date: ScheduleDate;
  table: ScheduleTable;
  theme: ThemeName;
}

export interface DeliveryReport {
  delivered: number;
  failed: Recipient[];
}

export type Result<T, E extends Error = Error> = { ok: true; value: T } | { ok: false; error: E };

// --- Collaborator contracts ---
export interface ScheduleSource {
  listAvailableDates(signal?: AbortSignal): Promise<ScheduleDate[]>;
  fetchTable(entity: EntityRef, date: ScheduleDate, signal?: AbortSignal): Promise<ScheduleTable>;
  listKnownGroups(signal?: AbortSignal): Promise<string[]>;
  listKnownMentors(signal?: AbortSignal): Promise<string[]>;
}

export interface ScheduleArchiveStore {
  upsert(entityKey: string, date: ScheduleDate, table: ScheduleTable, digest: ContentDigest): Promise<UpsertOutcome>;
  get(entityKey: string, date: ScheduleDate): Promise<ScheduleTable | undefined>;
  purgeBefore(date: ScheduleDate): Promise<number>;
  announcedDates(): Promise<ScheduleDate[]>;
  markAnnounced(dates: readonly ScheduleDate[]): Promise<void>;
  markCompleted(dates: readonly ScheduleDate[]): Promise<void>;
  pendingBroadcasts(): Promise<ScheduleDate[]>;
}

export interface SubscriberDirectory {
  listSubscribedGroups(): Promise<string[]>;
  recipientsForGroup(group: string): Promise<Recipient[]>;
  listMentorSubscriptions(): Promise<MentorSubscription[]>;
  listChatSubscriptions(): Promise<ChatSubscription[]>;
}

export interface ScheduleRenderer {
  render(request: RenderRequest): Promise<RenderedSchedule>;
}

export interface SendOptions {
  caption?: string;
  silent?: boolean;
  /** Cancels the request; the send then rejects with an AbortError. */
  signal?: AbortSignal;
}

export interface Messenger {
  sendMessage(chatId: number, text: string, options?: SendOptions): Promise<void>;
  sendFile(chatId: number, file: RenderedSchedule, options?: SendOptions): Promise<void>;
}
