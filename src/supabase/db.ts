// src/supabase/db.ts
import { createClient, type SupabaseClient } from "@supabase/supabase-js";
import { z } from "zod";
import { DEFAULT_THEME, THEME_NAMES } from "../config.ts";
import { StorageError } from "../errors.ts";
import { ScheduleDate } from "../utils/date.ts";
import { log } from "../utils/misc.ts";
import type {
  ChatSubscription,
  ContentDigest,
  MentorSubscription,
  Recipient,
  ScheduleArchiveStore,
  ScheduleTable,
  SubscriberDirectory,
  UpsertOutcome,
} from "../types.ts";

const PAGE_SIZE = 1000;

export function createSupabase(url: string, key: string, fetchImpl?: typeof fetch): SupabaseClient {
  return createClient(url, key, {
    auth: { persistSession: false, autoRefreshToken: false, detectSessionInUrl: false },
    ...(fetchImpl ? { global: { fetch: fetchImpl } } : {}),
  });
}

// --- Row schemas ---
const EntriesSchema = z.array(z.object({ slot: z.string(), subject: z.string(), room: z.string() }));

const IsoDateSchema = z.string().transform((value, ctx) => {
  const date = ScheduleDate.fromISO(value);
  if (!date) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid date "${value}"` });
    return z.NEVER;
  }
  return date;
});

const ThemeSchema = z
  .string()
  .nullable()
  .transform(value => THEME_NAMES.find(name => name === value) ?? DEFAULT_THEME);

const DigestRowSchema = z.object({ digest: z.string() });
const EntriesRowSchema = z.object({ entries: EntriesSchema });
const LedgerRowSchema = z.object({ schedule_date: IsoDateSchema });
const GroupRowSchema = z.object({ student_group: z.string().nullable() });
const StudentRowSchema = z.object({ user_id: z.number(), user_theme: ThemeSchema });
const MentorRowSchema = z.object({ user_id: z.number(), mentor_name: z.string().nullable(), user_theme: ThemeSchema });
const ChatRowSchema = z.object({
  chat_id: z.number(),
  subscribed_to_group: z.string().nullable(),
  subscribed_to_mentor: z.string().nullable(),
  send_changes: z.boolean().nullable(),
});

interface QueryResult {
  data: unknown[] | null;
  error: { message: string } | null;
}

function storageError(action: string, cause: { message: string }): StorageError {
  return new StorageError(`${action}: ${cause.message}`, { cause });
}

function parseRows<S extends z.ZodTypeAny>(schema: S, rows: unknown[] | null, action: string): z.output<S>[] {
  const parsed = z.array(schema).safeParse(rows ?? []);
  if (!parsed.success) {
    throw storageError(`${action} returned malformed rows`, parsed.error);
  }
  return parsed.data;
}

/** Reads every page of a query; `page(from, to)` must apply `.range(from, to)`. */
async function selectAll<S extends z.ZodTypeAny>(
  action: string,
  schema: S,
  page: (from: number, to: number) => PromiseLike<QueryResult>,
): Promise<z.output<S>[]> {
  const rows: z.output<S>[] = [];
  for (let from = 0; ; from += PAGE_SIZE) {
    const { data, error } = await page(from, from + PAGE_SIZE - 1);
    if (error) throw storageError(action, error);
    const batch = parseRows(schema, data, action);
    rows.push(...batch);
    if (batch.length < PAGE_SIZE) return rows;
  }
}

// --- Archive & announced-date ledger ---
export class SupabaseArchiveStore implements ScheduleArchiveStore {
  constructor(private readonly db: SupabaseClient) {}

  async upsert(entityKey: string, date: ScheduleDate, table: ScheduleTable, digest: ContentDigest): Promise<UpsertOutcome> {
    const { data, error } = await this.db
      .from("schedule_archive")
      .select("digest")
      .eq("entity_key", entityKey)
      .eq("schedule_date", date.key)
      .limit(1);
    if (error) throw storageError(`Reading archive digest for ${entityKey} on ${date}`, error);
    const previous = parseRows(DigestRowSchema, data, "Reading archive digest")[0]?.digest;

    const { error: writeError } = await this.db.from("schedule_archive").upsert(
      {
        entity_key: entityKey,
        schedule_date: date.key,
        entries: table,
        digest,
        updated_at: new Date().toISOString(),
      },
      { onConflict: "entity_key,schedule_date" },
    );
    if (writeError) throw storageError(`Archiving ${entityKey} on ${date}`, writeError);

    if (previous === undefined) return "created";
    return previous === digest ? "unchanged" : "changed";
  }

  async get(entityKey: string, date: ScheduleDate): Promise<ScheduleTable | undefined> {
    const { data, error } = await this.db
      .from("schedule_archive")
      .select("entries")
      .eq("entity_key", entityKey)
      .eq("schedule_date", date.key)
      .limit(1);
    if (error) throw storageError(`Reading archive for ${entityKey} on ${date}`, error);
    return parseRows(EntriesRowSchema, data, "Reading archive")[0]?.entries;
  }

  /** Drops archive records and ledger entries dated strictly before `date`; returns the archive count. */
  async purgeBefore(date: ScheduleDate): Promise<number> {
    const { error, count } = await this.db.from("schedule_archive").delete({ count: "exact" }).lt("schedule_date", date.key);
    if (error) throw storageError("Purging archive", error);

    const { error: ledgerError, count: ledgerCount } = await this.db
      .from("announced_dates")
      .delete({ count: "exact" })
      .lt("schedule_date", date.key);
    if (ledgerError) throw storageError("Purging announced dates", ledgerError);

    log("INFO", `[Archive] Purged ${count ?? 0} records and ${ledgerCount ?? 0} ledger entries before ${date}`);
    return count ?? 0;
  }

  async announcedDates(): Promise<ScheduleDate[]> {
    const rows = await selectAll("Reading announced dates", LedgerRowSchema, (from, to) =>
      this.db.from("announced_dates").select("schedule_date").order("schedule_date").range(from, to),
    );
    return rows.map(row => row.schedule_date);
  }

  /** Records dates as `started`. Dates already in the ledger keep their status. */
  async markAnnounced(dates: readonly ScheduleDate[]): Promise<void> {
    if (dates.length === 0) return;
    const startedAt = new Date().toISOString();
    const { error } = await this.db.from("announced_dates").upsert(
      dates.map(date => ({ schedule_date: date.key, status: "started", started_at: startedAt })),
      { onConflict: "schedule_date", ignoreDuplicates: true },
    );
    if (error) throw storageError("Marking dates announced", error);
  }

  async markCompleted(dates: readonly ScheduleDate[]): Promise<void> {
    if (dates.length === 0) return;
    const completedAt = new Date().toISOString();
    const { error } = await this.db.from("announced_dates").upsert(
      dates.map(date => ({ schedule_date: date.key, status: "completed", completed_at: completedAt })),
      { onConflict: "schedule_date" },
    );
    if (error) throw storageError("Marking broadcasts completed", error);
  }

  async pendingBroadcasts(): Promise<ScheduleDate[]> {
    const rows = await selectAll("Reading pending broadcasts", LedgerRowSchema, (from, to) =>
      this.db.from("announced_dates").select("schedule_date").eq("status", "started").order("schedule_date").range(from, to),
    );
    return rows.map(row => row.schedule_date);
  }
}

// --- Subscribers ---
export class SupabaseSubscriberDirectory implements SubscriberDirectory {
  constructor(private readonly db: SupabaseClient) {}

  async listSubscribedGroups(): Promise<string[]> {
    const rows = await selectAll("Reading subscribed groups", GroupRowSchema, (from, to) =>
      this.db
        .from("users")
        .select("student_group")
        .eq("user_status", "student")
        .eq("schedule_muted", false)
        .order("user_id")
        .range(from, to),
    );
    const groups = new Set<string>();
    for (const row of rows) if (row.student_group) groups.add(row.student_group);
    return [...groups].sort();
  }

  async recipientsForGroup(group: string): Promise<Recipient[]> {
    const rows = await selectAll(`Reading recipients of ${group}`, StudentRowSchema, (from, to) =>
      this.db
        .from("users")
        .select("user_id, user_theme")
        .eq("user_status", "student")
        .eq("student_group", group)
        .eq("schedule_muted", false)
        .order("user_id")
        .range(from, to),
    );
    return rows.map(row => ({ kind: "individual" as const, id: row.user_id, theme: row.user_theme }));
  }

  async listMentorSubscriptions(): Promise<MentorSubscription[]> {
    const rows = await selectAll("Reading mentor subscriptions", MentorRowSchema, (from, to) =>
      this.db
        .from("users")
        .select("user_id, mentor_name, user_theme")
        .eq("user_status", "mentor")
        .eq("schedule_muted", false)
        .order("user_id")
        .range(from, to),
    );
    return rows.flatMap(row =>
      row.mentor_name
        ? [{ mentorName: row.mentor_name, recipient: { kind: "individual" as const, id: row.user_id, theme: row.user_theme } }]
        : [],
    );
  }

  async listChatSubscriptions(): Promise<ChatSubscription[]> {
    const rows = await selectAll("Reading chat subscriptions", ChatRowSchema, (from, to) =>
      this.db
        .from("chats")
        .select("chat_id, subscribed_to_group, subscribed_to_mentor, send_changes")
        .order("chat_id")
        .range(from, to),
    );
    return rows
      .filter(row => row.subscribed_to_group !== null || row.subscribed_to_mentor !== null)
      .map(row => ({
        chatId: row.chat_id,
        group: row.subscribed_to_group,
        mentor: row.subscribed_to_mentor,
        sendChanges: row.send_changes ?? true,
      }));
  }
}
