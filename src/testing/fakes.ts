// src/testing/fakes.ts
// In-process stand-ins for the checker's collaborators.
import { StorageError } from "../errors.ts";
import { AbortedError } from "../utils/misc.ts";
import type { ScheduleDate } from "../utils/date.ts";
import type {
  ChatSubscription,
  ContentDigest,
  EntityRef,
  MentorSubscription,
  Messenger,
  Recipient,
  RenderRequest,
  RenderedSchedule,
  ScheduleArchiveStore,
  ScheduleRenderer,
  ScheduleSource,
  ScheduleTable,
  SendOptions,
  SubscriberDirectory,
  ThemeName,
  UpsertOutcome,
} from "../types.ts";

export interface SentItem {
  chatId: number;
  kind: "text" | "file";
  text?: string;
  file?: RenderedSchedule;
  options: Omit<SendOptions, "signal">;
  at: number;
}

/** Decides the fate of each attempt; return an error to make it fail. */
export type SendBehaviour = (chatId: number, attempt: number) => Error | undefined;

export class FakeMessenger implements Messenger {
  readonly sent: SentItem[] = [];
  private readonly attempts = new Map<number, number>();

  constructor(private readonly behaviour: SendBehaviour = () => undefined) {}

  async sendMessage(chatId: number, text: string, { signal, ...options }: SendOptions = {}): Promise<void> {
    this.attempt(chatId, signal);
    this.sent.push({ chatId, kind: "text", text, options, at: Date.now() });
  }

  async sendFile(chatId: number, file: RenderedSchedule, { signal, ...options }: SendOptions = {}): Promise<void> {
    this.attempt(chatId, signal);
    this.sent.push({ chatId, kind: "file", file, options, at: Date.now() });
  }

  attemptsFor(chatId: number): number {
    return this.attempts.get(chatId) ?? 0;
  }

  sentTo(chatId: number): SentItem[] {
    return this.sent.filter(item => item.chatId === chatId);
  }

  private attempt(chatId: number, signal?: AbortSignal): void {
    if (signal?.aborted) throw new AbortedError();
    const attempt = (this.attempts.get(chatId) ?? 0) + 1;
    this.attempts.set(chatId, attempt);
    const error = this.behaviour(chatId, attempt);
    if (error) throw error;
  }
}

function entityDateKey(entity: EntityRef, date: ScheduleDate): string {
  return `${entity.kind}:${entity.key}:${date.key}`;
}

export class InMemoryScheduleSource implements ScheduleSource {
  dates: ScheduleDate[] = [];
  groups: string[] = [];
  mentors: string[] = [];
  readonly fetches: string[] = [];
  private readonly tables = new Map<string, ScheduleTable | Error>();

  setTable(entity: EntityRef, date: ScheduleDate, table: ScheduleTable | Error): this {
    this.tables.set(entityDateKey(entity, date), table);
    return this;
  }

  async listAvailableDates(): Promise<ScheduleDate[]> {
    return [...this.dates];
  }

  async fetchTable(entity: EntityRef, date: ScheduleDate): Promise<ScheduleTable> {
    const key = entityDateKey(entity, date);
    this.fetches.push(key);
    const table = this.tables.get(key) ?? [];
    if (table instanceof Error) throw table;
    return table.map(entry => ({ ...entry }));
  }

  async listKnownGroups(): Promise<string[]> {
    return [...this.groups];
  }

  async listKnownMentors(): Promise<string[]> {
    return [...this.mentors];
  }
}

interface StoredRecord {
  table: ScheduleTable;
  digest: ContentDigest;
}

export class InMemoryArchiveStore implements ScheduleArchiveStore {
  readonly records = new Map<string, StoredRecord>();
  readonly ledger = new Map<string, { date: ScheduleDate; status: "started" | "completed" }>();
  /** Makes `upsert` throw a StorageError for matching keys. */
  failUpsert: (entityKey: string, date: ScheduleDate) => boolean = () => false;

  async upsert(entityKey: string, date: ScheduleDate, table: ScheduleTable, digest: ContentDigest): Promise<UpsertOutcome> {
    if (this.failUpsert(entityKey, date)) {
      throw new StorageError(`upsert failed for ${entityKey} on ${date}`);
    }
    const key = `${entityKey}:${date.key}`;
    const previous = this.records.get(key);
    this.records.set(key, { table: table.map(entry => ({ ...entry })), digest });
    if (!previous) return "created";
    return previous.digest === digest ? "unchanged" : "changed";
  }

  async get(entityKey: string, date: ScheduleDate): Promise<ScheduleTable | undefined> {
    return this.records.get(`${entityKey}:${date.key}`)?.table;
  }

  async purgeBefore(date: ScheduleDate): Promise<number> {
    let removed = 0;
    for (const key of [...this.records.keys()]) {
      const dateKey = key.slice(key.lastIndexOf(":") + 1);
      if (dateKey < date.key) {
        this.records.delete(key);
        removed++;
      }
    }
    for (const [key, entry] of [...this.ledger]) {
      if (entry.date.isBefore(date)) this.ledger.delete(key);
    }
    return removed;
  }

  async announcedDates(): Promise<ScheduleDate[]> {
    return [...this.ledger.values()].map(entry => entry.date);
  }

  async markAnnounced(dates: readonly ScheduleDate[]): Promise<void> {
    for (const date of dates) {
      if (!this.ledger.has(date.key)) this.ledger.set(date.key, { date, status: "started" });
    }
  }

  async markCompleted(dates: readonly ScheduleDate[]): Promise<void> {
    for (const date of dates) this.ledger.set(date.key, { date, status: "completed" });
  }

  async pendingBroadcasts(): Promise<ScheduleDate[]> {
    return [...this.ledger.values()].filter(entry => entry.status === "started").map(entry => entry.date);
  }

  announcedKeys(): string[] {
    return [...this.ledger.keys()].sort();
  }
}

export interface FakeUser {
  id: number;
  theme: ThemeName;
  group?: string;
  mentor?: string;
}

export class InMemorySubscriberDirectory implements SubscriberDirectory {
  constructor(
    public users: FakeUser[] = [],
    public chats: ChatSubscription[] = [],
  ) {}

  async listSubscribedGroups(): Promise<string[]> {
    const groups = new Set<string>();
    for (const user of this.users) if (user.group) groups.add(user.group);
    return [...groups].sort();
  }

  async recipientsForGroup(group: string): Promise<Recipient[]> {
    return this.users
      .filter(user => user.group === group)
      .map(user => ({ kind: "individual" as const, id: user.id, theme: user.theme }));
  }

  async listMentorSubscriptions(): Promise<MentorSubscription[]> {
    return this.users.flatMap(user =>
      user.mentor ? [{ mentorName: user.mentor, recipient: { kind: "individual" as const, id: user.id, theme: user.theme } }] : [],
    );
  }

  async listChatSubscriptions(): Promise<ChatSubscription[]> {
    return [...this.chats];
  }
}

export class FakeRenderer implements ScheduleRenderer {
  readonly requests: RenderRequest[] = [];
  failFor: (request: RenderRequest) => boolean = () => false;

  async render(request: RenderRequest): Promise<RenderedSchedule> {
    this.requests.push(request);
    if (this.failFor(request)) {
      throw new Error(`render failed for ${request.entity.key}`);
    }
    const label = `${request.entity.key}|${request.date.key}|${request.theme}`;
    return {
      bytes: new TextEncoder().encode(label),
      mimeType: "application/pdf",
      filename: `${request.entity.key}_${request.date.key}.pdf`,
    };
  }

  labels(): string[] {
    return this.requests.map(r => `${r.entity.key}|${r.date.key}|${r.theme}`);
  }
}
