// src/schedule/checker.ts
import type { DateTime } from "luxon";
import { LOOP_ERROR_PAUSE_MS, SLEEP_DAY_MS, SLEEP_NIGHT_MS } from "../config.ts";
import { SourceUnavailableError, StorageError, errorMessage } from "../errors.ts";
import { broadcastReportText, type BroadcastSummary } from "../telegram/phrases.ts";
import { ScheduleDate, collegeNow, isNightHour, subtractDates, uniqueSortedDates } from "../utils/date.ts";
import { hashTable } from "../utils/hash.ts";
import { AbortedError, isAbortError, log, sleep } from "../utils/misc.ts";
import {
  addTally,
  deliverDate,
  emptyTally,
  type DeliveryDependencies,
  type DeliveryOptions,
  type DeliveryTally,
} from "./delivery.ts";
import type { EntityRef, Messenger, Result, ScheduleSource, UpsertOutcome } from "../types.ts";

export type CheckerState = "NightPaused" | "Polling" | "Archiving" | "Broadcasting";

export interface CheckerDependencies extends DeliveryDependencies {
  source: ScheduleSource;
  messenger: Messenger;
  adminChatId: number;
}

export interface CheckerOptions {
  /** Re-send sheets whose content changed on an already announced date. */
  notifyChanges?: boolean;
  dayIntervalMs?: number;
  nightIntervalMs?: number;
  errorPauseMs?: number;
  now?: () => DateTime;
}

export interface ArchivedEntity {
  entity: EntityRef;
  date: ScheduleDate;
  result: Result<UpsertOutcome>;
}

export interface CycleResult {
  fetchedDates: ScheduleDate[];
  newDates: ScheduleDate[];
  changes: { entity: EntityRef; date: ScheduleDate }[];
  archived: ArchivedEntity[];
}

function entityDateKey(entity: EntityRef, date: ScheduleDate): string {
  return `${entity.kind}:${entity.key}:${date.key}`;
}

const emptyCycle = (): CycleResult => ({ fetchedDates: [], newDates: [], changes: [], archived: [] });

/**
 * Polls the college endpoint, archives every table with its digest and
 * broadcasts each date the first time it shows up.
 */
export class ScheduleChecker {
  private currentState: CheckerState = "Polling";
  private readonly notifyChanges: boolean;
  private readonly dayIntervalMs: number;
  private readonly nightIntervalMs: number;
  private readonly errorPauseMs: number;
  private readonly now: () => DateTime;

  constructor(private readonly deps: CheckerDependencies, options: CheckerOptions = {}) {
    this.notifyChanges = options.notifyChanges ?? true;
    this.dayIntervalMs = options.dayIntervalMs ?? SLEEP_DAY_MS;
    this.nightIntervalMs = options.nightIntervalMs ?? SLEEP_NIGHT_MS;
    this.errorPauseMs = options.errorPauseMs ?? LOOP_ERROR_PAUSE_MS;
    this.now = options.now ?? collegeNow;
  }

  get state(): CheckerState {
    return this.currentState;
  }

  /** Runs until the signal aborts. Resolves once the loop has stopped. */
  async run(signal: AbortSignal): Promise<void> {
    log("INFO", "[Checker] Schedule checker started");
    try {
      await this.resumePending(signal);
    } catch (error) {
      if (!isAbortError(error)) log("ERROR", "[Checker] Resuming pending broadcasts failed", error);
    }

    while (!signal.aborted) {
      let pauseMs: number;
      try {
        pauseMs = await this.tick(signal);
      } catch (error) {
        if (isAbortError(error)) break;
        log("ERROR", `[Checker] Cycle failed during ${this.currentState}: ${errorMessage(error)}`, error);
        pauseMs = this.errorPauseMs;
      }
      await this.pause(pauseMs, signal);
    }
    log("INFO", "[Checker] Schedule checker stopped");
  }

  /** One pass of the loop. Returns how long to sleep before the next one. */
  async tick(signal?: AbortSignal): Promise<number> {
    if (isNightHour(this.now())) {
      this.currentState = "NightPaused";
      try {
        const removed = await this.deps.store.purgeBefore(this.today());
        log("INFO", `[Checker] Night pause, purged ${removed} outdated archive rows`);
      } catch (error) {
        if (!(error instanceof StorageError)) throw error;
        log("ERROR", `[Checker] Night purge failed, retrying next hour: ${error.message}`);
      }
      return this.nightIntervalMs;
    }
    await this.pollOnce(signal);
    return this.dayIntervalMs;
  }

  async pollOnce(signal?: AbortSignal): Promise<CycleResult> {
    this.currentState = "Polling";
    const { source, store } = this.deps;

    let fetchedDates: ScheduleDate[];
    let entities: EntityRef[];
    try {
      fetchedDates = uniqueSortedDates(await source.listAvailableDates(signal));
      if (fetchedDates.length === 0) {
        log("INFO", "[Checker] No schedule dates published");
        return emptyCycle();
      }
      const [groups, mentors] = await Promise.all([source.listKnownGroups(signal), source.listKnownMentors(signal)]);
      entities = [
        ...groups.map((key): EntityRef => ({ kind: "group", key })),
        ...mentors.map((key): EntityRef => ({ kind: "mentor", key })),
      ];
    } catch (error) {
      if (error instanceof SourceUnavailableError) {
        log("WARN", `[Checker] Schedule source unavailable, skipping this cycle: ${error.message}`);
        return emptyCycle();
      }
      throw error;
    }

    const announced = await store.announcedDates();
    const announcedKeys = new Set(announced.map(date => date.key));

    this.currentState = "Archiving";
    const archived = await this.archive(fetchedDates, entities, signal);
    if (signal?.aborted) throw new AbortedError();

    const failedFetches = new Set<string>();
    const storageFailedDates = new Set<string>();
    const changes: CycleResult["changes"] = [];
    for (const { entity, date, result } of archived) {
      if (!result.ok) {
        if (result.error instanceof StorageError) storageFailedDates.add(date.key);
        else failedFetches.add(entityDateKey(entity, date));
      } else if (result.value === "changed" && announcedKeys.has(date.key)) {
        changes.push({ entity, date });
      }
    }

    const newDates = subtractDates(fetchedDates, announced).filter(date => !storageFailedDates.has(date.key));
    for (const key of storageFailedDates) {
      log("WARN", `[Checker] Storage failed while archiving ${key}; it will not be announced this cycle`);
    }

    if (newDates.length > 0) {
      this.currentState = "Broadcasting";
      log("INFO", `[Checker] New schedule dates: ${newDates.join(", ")}`);
      await this.broadcast("new", newDates, signal, date => ({
        updated: false,
        skip: entity => failedFetches.has(entityDateKey(entity, date)),
      }));
    }

    if (this.notifyChanges && changes.length > 0) {
      this.currentState = "Broadcasting";
      await this.broadcastChanges(changes, signal);
    }

    return { fetchedDates, newDates, changes, archived };
  }

  /** Re-broadcasts dates whose delivery started but never completed. */
  async resumePending(signal?: AbortSignal): Promise<ScheduleDate[]> {
    const pending = uniqueSortedDates(await this.deps.store.pendingBroadcasts());
    if (pending.length === 0) return [];

    const today = this.today();
    const resumable = pending.filter(date => !date.isBefore(today));
    const stale = pending.filter(date => date.isBefore(today));
    if (stale.length > 0) {
      await this.deps.store.markCompleted(stale);
    }
    if (resumable.length === 0) return [];

    this.currentState = "Broadcasting";
    log("WARN", `[Checker] Resuming interrupted broadcast for ${resumable.join(", ")}`);
    await this.broadcast("resume", resumable, signal, () => ({ updated: false }));
    return resumable;
  }

  private async archive(dates: ScheduleDate[], entities: EntityRef[], signal?: AbortSignal): Promise<ArchivedEntity[]> {
    const archived: ArchivedEntity[] = [];
    for (const date of dates) {
      for (const entity of entities) {
        if (signal?.aborted) return archived;
        archived.push({ entity, date, result: await this.archiveOne(entity, date, signal) });
      }
    }
    const failed = archived.filter(item => !item.result.ok).length;
    log("INFO", `[Checker] Archived ${archived.length - failed} tables, ${failed} failed`);
    return archived;
  }

  private async archiveOne(entity: EntityRef, date: ScheduleDate, signal?: AbortSignal): Promise<Result<UpsertOutcome>> {
    try {
      const table = await this.deps.source.fetchTable(entity, date, signal);
      const outcome = await this.deps.store.upsert(entity.key, date, table, hashTable(table));
      return { ok: true, value: outcome };
    } catch (error) {
      if (isAbortError(error)) throw error;
      log("WARN", `[Checker] Could not archive ${entity.kind} ${entity.key} on ${date}: ${errorMessage(error)}`);
      return { ok: false, error: error instanceof Error ? error : new Error(String(error)) };
    }
  }

  private async broadcastChanges(changes: CycleResult["changes"], signal?: AbortSignal): Promise<void> {
    const byDate = new Map<string, { date: ScheduleDate; entities: Set<string> }>();
    for (const { entity, date } of changes) {
      const entry = byDate.get(date.key) ?? { date, entities: new Set<string>() };
      entry.entities.add(`${entity.kind}:${entity.key}`);
      byDate.set(date.key, entry);
    }
    const dates = uniqueSortedDates([...byDate.values()].map(entry => entry.date));
    log("INFO", `[Checker] Sending ${changes.length} changed schedules`);
    await this.broadcast("changes", dates, signal, date => {
      const changed = byDate.get(date.key)?.entities ?? new Set<string>();
      return {
        updated: true,
        include: entity => changed.has(`${entity.kind}:${entity.key}`),
        includeChat: chat => chat.sendChanges,
      };
    });
  }

  private async broadcast(
    reason: BroadcastSummary["reason"],
    dates: ScheduleDate[],
    signal: AbortSignal | undefined,
    optionsFor: (date: ScheduleDate) => Omit<DeliveryOptions, "signal">,
  ): Promise<DeliveryTally> {
    const { store } = this.deps;
    const started = Date.now();
    if (reason === "new") await store.markAnnounced(dates);

    const tally = emptyTally();
    for (const date of dates) {
      addTally(tally, await deliverDate(this.deps, date, { ...optionsFor(date), signal }));
    }
    // Interrupted: leave the dates "started" so the next run resumes them.
    if (signal?.aborted) return tally;

    if (reason !== "changes") await store.markCompleted(dates);
    const elapsedMs = Date.now() - started;
    log("INFO", `[Checker] Broadcast (${reason}) finished`, { ...tally, dates: dates.map(String), elapsedMs });
    await this.report({ reason, dates, ...tally, elapsedMs });
    return tally;
  }

  private async report(summary: BroadcastSummary): Promise<void> {
    try {
      await this.deps.messenger.sendMessage(this.deps.adminChatId, broadcastReportText(summary));
    } catch (error) {
      log("WARN", `[Checker] Could not send the broadcast report: ${errorMessage(error)}`);
    }
  }

  private async pause(ms: number, signal: AbortSignal): Promise<void> {
    try {
      await sleep(ms, signal);
    } catch (error) {
      if (!isAbortError(error)) throw error;
    }
  }

  private today(): ScheduleDate {
    return ScheduleDate.fromDateTime(this.now());
  }
}
