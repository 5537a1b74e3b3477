// src/college/source.ts
import { SOURCE_MAX_ATTEMPTS, SOURCE_REFERER, SOURCE_RETRY_DELAY_MS, SOURCE_TIMEOUT_MS, SOURCE_URL } from "../config.ts";
import { SourceUnavailableError, errorMessage } from "../errors.ts";
import { ScheduleDate, uniqueSortedDates } from "../utils/date.ts";
import { AbortedError, isAbortError, log } from "../utils/misc.ts";
import { retry } from "../utils/retry.ts";
import { parseDates, parseGroups, parseMentors, parseScheduleTable } from "./parser.ts";
import type { EntityKind, EntityRef, ScheduleSource, ScheduleTable } from "../types.ts";

type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

const RTYPE: Record<EntityKind, string> = { group: "stds", mentor: "prep" };

const HEADERS = {
  "Content-Type": "application/x-www-form-urlencoded; charset=UTF-8",
  Accept: "*/*",
  Origin: "https://mtec.by",
  Referer: SOURCE_REFERER,
  "X-Requested-With": "XMLHttpRequest",
};

export interface CollegeSourceOptions {
  url?: string;
  fetch?: FetchLike;
  timeoutMs?: number;
  attempts?: number;
  retryDelayMs?: number;
  today?: () => ScheduleDate;
  /** How long one search-parameters page serves both the date and the group list. */
  searchPageTtlMs?: number;
}

const SEARCH_PAGE_TTL_MS = 60 * 1000;

/** The college's `admin-ajax.php` endpoint. */
export class CollegeScheduleSource implements ScheduleSource {
  private readonly url: string;
  private readonly fetchImpl: FetchLike;
  private readonly timeoutMs: number;
  private readonly attempts: number;
  private readonly retryDelayMs: number;
  private readonly today: () => ScheduleDate;
  private readonly searchPageTtlMs: number;
  private searchPage: { html: string; fetchedAt: number } | null = null;

  constructor(options: CollegeSourceOptions = {}) {
    this.url = options.url ?? SOURCE_URL;
    this.fetchImpl = options.fetch ?? fetch;
    this.timeoutMs = options.timeoutMs ?? SOURCE_TIMEOUT_MS;
    this.attempts = options.attempts ?? SOURCE_MAX_ATTEMPTS;
    this.retryDelayMs = options.retryDelayMs ?? SOURCE_RETRY_DELAY_MS;
    this.today = options.today ?? (() => ScheduleDate.today());
    this.searchPageTtlMs = options.searchPageTtlMs ?? SEARCH_PAGE_TTL_MS;
  }

  /**
   * Published dates plus today (unless it is the day off), without anything in the past.
   */
  async listAvailableDates(signal?: AbortSignal): Promise<ScheduleDate[]> {
    const html = await this.groupSearchPage(signal);
    const today = this.today();
    const dates = parseDates(html);
    if (!today.isDayOff()) dates.push(today);
    return uniqueSortedDates(dates).filter(date => !date.isBefore(today));
  }

  async fetchTable(entity: EntityRef, date: ScheduleDate, signal?: AbortSignal): Promise<ScheduleTable> {
    return this.post(
      { action: "sendSchedule", date: date.toString(), value: entity.key, rtype: RTYPE[entity.kind] },
      html => parseScheduleTable(html, entity.kind),
      signal,
    );
  }

  async listKnownGroups(signal?: AbortSignal): Promise<string[]> {
    return parseGroups(await this.groupSearchPage(signal));
  }

  async listKnownMentors(signal?: AbortSignal): Promise<string[]> {
    return this.post({ action: "getSearchParameters", rtype: RTYPE.mentor }, parseMentors, signal);
  }

  // Dates and groups come from the same page; one poll cycle fetches it once.
  private async groupSearchPage(signal?: AbortSignal): Promise<string> {
    const cached = this.searchPage;
    if (cached && Date.now() - cached.fetchedAt < this.searchPageTtlMs) {
      return cached.html;
    }
    const html = await this.post({ action: "getSearchParameters", rtype: RTYPE.group }, page => page, signal);
    this.searchPage = { html, fetchedAt: Date.now() };
    return html;
  }

  /** Posts the form and parses the body; a parse failure is retried like a transport failure. */
  private async post<T>(form: Record<string, string>, parse: (html: string) => T, signal?: AbortSignal): Promise<T> {
    try {
      return await retry(
        async () => {
          const timeout = AbortSignal.timeout(this.timeoutMs);
          const response = await this.fetchImpl(this.url, {
            method: "POST",
            headers: HEADERS,
            body: new URLSearchParams(form).toString(),
            signal: signal ? AbortSignal.any([signal, timeout]) : timeout,
          });
          if (!response.ok) {
            throw new SourceUnavailableError(`HTTP ${response.status} from schedule endpoint`);
          }
          return parse(await response.text());
        },
        {
          attempts: this.attempts,
          delayMs: this.retryDelayMs,
          onRetry: (error, attempt) => log("WARN", `[Source] ${form.action} attempt ${attempt} failed`, error),
          signal,
        },
      );
    } catch (error) {
      if (signal?.aborted) throw isAbortError(error) ? error : new AbortedError();
      throw new SourceUnavailableError(`Schedule endpoint unavailable (${form.action}): ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }
}
