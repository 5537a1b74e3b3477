// src/utils/date.ts
import { DateTime } from "luxon";
import { COLLEGE_TIMEZONE, DAY_OFF_WEEKDAY, NIGHT_HOURS, RU_WEEKDAYS, SOURCE_DATE_FORMAT } from "../config.ts";

/**
 * A calendar day in the college's time zone.
 * The endpoint speaks `DD.MM.YYYY`; storage and set membership use the ISO `YYYY-MM-DD` key.
 */
export class ScheduleDate {
  private constructor(private readonly value: DateTime) {}

  /** Parses `DD.MM.YYYY` (leading zeros optional). Returns null for anything else. */
  static parse(text: string): ScheduleDate | null {
    const match = /^(\d{1,2})\.(\d{1,2})\.(\d{4})$/.exec(text.trim());
    if (!match) return null;
    const value = DateTime.fromObject(
      { day: Number(match[1]), month: Number(match[2]), year: Number(match[3]) },
      { zone: COLLEGE_TIMEZONE },
    );
    return value.isValid ? new ScheduleDate(value) : null;
  }

  static fromISO(iso: string): ScheduleDate | null {
    const value = DateTime.fromISO(iso, { zone: COLLEGE_TIMEZONE });
    return value.isValid ? new ScheduleDate(value.startOf("day")) : null;
  }

  static fromDateTime(value: DateTime): ScheduleDate {
    return new ScheduleDate(value.setZone(COLLEGE_TIMEZONE).startOf("day"));
  }

  static today(now: DateTime = DateTime.now()): ScheduleDate {
    return ScheduleDate.fromDateTime(now);
  }

  get key(): string {
    return this.value.toISODate() ?? "";
  }

  /** Luxon weekday: 1 = Monday … 7 = Sunday. */
  get weekday(): number {
    return this.value.weekday;
  }

  get weekdayName(): string {
    return RU_WEEKDAYS[this.value.weekday - 1] ?? "";
  }

  isDayOff(): boolean {
    return this.value.weekday === DAY_OFF_WEEKDAY;
  }

  compare(other: ScheduleDate): number {
    return this.key < other.key ? -1 : this.key > other.key ? 1 : 0;
  }

  equals(other: ScheduleDate): boolean {
    return this.key === other.key;
  }

  isBefore(other: ScheduleDate): boolean {
    return this.compare(other) < 0;
  }

  toString(): string {
    return this.value.toFormat(SOURCE_DATE_FORMAT);
  }
}

/** Dedupes by calendar day and sorts in calendar order. */
export function uniqueSortedDates(dates: Iterable<ScheduleDate>): ScheduleDate[] {
  const byKey = new Map<string, ScheduleDate>();
  for (const date of dates) byKey.set(date.key, date);
  return [...byKey.values()].sort((a, b) => a.compare(b));
}

/** Dates in `candidates` that do not appear in `known`, keeping calendar order. */
export function subtractDates(candidates: Iterable<ScheduleDate>, known: Iterable<ScheduleDate>): ScheduleDate[] {
  const knownKeys = new Set<string>();
  for (const date of known) knownKeys.add(date.key);
  return uniqueSortedDates(candidates).filter(date => !knownKeys.has(date.key));
}

export function collegeNow(): DateTime {
  return DateTime.now().setZone(COLLEGE_TIMEZONE);
}

export function isNightHour(now: DateTime): boolean {
  return NIGHT_HOURS.includes(now.setZone(COLLEGE_TIMEZONE).hour);
}
