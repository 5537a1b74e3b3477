// src/college/parser.ts
import { load as loadCheerio } from "cheerio";
import { SourceUnavailableError } from "../errors.ts";
import { ScheduleDate, uniqueSortedDates } from "../utils/date.ts";
import type { EntityKind, ScheduleTable } from "../types.ts";

const DATE_PATTERN = /> *(\d{1,2}\.\d{1,2}\.\d{4}) *</g;
const GROUP_PATTERN = /[A-ZА-ЯЁ]+\d{1,3}/g;
const MENTOR_NAME = /^[А-Яа-яЁё\s.-]+$/;

// The table opens with three header cells: pair, subject, room.
const HEADER_CELLS = 3;
const CELLS_PER_ROW: Record<EntityKind, number> = { group: 4, mentor: 5 };

function unique(values: Iterable<string>): string[] {
  return [...new Set(values)];
}

/** Dates listed by the search-parameters page, deduplicated and in calendar order. */
export function parseDates(html: string): ScheduleDate[] {
  const dates: ScheduleDate[] = [];
  for (const match of html.matchAll(DATE_PATTERN)) {
    const date = ScheduleDate.parse(match[1] ?? "");
    if (date) dates.push(date);
  }
  return uniqueSortedDates(dates);
}

export function parseGroups(html: string): string[] {
  return unique(html.match(GROUP_PATTERN) ?? []).filter(group => group.length >= 2);
}

export function parseMentors(html: string): string[] {
  const $ = loadCheerio(html);
  const names: string[] = [];
  $("[value]").each((_, el) => {
    const name = ($(el).attr("value") ?? "").replace(/\s+/g, " ").trim();
    if (name.length >= 3 && MENTOR_NAME.test(name)) names.push(name);
  });
  return unique(names);
}

function cellText(html: string): string {
  return html
    .split("\n")
    .map(line => line.trim())
    .filter(line => line !== "")
    .join("\n");
}

/**
 * Turns the `sendSchedule` HTML into period-ordered rows.
 *
 * Group pages carry 4 cells per period (pair, subject, detail, room), mentor pages 5
 * (pair, subject, group, -, room). Only a table whose header is present and whose body
 * is empty counts as "no classes"; anything without the header throws SourceUnavailableError.
 */
export function parseScheduleTable(html: string, kind: EntityKind): ScheduleTable {
  const $ = loadCheerio(html);
  const cells: string[] = [];
  $("table td").each((_, td) => {
    const cell = $(td);
    cell.find("br").replaceWith("\n");
    cells.push(cellText(cell.text()));
  });
  if (cells.length < HEADER_CELLS) {
    throw new SourceUnavailableError(`Response is not a schedule page (${cells.length} table cells)`);
  }

  const step = CELLS_PER_ROW[kind];
  const body = cells.slice(HEADER_CELLS);
  const table: ScheduleTable = [];
  for (let i = 0; i + step - 1 < body.length; i += step) {
    const row = body.slice(i, i + step);
    table.push({
      slot: `${row[0]}\nпара`,
      subject: cellText(`${row[1]}\n${row[2]}`),
      room: row[step - 1] ?? "",
    });
  }
  return table;
}
