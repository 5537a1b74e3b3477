// src/utils/hash.ts
import { createHash } from "node:crypto";
import { decodeHTML } from "entities";
import { NormalizationError } from "../errors.ts";
import type { ContentDigest, ScheduleEntryLike } from "../types.ts";

// Control characters are turned into spaces during normalization, so the unit separator
// never occurs inside a normalized cell.
const SEPARATOR = "\u001f";
const ZERO_WIDTH = /[\u200B-\u200F\uFEFF]/g;
const COMBINING_MARKS = /\p{M}/gu;
const CONTROL = /[\u0000-\u001F\u007F]/g;
const WHITESPACE = /\s+/g;
// Full case folds that toLowerCase leaves alone.
const CASE_FOLDS: [RegExp, string][] = [
  [/ß/g, "ss"],
  [/ς/g, "σ"],
];
const LONE_SURROGATE = /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/;

export interface HashOptions {
  removeAccents?: boolean;
}

/**
 * Normalizes a single cell so that formatting jitter upstream does not read as a change.
 * Throws a plain Error for values that cannot be represented as UTF-8.
 */
export function normalizeCell(value: unknown, removeAccents = true): string {
  let text = value === null || value === undefined ? "" : String(value);
  text = decodeHTML(text);
  if (LONE_SURROGATE.test(text)) {
    throw new Error(`Ill-formed UTF-16 in "${text.replace(LONE_SURROGATE, "\uFFFD")}"`);
  }
  text = text.normalize("NFKC").replace(ZERO_WIDTH, "");
  if (removeAccents) {
    text = text.normalize("NFD").replace(COMBINING_MARKS, "").normalize("NFC");
  }
  return casefold(text).replace(CONTROL, " ").replace(WHITESPACE, " ").trim();
}

export function casefold(text: string): string {
  return CASE_FOLDS.reduce((folded, [pattern, replacement]) => folded.replace(pattern, replacement), text.toLowerCase());
}

/**
 * SHA-256 over the normalized slot/subject/room of every row, in order.
 * An empty table hashes to the digest of the empty string.
 */
export function hashTable(table: readonly ScheduleEntryLike[], options: HashOptions = {}): ContentDigest {
  const removeAccents = options.removeAccents ?? true;
  const rows = table.map((entry, rowIndex) => {
    try {
      return [entry.slot, entry.subject, entry.room].map(cell => normalizeCell(cell, removeAccents)).join(SEPARATOR);
    } catch (e) {
      throw new NormalizationError(rowIndex, e instanceof Error ? e.message : String(e));
    }
  });
  return createHash("sha256").update(rows.join(SEPARATOR), "utf8").digest("hex");
}
