// src/pdf/font.ts
import { log } from "../utils/misc.ts";

type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

const fontCache = new Map<string, ArrayBuffer>();

/**
 * Fetches a TTF font with Cyrillic glyphs and caches it in memory.
 * The built-in PDF fonts cannot draw Cyrillic, so sheets come out unreadable without it.
 * @returns The font data, or null on failure.
 */
export async function getScheduleFont(url: string, fetchImpl: FetchLike = fetch): Promise<ArrayBuffer | null> {
  const cached = fontCache.get(url);
  if (cached) {
    return cached;
  }
  try {
    log("INFO", "[PDF] Fetching schedule font...");
    const response = await fetchImpl(url);
    if (!response.ok) {
      throw new Error(`Failed to fetch font (${response.status}): ${await response.text()}`);
    }
    const buffer = await response.arrayBuffer();
    if (buffer.byteLength === 0) {
      throw new Error("Received empty font data.");
    }
    fontCache.set(url, buffer);
    log("INFO", `[PDF] Schedule font fetched and cached successfully (${(buffer.byteLength / 1024).toFixed(1)} KB)`);
    return buffer;
  } catch (e) {
    log("CRITICAL", "[PDF] Could not fetch schedule font. Sheets will fall back to a Latin-only font.", e);
    return null;
  }
}
