// src/utils/misc.ts

export type LogLevel = "INFO" | "WARN" | "ERROR" | "CRITICAL";

function serialize(data: unknown): string {
  if (data instanceof Error) {
    return JSON.stringify({ name: data.name, message: data.message }, null, 2);
  }
  try {
    return JSON.stringify(
      data,
      (_key, value: unknown) => (value instanceof Error ? { name: value.name, message: value.message } : value),
      2,
    );
  } catch {
    return String(data);
  }
}

/**
 * A standardized logger for consistent console output.
 * @param level - The log level (e.g., INFO, WARN, ERROR, CRITICAL).
 * @param message - The main log message.
 * @param data - Optional data to log as a JSON string.
 */
export function log(level: LogLevel, message: string, data?: unknown): void {
  const timestamp = new Date().toISOString();
  const logMessage = `[${timestamp}] [${level}] ${message}`;

  if (data !== undefined) {
    console.log(logMessage, serialize(data));
  } else {
    console.log(logMessage);
  }

  if ((level === "ERROR" || level === "CRITICAL") && data instanceof Error) {
    console.error(data.stack);
  }
}

export class AbortedError extends Error {
  override name = "AbortError";

  constructor() {
    super("The operation was aborted");
  }
}

/**
 * Waits for `ms` milliseconds. Rejects with an AbortedError as soon as the signal fires,
 * so a cancelled poller never sits out a full night sleep.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) return Promise.reject(new AbortedError());
  return new Promise((resolve, reject) => {
    const onAbort = () => {
      clearTimeout(timer);
      reject(new AbortedError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, Math.max(0, ms));
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

export function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === "AbortError";
}

export function chunk<T>(items: readonly T[], size: number): T[][] {
  if (!Number.isInteger(size) || size < 1) {
    throw new TypeError(`Chunk size must be a positive integer, got ${size}`);
  }
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size));
  }
  return chunks;
}

// Legacy Markdown only treats these four as markup.
export function escapeMarkdown(text: string): string {
  return text.replace(/([_*`[])/g, "\\$1");
}

/**
 * Formats a duration in milliseconds as "3m 12.40s".
 */
export function formatElapsed(ms: number): string {
  const totalSeconds = Math.max(0, ms) / 1000;
  const minutes = Math.floor(totalSeconds / 60);
  const seconds = totalSeconds - minutes * 60;
  return `${minutes}m ${seconds.toFixed(2)}s`;
}
