// src/utils/retry.ts
import { sleep } from "./misc.ts";

export interface RetryOptions {
  /** Total attempts, including the first one. */
  attempts: number;
  /** Delay before the next attempt, given the error that ended the previous one. */
  delayMs: number | ((error: unknown, attempt: number) => number);
  shouldRetry?: (error: unknown) => boolean;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
  signal?: AbortSignal;
}

/**
 * Runs `fn` until it resolves, the error is not retryable, or attempts run out.
 * The last error is rethrown unchanged.
 */
export async function retry<T>(fn: (attempt: number) => Promise<T>, options: RetryOptions): Promise<T> {
  if (!Number.isInteger(options.attempts) || options.attempts < 1) {
    throw new TypeError(`attempts must be a positive integer, got ${options.attempts}`);
  }
  const shouldRetry = options.shouldRetry ?? (() => true);

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      if (attempt >= options.attempts || !shouldRetry(error) || options.signal?.aborted) {
        throw error;
      }
      const delay = typeof options.delayMs === "function" ? options.delayMs(error, attempt) : options.delayMs;
      options.onRetry?.(error, attempt, delay);
      await sleep(delay, options.signal);
    }
  }
}

/** Uniform jitter in [0, maxMs), integer milliseconds. */
export function jitter(maxMs: number, random: () => number = Math.random): number {
  return Math.floor(random() * maxMs);
}
