// src/telegram/broadcast.ts
import {
  RATE_LIMIT_PERMITS,
  RATE_LIMIT_WINDOW_MS,
  RETRY_AFTER_JITTER_MS,
  RETRY_AFTER_MARGIN_MS,
  SEND_CHUNK_SIZE,
  SEND_MAX_ATTEMPTS,
} from "../config.ts";
import { RetryAfterError } from "../errors.ts";
import { AbortedError, chunk, isAbortError, log } from "../utils/misc.ts";
import { RateLimiter } from "../utils/rateLimiter.ts";
import { jitter, retry } from "../utils/retry.ts";
import { UPDATED_CAPTION } from "./phrases.ts";
import type { DeliveryReport, Messenger, Recipient, RenderedSchedule, SendOptions } from "../types.ts";

export interface BroadcasterOptions {
  limiter?: RateLimiter;
  chunkSize?: number;
  maxAttempts?: number;
  retryMarginMs?: number;
  jitterMs?: number;
  random?: () => number;
}

export interface TextBroadcastOptions {
  silent?: boolean | ((recipient: Recipient) => boolean);
  signal?: AbortSignal;
}

/**
 * Fans a message out to many recipients without tripping Telegram's flood control.
 *
 * Every attempt takes one permit from the shared limiter, which is the only thing that
 * paces delivery; chunking just bounds how many sends are in flight. Permits are never
 * held across a retry wait.
 */
export class Broadcaster {
  readonly limiter: RateLimiter;
  private readonly chunkSize: number;
  private readonly maxAttempts: number;
  private readonly retryMarginMs: number;
  private readonly jitterMs: number;
  private readonly random: () => number;

  constructor(private readonly messenger: Messenger, options: BroadcasterOptions = {}) {
    this.limiter = options.limiter ?? new RateLimiter(RATE_LIMIT_PERMITS, RATE_LIMIT_WINDOW_MS);
    this.chunkSize = options.chunkSize ?? SEND_CHUNK_SIZE;
    this.maxAttempts = options.maxAttempts ?? SEND_MAX_ATTEMPTS;
    this.retryMarginMs = options.retryMarginMs ?? RETRY_AFTER_MARGIN_MS;
    this.jitterMs = options.jitterMs ?? RETRY_AFTER_JITTER_MS;
    this.random = options.random ?? Math.random;
  }

  /**
   * Sends one rendered sheet to every recipient. With `updated` the sheet carries the
   * "schedule changed" caption and goes out silently.
   */
  sendImageToMany(
    recipients: readonly Recipient[],
    image: RenderedSchedule,
    updated: boolean,
    signal?: AbortSignal,
  ): Promise<DeliveryReport> {
    if (image.bytes.byteLength === 0) {
      throw new TypeError("Cannot broadcast an empty image");
    }
    const options: SendOptions = updated ? { caption: UPDATED_CAPTION, silent: true, signal } : { signal };
    return this.deliver(recipients, recipient => this.messenger.sendFile(recipient.id, image, options), signal);
  }

  sendTextToMany(
    recipients: readonly Recipient[],
    text: string | ((recipient: Recipient) => string),
    options: TextBroadcastOptions = {},
  ): Promise<DeliveryReport> {
    if (typeof text === "string" && text.trim() === "") {
      throw new TypeError("Cannot broadcast an empty message");
    }
    const { silent = false, signal } = options;
    return this.deliver(
      recipients,
      recipient =>
        this.messenger.sendMessage(recipient.id, typeof text === "string" ? text : text(recipient), {
          silent: typeof silent === "function" ? silent(recipient) : silent,
          signal,
        }),
      signal,
    );
  }

  private async deliver(
    recipients: readonly Recipient[],
    send: (recipient: Recipient) => Promise<void>,
    signal?: AbortSignal,
  ): Promise<DeliveryReport> {
    const report: DeliveryReport = { delivered: 0, failed: [] };

    for (const batch of chunk(recipients, this.chunkSize)) {
      if (signal?.aborted) throw new AbortedError();
      const outcomes = await Promise.all(batch.map(recipient => this.sendOne(recipient, send, signal)));
      outcomes.forEach((delivered, i) => {
        const recipient = batch[i];
        if (delivered) report.delivered++;
        else if (recipient) report.failed.push(recipient);
      });
    }

    if (report.failed.length > 0) {
      log("WARN", `[Broadcast] ${report.failed.length} of ${recipients.length} recipients were not reached`);
    }
    return report;
  }

  private async sendOne(
    recipient: Recipient,
    send: (recipient: Recipient) => Promise<void>,
    signal?: AbortSignal,
  ): Promise<boolean> {
    try {
      await retry(
        async () => {
          await this.limiter.acquire(signal);
          await send(recipient);
        },
        {
          attempts: this.maxAttempts,
          shouldRetry: error => error instanceof RetryAfterError,
          delayMs: error =>
            error instanceof RetryAfterError
              ? error.retryAfterSeconds * 1000 + this.retryMarginMs + jitter(this.jitterMs, this.random)
              : 0,
          onRetry: (error, attempt, delayMs) =>
            log("WARN", `[Broadcast] Flood control for ${recipient.kind} ${recipient.id}, attempt ${attempt}; waiting ${delayMs}ms`, error),
          signal,
        },
      );
      return true;
    } catch (error) {
      if (isAbortError(error)) throw error;
      log("WARN", `[Broadcast] Giving up on ${recipient.kind} ${recipient.id}`, error);
      return false;
    }
  }
}
