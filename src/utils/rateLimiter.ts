// src/utils/rateLimiter.ts
import { sleep } from "./misc.ts";

/**
 * Sliding-window limiter: at most `permits` acquisitions inside any `windowMs` span.
 *
 * The check-and-record in `tryAcquire` runs without an await in between, so concurrent
 * callers on the event loop can never both take the last permit. Callers only hold a
 * permit for the instant of acquisition; nothing is released.
 */
export class RateLimiter {
  private readonly stamps: number[] = [];

  constructor(
    readonly permits: number,
    readonly windowMs: number,
    private readonly now: () => number = () => Date.now(),
  ) {
    if (!Number.isInteger(permits) || permits < 1) {
      throw new TypeError(`permits must be a positive integer, got ${permits}`);
    }
    if (!(windowMs > 0)) {
      throw new TypeError(`windowMs must be positive, got ${windowMs}`);
    }
  }

  /**
   * Takes a permit if one is free. Otherwise returns how long to wait before the
   * oldest permit in the window expires.
   */
  tryAcquire(): { acquired: true } | { acquired: false; waitMs: number } {
    const now = this.now();
    while (this.stamps.length > 0 && this.stamps[0] <= now - this.windowMs) {
      this.stamps.shift();
    }
    if (this.stamps.length < this.permits) {
      this.stamps.push(now);
      return { acquired: true };
    }
    return { acquired: false, waitMs: this.stamps[0] + this.windowMs - now };
  }

  async acquire(signal?: AbortSignal): Promise<void> {
    for (;;) {
      const attempt = this.tryAcquire();
      if (attempt.acquired) return;
      await sleep(attempt.waitMs, signal);
    }
  }
}
