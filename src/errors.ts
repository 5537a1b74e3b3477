// src/errors.ts

/** The schedule endpoint could not be reached or returned something unusable. */
export class SourceUnavailableError extends Error {
  override name = "SourceUnavailableError";

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

/** A read or write against the archive/ledger tables failed. */
export class StorageError extends Error {
  override name = "StorageError";

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

export class NormalizationError extends Error {
  override name = "NormalizationError";

  constructor(readonly rowIndex: number, message: string) {
    super(`Row ${rowIndex}: ${message}`);
  }
}

/** Telegram asked us to back off (`parameters.retry_after`). */
export class RetryAfterError extends Error {
  override name = "RetryAfterError";

  constructor(readonly retryAfterSeconds: number, message = `Retry after ${retryAfterSeconds}s`) {
    super(message);
  }
}

/** Permanent per-recipient failure: blocked bot, deleted account, bad payload. */
export class DeliveryFailedError extends Error {
  override name = "DeliveryFailedError";

  constructor(readonly chatId: number, message: string, readonly errorCode?: number) {
    super(message);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
