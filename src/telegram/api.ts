// src/telegram/api.ts
import { z } from "zod";
import { TELEGRAM_API_BASE, TELEGRAM_TIMEOUT_MS } from "../config.ts";
import { DeliveryFailedError, RetryAfterError, errorMessage } from "../errors.ts";
import { AbortedError, log } from "../utils/misc.ts";
import type { BotInfo, Messenger, RenderedSchedule, SendOptions, TelegramResponse } from "../types.ts";

const ResponseSchema = z.object({
  ok: z.boolean(),
  result: z.unknown().optional(),
  description: z.string().optional(),
  error_code: z.number().optional(),
  parameters: z
    .object({ retry_after: z.number().optional(), migrate_to_chat_id: z.number().optional() })
    .optional(),
});

const BotInfoSchema = z.object({
  id: z.number(),
  username: z.string().default("UnknownBot"),
  first_name: z.string(),
});

type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export type TelegramApi = ReturnType<typeof createTelegramApi>;

/**
 * Thin wrapper over the Bot API. Calls never throw: network and API failures come back
 * as `{ ok: false }` and are logged here, the way callers have always consumed them.
 */
export function createTelegramApi(token: string, fetchImpl: FetchLike = fetch, timeoutMs = TELEGRAM_TIMEOUT_MS) {
  const baseUrl = `${TELEGRAM_API_BASE}/bot${token}`;

  async function send(method: string, init: RequestInit, signal?: AbortSignal): Promise<TelegramResponse<unknown>> {
    try {
      const timeout = AbortSignal.timeout(timeoutMs);
      const response = await fetchImpl(`${baseUrl}/${method}`, {
        method: "POST",
        ...init,
        signal: signal ? AbortSignal.any([signal, timeout]) : timeout,
      });
      const parsed = ResponseSchema.safeParse(await response.json());
      if (!parsed.success) {
        log("ERROR", `Telegram API returned an unexpected body (${method})`, { status: response.status });
        return { ok: false, description: `Unexpected response (HTTP ${response.status})`, error_code: response.status };
      }
      const body = parsed.data;
      if (body.ok) {
        return { ok: true, result: body.result };
      }
      const level = body.error_code === 429 || body.error_code === 403 ? "WARN" : "ERROR";
      log(level, `Telegram API Error (${method})`, { description: body.description, error_code: body.error_code });
      return { ok: false, description: body.description, error_code: body.error_code, parameters: body.parameters };
    } catch (error) {
      if (signal?.aborted) {
        return { ok: false, description: "Request cancelled" };
      }
      log("ERROR", `Network/Fetch Error in telegramApiCall (${method})`, error);
      return { ok: false, description: `Network/Fetch Error: ${errorMessage(error)}` };
    }
  }

  /**
   * A generic function to make JSON calls to the Telegram Bot API.
   * @param method - The API method to call (e.g., "sendMessage").
   * @param payload - The JSON payload for the method.
   */
  function telegramApiCall(method: string, payload: object = {}, signal?: AbortSignal): Promise<TelegramResponse<unknown>> {
    return send(
      method,
      {
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify(payload),
      },
      signal,
    );
  }

  function sendMessage(chatId: number | string, text: string, options: SendOptions = {}) {
    return telegramApiCall(
      "sendMessage",
      {
        chat_id: String(chatId),
        text,
        parse_mode: "Markdown",
        disable_notification: options.silent ?? false,
      },
      options.signal,
    );
  }

  function upload(method: "sendPhoto" | "sendDocument", field: "photo" | "document") {
    return (chatId: number | string, file: RenderedSchedule, options: SendOptions = {}) => {
      const form = new FormData();
      form.append("chat_id", String(chatId));
      form.append(field, new Blob([file.bytes], { type: file.mimeType }), file.filename);
      if (options.caption) form.append("caption", options.caption);
      if (options.silent) form.append("disable_notification", "true");
      return send(method, { body: form }, options.signal);
    };
  }

  async function getMe(): Promise<BotInfo | null> {
    const response = await telegramApiCall("getMe");
    if (!response.ok) return null;
    const info = BotInfoSchema.safeParse(response.result);
    return info.success ? info.data : null;
  }

  return {
    telegramApiCall,
    sendMessage,
    sendPhoto: upload("sendPhoto", "photo"),
    sendDocument: upload("sendDocument", "document"),
    getMe,
  };
}

/** Maps a failed Bot API response onto the delivery error taxonomy. */
export function toDeliveryError(chatId: number, response: Extract<TelegramResponse<unknown>, { ok: false }>): Error {
  const retryAfter = response.parameters?.retry_after;
  if (retryAfter !== undefined) {
    return new RetryAfterError(retryAfter, response.description);
  }
  return new DeliveryFailedError(chatId, response.description ?? "Unknown error", response.error_code);
}

/**
 * The delivery primitive the broadcaster works against. Images go out as photos,
 * anything else (the PDF sheets) as documents.
 */
export function createTelegramMessenger(api: TelegramApi): Messenger {
  return {
    async sendMessage(chatId, text, options) {
      const response = await api.sendMessage(chatId, text, options);
      if (options?.signal?.aborted) throw new AbortedError();
      if (!response.ok) throw toDeliveryError(chatId, response);
    },
    async sendFile(chatId, file, options) {
      const response = file.mimeType.startsWith("image/")
        ? await api.sendPhoto(chatId, file, options)
        : await api.sendDocument(chatId, file, options);
      if (options?.signal?.aborted) throw new AbortedError();
      if (!response.ok) throw toDeliveryError(chatId, response);
    },
  };
}
