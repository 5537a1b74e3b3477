import { describe, expect, it, vi } from "vitest";
import { DeliveryFailedError, RetryAfterError } from "../errors.ts";
import { createTelegramApi, createTelegramMessenger } from "./api.ts";
import type { RenderedSchedule } from "../types.ts";

function fakeFetch(body: unknown, status = 200) {
  return vi.fn(async (_input: string, _init?: RequestInit) => new Response(JSON.stringify(body), { status }));
}

const sheet: RenderedSchedule = { bytes: new Uint8Array([1, 2, 3]), mimeType: "application/pdf", filename: "ИТ205.pdf" };

describe("createTelegramApi", () => {
  it("posts JSON payloads to the bot endpoint", async () => {
    const fetch = fakeFetch({ ok: true, result: { message_id: 1 } });
    const api = createTelegramApi("test-token", fetch);

    const response = await api.sendMessage(42, "hi", { silent: true });

    expect(response.ok).toBe(true);
    const [url, init] = fetch.mock.calls[0] ?? [];
    expect(url).toBe("https://api.telegram.org/bottest-token/sendMessage");
    expect(init?.method).toBe("POST");
    expect(JSON.parse(String(init?.body))).toEqual({
      chat_id: "42",
      text: "hi",
      parse_mode: "Markdown",
      disable_notification: true,
    });
  });

  it("reads the bot identity", async () => {
    const api = createTelegramApi("test-token", fakeFetch({ ok: true, result: { id: 7, is_bot: true, first_name: "Bot", username: "schedule_bot" } }));
    await expect(api.getMe()).resolves.toEqual({ id: 7, first_name: "Bot", username: "schedule_bot" });
  });

  it("turns network failures into a failed response", async () => {
    const api = createTelegramApi("test-token", async () => {
      throw new Error("boom");
    });
    await expect(api.sendMessage(1, "x")).resolves.toEqual({ ok: false, description: "Network/Fetch Error: boom" });
  });
});

describe("createTelegramMessenger", () => {
  it("raises RetryAfterError on flood control", async () => {
    const fetch = fakeFetch(
      { ok: false, error_code: 429, description: "Too Many Requests: retry after 5", parameters: { retry_after: 5 } },
      429,
    );
    const messenger = createTelegramMessenger(createTelegramApi("test-token", fetch));

    const error = await messenger.sendMessage(1, "x").catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RetryAfterError);
    expect(error instanceof RetryAfterError ? error.retryAfterSeconds : 0).toBe(5);
  });

  it("raises DeliveryFailedError for permanent failures", async () => {
    const fetch = fakeFetch({ ok: false, error_code: 403, description: "Forbidden: bot was blocked by the user" }, 403);
    const messenger = createTelegramMessenger(createTelegramApi("test-token", fetch));

    const error = await messenger.sendFile(99, sheet).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(DeliveryFailedError);
    expect(error instanceof DeliveryFailedError ? [error.chatId, error.errorCode, error.message] : []).toEqual([
      99,
      403,
      "Forbidden: bot was blocked by the user",
    ]);
  });

  it("uploads PDFs as documents with caption and silence", async () => {
    const fetch = fakeFetch({ ok: true, result: {} });
    const messenger = createTelegramMessenger(createTelegramApi("test-token", fetch));

    await messenger.sendFile(42, sheet, { caption: "new", silent: true });

    const [url, init] = fetch.mock.calls[0] ?? [];
    expect(url).toBe("https://api.telegram.org/bottest-token/sendDocument");
    const form = init?.body;
    expect(form).toBeInstanceOf(FormData);
    if (!(form instanceof FormData)) return;
    expect(form.get("chat_id")).toBe("42");
    expect(form.get("caption")).toBe("new");
    expect(form.get("disable_notification")).toBe("true");
    const document = form.get("document");
    expect(document instanceof Blob ? document.size : -1).toBe(3);
  });

  it("uploads images as photos", async () => {
    const fetch = fakeFetch({ ok: true, result: {} });
    const messenger = createTelegramMessenger(createTelegramApi("test-token", fetch));

    await messenger.sendFile(42, { ...sheet, mimeType: "image/png", filename: "a.png" });

    expect(fetch.mock.calls[0]?.[0]).toBe("https://api.telegram.org/bottest-token/sendPhoto");
  });

  it("cancels an in-flight request when the caller aborts", async () => {
    const fetch = vi.fn(
      (_input: string, init?: RequestInit) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener("abort", () => reject(new Error("request aborted")));
        }),
    );
    const messenger = createTelegramMessenger(createTelegramApi("test-token", fetch));
    const controller = new AbortController();

    const sending = messenger.sendFile(42, sheet, { signal: controller.signal });
    controller.abort();

    await expect(sending).rejects.toMatchObject({ name: "AbortError" });
    expect(fetch.mock.calls[0]?.[1]?.signal?.aborted).toBe(true);
  });
});

describe("createTelegramApi timeouts", () => {
  it("gives up on a request that never answers", async () => {
    const fetch = vi.fn(
      (_input: string, init?: RequestInit) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener("abort", () => reject(new Error("timed out")));
        }),
    );
    const api = createTelegramApi("test-token", fetch, 20);

    await expect(api.sendMessage(1, "x")).resolves.toEqual({ ok: false, description: "Network/Fetch Error: timed out" });
  });
});
