import { afterEach, describe, expect, it, vi } from "vitest";
import { chunk, escapeMarkdown, formatElapsed, isAbortError, log, sleep } from "./misc.ts";

describe("chunk", () => {
  it("splits into fixed-size batches with a short tail", () => {
    expect(chunk([1, 2, 3, 4, 5], 2)).toEqual([[1, 2], [3, 4], [5]]);
    expect(chunk([], 10)).toEqual([]);
  });

  it("refuses a non-positive size", () => {
    expect(() => chunk([1], 0)).toThrow(TypeError);
  });
});

describe("escapeMarkdown", () => {
  it("escapes the legacy Markdown markup characters", () => {
    expect(escapeMarkdown("ПИ_21 *a* `b` [c]")).toBe("ПИ\\_21 \\*a\\* \\`b\\` \\[c]");
  });
});

describe("formatElapsed", () => {
  it("renders minutes and seconds", () => {
    expect(formatElapsed(192_400)).toBe("3m 12.40s");
    expect(formatElapsed(0)).toBe("0m 0.00s");
  });
});

describe("sleep", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("resolves after the delay", async () => {
    vi.useFakeTimers();
    let done = false;
    const pending = sleep(1000).then(() => {
      done = true;
    });
    await vi.advanceTimersByTimeAsync(999);
    expect(done).toBe(false);
    await vi.advanceTimersByTimeAsync(1);
    await pending;
    expect(done).toBe(true);
  });

  it("rejects with an abort error when cancelled", async () => {
    const controller = new AbortController();
    const pending = sleep(60_000, controller.signal);
    controller.abort();
    const error = await pending.catch((e: unknown) => e);
    expect(isAbortError(error)).toBe(true);
  });

  it("rejects immediately on an already aborted signal", async () => {
    await expect(sleep(10, AbortSignal.abort())).rejects.toThrow("The operation was aborted");
  });
});

describe("log", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("prefixes level and serializes data", () => {
    const spy = vi.spyOn(console, "log").mockImplementation(() => {});
    log("INFO", "hello", { a: 1 });
    expect(spy).toHaveBeenCalledTimes(1);
    const [line, data] = spy.mock.calls[0] ?? [];
    expect(String(line)).toMatch(/^\[\d{4}-\d{2}-\d{2}T[^\]]+\] \[INFO\] hello$/);
    expect(data).toBe(JSON.stringify({ a: 1 }, null, 2));
  });

  it("writes the stack of logged errors to stderr", () => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    const errSpy = vi.spyOn(console, "error").mockImplementation(() => {});
    const error = new Error("boom");
    log("ERROR", "failed", error);
    expect(errSpy).toHaveBeenCalledWith(error.stack);
  });
});
