import { afterEach, describe, expect, it, vi } from "vitest";
import { createTimeoutController, isRetryableError } from "./http.js";

afterEach(() => {
  vi.useRealTimers();
});

describe("isRetryableError", () => {
  it("retries aborts and network TypeErrors only", () => {
    const abort = new Error("aborted");
    abort.name = "AbortError";

    expect(isRetryableError(abort)).toBe(true);
    expect(isRetryableError(new TypeError("fetch failed"))).toBe(true);
    expect(isRetryableError(new Error("boom"))).toBe(false);
    expect(isRetryableError("boom")).toBe(false);
  });
});

describe("createTimeoutController", () => {
  it("aborts once the timeout passes", () => {
    vi.useFakeTimers();
    const { controller } = createTimeoutController(1000);

    vi.advanceTimersByTime(999);
    expect(controller.signal.aborted).toBe(false);

    vi.advanceTimersByTime(1);
    expect(controller.signal.aborted).toBe(true);
  });

  it("never aborts after cleanup", () => {
    vi.useFakeTimers();
    const { controller, cleanup } = createTimeoutController(1000);

    cleanup();
    vi.advanceTimersByTime(5000);

    expect(controller.signal.aborted).toBe(false);
  });
});
