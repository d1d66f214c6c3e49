import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { backoffDelay, retryOnConflict, RetryExhaustedError, type RetryPolicy } from "./retry.js";
import { VersionConflictError } from "./errors.js";

const FAST: RetryPolicy = { steps: 4, durationMs: 0, factor: 1, jitter: 0 };

function conflict(): VersionConflictError {
  return new VersionConflictError("default", "web", 1);
}

describe("backoffDelay", () => {
  it("grows by the factor and adds jitter", () => {
    const policy: RetryPolicy = { steps: 5, durationMs: 10, factor: 2, jitter: 0.5 };

    expect(backoffDelay(policy, 1, () => 0)).toBe(10);
    expect(backoffDelay(policy, 3, () => 1)).toBe(60);
  });
});

describe("retryOnConflict", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("returns the first successful result", async () => {
    const fn = vi.fn(async () => "ok");

    await expect(retryOnConflict(FAST, fn)).resolves.toBe("ok");
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it("retries after a version conflict", async () => {
    const fn = vi.fn(async (attempt: number) => {
      if (attempt === 1) {
        throw conflict();
      }
      return `attempt ${attempt}`;
    });

    await expect(retryOnConflict(FAST, fn)).resolves.toBe("attempt 2");
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it("does not retry other errors", async () => {
    const fn = vi.fn(async () => {
      throw new Error("connection refused");
    });

    await expect(retryOnConflict(FAST, fn)).rejects.toThrow("connection refused");
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it("gives up after the configured number of attempts", async () => {
    const fn = vi.fn(async () => {
      throw conflict();
    });

    const error = await retryOnConflict(FAST, fn).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(RetryExhaustedError);
    expect(error instanceof RetryExhaustedError && error.attempts).toBe(4);
    expect(error instanceof RetryExhaustedError && error.cause).toBeInstanceOf(VersionConflictError);
    expect(fn).toHaveBeenCalledTimes(4);
  });

  it("does not start when the signal is already aborted", async () => {
    const controller = new AbortController();
    controller.abort(new Error("cancelled"));
    const fn = vi.fn(async () => "ok");

    await expect(retryOnConflict(FAST, fn, controller.signal)).rejects.toThrow("cancelled");
    expect(fn).not.toHaveBeenCalled();
  });

  it("stops waiting when aborted during backoff", async () => {
    const controller = new AbortController();
    const slow: RetryPolicy = { steps: 3, durationMs: 60_000, factor: 1, jitter: 0 };
    const fn = vi.fn(async () => {
      controller.abort(new Error("cancelled"));
      throw conflict();
    });

    await expect(retryOnConflict(slow, fn, controller.signal)).rejects.toThrow("cancelled");
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it("stops when aborted while the backoff timer runs", async () => {
    vi.useFakeTimers();
    try {
      const controller = new AbortController();
      const slow: RetryPolicy = { steps: 3, durationMs: 1000, factor: 1, jitter: 0 };
      const fn = vi.fn(async () => {
        throw conflict();
      });

      const result = retryOnConflict(slow, fn, controller.signal).catch((err: unknown) => err);
      await vi.advanceTimersByTimeAsync(500);
      controller.abort(new Error("cancelled"));

      const error = await result;
      expect(error).toBeInstanceOf(Error);
      expect(error instanceof Error && error.message).toBe("cancelled");
      expect(fn).toHaveBeenCalledTimes(1);
    } finally {
      vi.useRealTimers();
    }
  });
});
