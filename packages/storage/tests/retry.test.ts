/**
 * Tests for retry with exponential backoff.
 */

import { describe, it, expect, vi } from "vitest";
import {
  withRetry,
  RetryExhaustedError,
  computeDelay,
  isTransientStorageError,
  resolveRetryConfig,
  DEFAULT_RETRY_CONFIG,
} from "../src/retry.js";
import type { RetryConfig } from "../src/retry.js";

const fastConfig: RetryConfig = {
  maxAttempts: 3,
  baseDelayMs: 10,
  maxDelayMs: 100,
  jitterMs: 0,
};

const noopSleep = async (_ms: number) => {};

function sqliteError(code: string, message = code): Error {
  return Object.assign(new Error(message), { code });
}

describe("withRetry", () => {
  it("returns result on first success", async () => {
    const fn = vi.fn().mockResolvedValue("ok");
    const result = await withRetry(fn, fastConfig, () => true, noopSleep);
    expect(result).toBe("ok");
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it("retries on failure and succeeds on second attempt", async () => {
    const fn = vi.fn()
      .mockRejectedValueOnce(new Error("transient"))
      .mockResolvedValueOnce("recovered");

    const result = await withRetry(fn, fastConfig, () => true, noopSleep);
    expect(result).toBe("recovered");
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it("throws RetryExhaustedError when all attempts fail", async () => {
    const fn = vi.fn().mockRejectedValue(new Error("always fail"));

    await expect(withRetry(fn, fastConfig, () => true, noopSleep))
      .rejects.toThrow(RetryExhaustedError);

    expect(fn).toHaveBeenCalledTimes(3);
  });

  it("RetryExhaustedError contains correct attempts count and last error", async () => {
    const lastErr = new Error("last");
    const fn = vi.fn().mockRejectedValue(lastErr);

    const err = await withRetry(fn, fastConfig, () => true, noopSleep).catch(
      (e: unknown) => e,
    );

    expect(err).toBeInstanceOf(RetryExhaustedError);
    if (err instanceof RetryExhaustedError) {
      expect(err.attempts).toBe(3);
      expect(err.lastError).toBe(lastErr);
      expect(err.message).toBe("All 3 retry attempts exhausted. Last error: last");
    }
  });

  it("does not retry when shouldRetry returns false", async () => {
    const permanent = new Error("permanent");
    const fn = vi.fn().mockRejectedValue(permanent);

    await expect(withRetry(fn, fastConfig, () => false, noopSleep))
      .rejects.toBe(permanent);

    expect(fn).toHaveBeenCalledTimes(1);
  });

  it("doubles the delay between attempts", async () => {
    const delays: number[] = [];
    const mockSleep = async (ms: number) => { delays.push(ms); };
    const fn = vi.fn().mockRejectedValue(new Error("fail"));

    await expect(
      withRetry(fn, DEFAULT_RETRY_CONFIG, () => true, mockSleep),
    ).rejects.toThrow(RetryExhaustedError);

    // 5 attempts = 4 sleeps: 100, 200, 400, 800
    expect(delays).toEqual([100, 200, 400, 800]);
  });

  it("respects maxDelayMs cap", async () => {
    const delays: number[] = [];
    const mockSleep = async (ms: number) => { delays.push(ms); };
    const fn = vi.fn().mockRejectedValue(new Error("fail"));

    const config: RetryConfig = {
      maxAttempts: 5,
      baseDelayMs: 100,
      maxDelayMs: 300,
      jitterMs: 0,
    };

    await expect(withRetry(fn, config, () => true, mockSleep)).rejects.toThrow(
      RetryExhaustedError,
    );

    // 100, 200, 300 (capped), 300 (capped)
    expect(delays).toEqual([100, 200, 300, 300]);
  });

  it("notifies the listener before each sleep", async () => {
    const failure = new Error("busy");
    const fn = vi.fn()
      .mockRejectedValueOnce(failure)
      .mockResolvedValueOnce("ok");
    const onRetry = vi.fn();

    await withRetry(fn, fastConfig, () => true, noopSleep, onRetry);

    expect(onRetry).toHaveBeenCalledTimes(1);
    expect(onRetry).toHaveBeenCalledWith({ attempt: 1, delayMs: 10, error: failure });
  });
});

describe("computeDelay", () => {
  it("computes exponential backoff", () => {
    const config: RetryConfig = {
      maxAttempts: 3,
      baseDelayMs: 100,
      maxDelayMs: 10000,
      jitterMs: 0,
    };
    expect(computeDelay(0, config)).toBe(100);
    expect(computeDelay(1, config)).toBe(200);
    expect(computeDelay(2, config)).toBe(400);
  });

  it("keeps jitter within bounds", () => {
    const config: RetryConfig = {
      maxAttempts: 3,
      baseDelayMs: 100,
      maxDelayMs: 10000,
      jitterMs: 50,
    };
    for (let i = 0; i < 20; i++) {
      const delay = computeDelay(0, config);
      expect(delay).toBeGreaterThanOrEqual(100);
      expect(delay).toBeLessThan(150);
    }
  });
});

describe("resolveRetryConfig", () => {
  it("fills in defaults", () => {
    expect(resolveRetryConfig({ maxAttempts: 2 })).toEqual({
      maxAttempts: 2,
      baseDelayMs: 100,
      maxDelayMs: 5000,
      jitterMs: 0,
    });
  });

  it("rejects a non-positive attempt count", () => {
    expect(() => resolveRetryConfig({ maxAttempts: 0 })).toThrow(RangeError);
  });

  it("rejects negative delays", () => {
    expect(() => resolveRetryConfig({ baseDelayMs: -1 })).toThrow(
      "Retry delays must be non-negative",
    );
  });
});

describe("isTransientStorageError", () => {
  it("returns true for lock contention", () => {
    expect(isTransientStorageError(sqliteError("SQLITE_BUSY"))).toBe(true);
    expect(isTransientStorageError(sqliteError("SQLITE_BUSY_SNAPSHOT"))).toBe(true);
    expect(isTransientStorageError(sqliteError("SQLITE_LOCKED"))).toBe(true);
  });

  it("returns true for I/O and open failures", () => {
    expect(isTransientStorageError(sqliteError("SQLITE_IOERR_SHORT_READ"))).toBe(true);
    expect(isTransientStorageError(sqliteError("SQLITE_CANTOPEN"))).toBe(true);
  });

  it("returns true for a closed connection", () => {
    expect(
      isTransientStorageError(new TypeError("The database connection is not open")),
    ).toBe(true);
  });

  it("returns false for constraint and syntax errors", () => {
    expect(isTransientStorageError(sqliteError("SQLITE_CONSTRAINT_CHECK"))).toBe(false);
    expect(isTransientStorageError(sqliteError("SQLITE_ERROR"))).toBe(false);
  });

  it("returns false for non-Error values", () => {
    expect(isTransientStorageError("SQLITE_BUSY")).toBe(false);
    expect(isTransientStorageError(undefined)).toBe(false);
  });
});
