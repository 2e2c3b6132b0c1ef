/**
 * Tests for config.ts: loadConfig + storageOptions.
 */

import { describe, it, expect } from "vitest";
import { ZodError } from "zod";
import { loadConfig, storageOptions } from "../src/config.js";

describe("loadConfig", () => {
  it("applies defaults for an empty environment", () => {
    expect(loadConfig({})).toEqual({
      PORT: 3000,
      HOST: "0.0.0.0",
      LOG_LEVEL: "info",
      NODE_ENV: "development",
      DATABASE_PATH: "data/stockpile.db",
      DB_BUSY_TIMEOUT_MS: 30000,
      DB_MAX_ATTEMPTS: 5,
      DB_RETRY_BASE_DELAY_MS: 100,
      DB_RETRY_MAX_DELAY_MS: 5000,
    });
  });

  it("coerces numeric values from strings", () => {
    const config = loadConfig({
      PORT: "8080",
      DB_MAX_ATTEMPTS: "3",
      DB_BUSY_TIMEOUT_MS: "0",
    });
    expect(config.PORT).toBe(8080);
    expect(config.DB_MAX_ATTEMPTS).toBe(3);
    expect(config.DB_BUSY_TIMEOUT_MS).toBe(0);
  });

  it("accepts a silent log level", () => {
    expect(loadConfig({ LOG_LEVEL: "silent" }).LOG_LEVEL).toBe("silent");
  });

  it("rejects an out-of-range port", () => {
    expect(() => loadConfig({ PORT: "70000" })).toThrow(ZodError);
  });

  it("rejects an unknown NODE_ENV", () => {
    expect(() => loadConfig({ NODE_ENV: "staging" })).toThrow(ZodError);
  });

  it("rejects zero attempts", () => {
    expect(() => loadConfig({ DB_MAX_ATTEMPTS: "0" })).toThrow(ZodError);
  });

  it("ignores unrelated variables", () => {
    const config = loadConfig({ HOME: "/root", DATABASE_PATH: "/tmp/ledger.db" });
    expect(config.DATABASE_PATH).toBe("/tmp/ledger.db");
    expect("HOME" in config).toBe(false);
  });
});

describe("storageOptions", () => {
  it("maps database settings onto StorageHandle options", () => {
    const config = loadConfig({
      DATABASE_PATH: ":memory:",
      DB_BUSY_TIMEOUT_MS: "250",
      DB_MAX_ATTEMPTS: "2",
      DB_RETRY_BASE_DELAY_MS: "10",
      DB_RETRY_MAX_DELAY_MS: "40",
    });

    expect(storageOptions(config)).toEqual({
      filePath: ":memory:",
      busyTimeoutMs: 250,
      retry: { maxAttempts: 2, baseDelayMs: 10, maxDelayMs: 40 },
    });
  });
});
