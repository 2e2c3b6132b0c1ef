/**
 * Tests for logger middleware.
 */

import { describe, it, expect } from "vitest";
import pino from "pino";
import { createTestApp, jsonRequest, API } from "../setup.js";
import type { RequestLogEntry } from "../../src/middleware/logger.js";
import { pinoRequestLog } from "../../src/middleware/logger.js";

describe("loggerMiddleware", () => {
  it("calls logFn with request details", async () => {
    const entries: RequestLogEntry[] = [];
    const { app } = createTestApp({ logFn: (entry) => entries.push(entry) });

    await app.request(jsonRequest("/health", "GET", undefined, { "X-Request-Id": "req-1" }));

    expect(entries).toHaveLength(1);
    expect(entries[0]).toMatchObject({
      method: "GET",
      path: "/health",
      status: 200,
      requestId: "req-1",
    });
    expect(entries[0]?.durationMs).toBeGreaterThanOrEqual(0);
  });

  it("logs POST requests with correct status", async () => {
    const entries: RequestLogEntry[] = [];
    const { app } = createTestApp({ logFn: (entry) => entries.push(entry) });

    await app.request(
      jsonRequest(`${API}/contributions`, "POST", {
        actorId: "user-1",
        category: "Misc",
        itemName: "Rope",
        quantity: 3,
      }),
    );

    expect(entries).toHaveLength(1);
    expect(entries[0]?.method).toBe("POST");
    expect(entries[0]?.status).toBe(201);
  });

  it("logs error responses", async () => {
    const entries: RequestLogEntry[] = [];
    const { app } = createTestApp({ logFn: (entry) => entries.push(entry) });

    await app.request(jsonRequest(`${API}/contributions`, "POST", { quantity: 0 }));

    expect(entries[0]?.status).toBe(400);
  });
});

describe("pinoRequestLog", () => {
  function capture(): { lines: { level: number; msg: string }[]; log: ReturnType<typeof pinoRequestLog> } {
    const lines: { level: number; msg: string }[] = [];
    const logger = pino({ level: "info" }, {
      write: (line: string) => {
        const parsed: unknown = JSON.parse(line);
        if (
          typeof parsed === "object" &&
          parsed !== null &&
          "level" in parsed &&
          "msg" in parsed &&
          typeof parsed.level === "number" &&
          typeof parsed.msg === "string"
        ) {
          lines.push({ level: parsed.level, msg: parsed.msg });
        }
      },
    });
    return { lines, log: pinoRequestLog(logger) };
  }

  const entry = { method: "GET", path: "/x", durationMs: 1, requestId: "r" };

  it("picks the level from the status", () => {
    const { lines, log } = capture();

    log({ ...entry, status: 200 });
    log({ ...entry, status: 404 });
    log({ ...entry, status: 503 });

    expect(lines).toEqual([
      { level: 30, msg: "GET /x 200" },
      { level: 40, msg: "GET /x 404" },
      { level: 50, msg: "GET /x 503" },
    ]);
  });
});
