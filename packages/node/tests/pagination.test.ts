/**
 * Tests for pagination utilities: encodeCursor, decodeCursor, paginate.
 */

import { describe, it, expect } from "vitest";
import { cursorOf } from "@stockpile/event-store";
import type { LedgerEvent } from "@stockpile/types";
import {
  encodeCursor,
  decodeCursor,
  paginate,
} from "../src/types/pagination.js";

function encodeRaw(value: unknown): string {
  return Buffer.from(JSON.stringify(value)).toString("base64url");
}

function event(id: number): LedgerEvent {
  return {
    kind: "contribution",
    id,
    guildId: "guild-1",
    actorId: "user-1",
    category: "Misc",
    itemName: "Rope",
    quantity: 1,
    occurredAt: "2025-01-01T00:00:00.000Z",
  };
}

// =============================================================================
// decodeCursor
// =============================================================================

describe("decodeCursor", () => {
  it("reads a cursor written by encodeCursor", () => {
    const cursor = encodeCursor({ occurredAt: "2025-01-01T00:00:00.000Z", id: 7 });
    expect(decodeCursor(cursor)).toEqual({ occurredAt: "2025-01-01T00:00:00.000Z", id: 7 });
  });

  it("returns undefined for valid base64 but invalid JSON", () => {
    const notJson = Buffer.from("not json at all").toString("base64url");
    expect(decodeCursor(notJson)).toBeUndefined();
  });

  it("returns undefined when decoded JSON lacks required fields", () => {
    expect(decodeCursor(encodeRaw({ t: "2025-01-01T00:00:00.000Z" }))).toBeUndefined();
    expect(decodeCursor(encodeRaw({ i: 3 }))).toBeUndefined();
  });

  it("returns undefined for a non-integer id", () => {
    expect(decodeCursor(encodeRaw({ t: "2025-01-01T00:00:00.000Z", i: 1.5 }))).toBeUndefined();
    expect(decodeCursor(encodeRaw({ t: "2025-01-01T00:00:00.000Z", i: "3" }))).toBeUndefined();
  });

  it("returns undefined for non-object JSON", () => {
    expect(decodeCursor(encodeRaw([1, 2]))).toBeUndefined();
    expect(decodeCursor(encodeRaw(null))).toBeUndefined();
  });
});

// =============================================================================
// paginate
// =============================================================================

describe("paginate", () => {
  it("reports no more pages when the fetch fits the limit", () => {
    const page = paginate([event(1), event(2)], 2, cursorOf);

    expect(page.data.map((e) => e.id)).toEqual([1, 2]);
    expect(page.pagination).toEqual({ cursor: null, hasMore: false });
  });

  it("drops the extra item and points the cursor at the last kept one", () => {
    const page = paginate([event(1), event(2), event(3)], 2, cursorOf);

    expect(page.data.map((e) => e.id)).toEqual([1, 2]);
    expect(page.pagination.hasMore).toBe(true);
    expect(decodeCursor(page.pagination.cursor ?? "")).toEqual({
      occurredAt: "2025-01-01T00:00:00.000Z",
      id: 2,
    });
  });

  it("handles an empty fetch", () => {
    expect(paginate([], 5, cursorOf)).toEqual({
      data: [],
      pagination: { cursor: null, hasMore: false },
    });
  });
});
