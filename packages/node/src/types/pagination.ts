/**
 * Cursor-based pagination types.
 *
 * Cursors are base64url-encoded JSON objects: { t, i } holding the
 * (occurredAt, id) position of the last event on the page.
 * List endpoints return { data, pagination: { cursor, hasMore } }.
 */

import type { EventCursor } from "@stockpile/event-store";

// =============================================================================
// Types
// =============================================================================

export interface PaginationMeta {
  readonly cursor: string | null;
  readonly hasMore: boolean;
}

export interface PaginatedResponse<T> {
  readonly data: readonly T[];
  readonly pagination: PaginationMeta;
}

// =============================================================================
// Cursor Encoding
// =============================================================================

interface CursorData {
  readonly t: string; // occurredAt
  readonly i: number; // event id
}

export function encodeCursor(cursor: EventCursor): string {
  const data: CursorData = { t: cursor.occurredAt, i: cursor.id };
  return Buffer.from(JSON.stringify(data)).toString("base64url");
}

/**
 * @returns Decoded cursor, or undefined if the cursor is invalid.
 */
export function decodeCursor(raw: string): EventCursor | undefined {
  let data: unknown;
  try {
    data = JSON.parse(Buffer.from(raw, "base64url").toString("utf-8"));
  } catch {
    return undefined;
  }
  if (
    typeof data === "object" &&
    data !== null &&
    "t" in data &&
    "i" in data &&
    typeof data.t === "string" &&
    typeof data.i === "number" &&
    Number.isSafeInteger(data.i)
  ) {
    return { occurredAt: data.t, id: data.i };
  }
  return undefined;
}

/**
 * Build a page from items fetched with `limit + 1`.
 */
export function paginate<T>(
  fetched: readonly T[],
  limit: number,
  cursorOf: (item: T) => EventCursor,
): PaginatedResponse<T> {
  const hasMore = fetched.length > limit;
  const data = hasMore ? fetched.slice(0, limit) : fetched;
  const last = data.at(-1);

  const cursor =
    hasMore && last !== undefined ? encodeCursor(cursorOf(last)) : null;

  return { data, pagination: { cursor, hasMore } };
}
