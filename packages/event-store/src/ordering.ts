/**
 * Total order over ledger events: occurredAt, then id.
 *
 * Timestamps are canonical ISO 8601 strings, so lexicographic comparison
 * is chronological. Ids break ties between events sharing a timestamp.
 */

import type { LedgerEvent } from "@stockpile/types";
import type { EventCursor, ReadDirection } from "./types.js";

export function compareEvents(a: EventCursor, b: EventCursor): number {
  if (a.occurredAt < b.occurredAt) return -1;
  if (a.occurredAt > b.occurredAt) return 1;
  return a.id - b.id;
}

/**
 * True if `event` lies strictly past `cursor` when reading in `direction`.
 */
export function isPastCursor(
  event: EventCursor,
  cursor: EventCursor,
  direction: ReadDirection,
): boolean {
  const order = compareEvents(event, cursor);
  return direction === "forward" ? order > 0 : order < 0;
}

/**
 * Copy of `events` in (occurredAt, id) order.
 */
export function sortEvents<E extends LedgerEvent>(events: readonly E[]): E[] {
  return [...events].sort(compareEvents);
}

/**
 * Cursor of an event, for resuming a paged read after it.
 */
export function cursorOf(event: LedgerEvent): EventCursor {
  return { occurredAt: event.occurredAt, id: event.id };
}
