/**
 * Event builders shared by the ledger tests.
 */

import type { ContributionEvent, QuantityChangeEvent } from "@stockpile/types";

/** Midnight UTC on 2025-01-<day>. */
export function day(n: number): string {
  return new Date(Date.UTC(2025, 0, n)).toISOString();
}

/** Each call returns the next whole second after 2025-01-01T00:00:00Z. */
export function steppingClock(): () => Date {
  let tick = 0;
  const start = Date.parse("2025-01-01T00:00:00.000Z");
  return () => new Date(start + 1000 * tick++);
}

export function contributed(
  id: number,
  quantity: number,
  occurredAt: string,
  overrides: Partial<ContributionEvent> = {},
): ContributionEvent {
  return {
    kind: "contribution",
    id,
    guildId: "guild-1",
    actorId: "user-1",
    category: "Misc",
    itemName: "Rope",
    quantity,
    occurredAt,
    ...overrides,
  };
}

export function overridden(
  id: number,
  newQuantity: number,
  occurredAt: string,
  overrides: Partial<QuantityChangeEvent> = {},
): QuantityChangeEvent {
  return {
    kind: "quantity_change",
    id,
    guildId: "guild-1",
    itemName: "Rope",
    category: "Misc",
    oldQuantity: 0,
    newQuantity,
    reason: "recount",
    notes: null,
    actorId: "admin-1",
    occurredAt,
    ...overrides,
  };
}

export const ROPE = { category: "Misc", itemName: "Rope" } as const;
