/**
 * Event Types
 *
 * Inventory changes are captured as one of two ledger events:
 * - contribution: a member donated `quantity` units of an item (additive)
 * - quantity_change: an administrator set the item's stock (absolute)
 *
 * Rules:
 * - Events are replayable: same events in (occurredAt, id) order → same stock
 * - Event ids come from one sequence shared by both kinds
 * - A contribution's quantity may be rewritten by redistribution; nothing
 *   else about an event ever changes
 */

/** Discriminator for the two ledger event kinds. */
export type LedgerEventKind = "contribution" | "quantity_change";

/**
 * A donation of stock by a guild member.
 */
export interface ContributionEvent {
  readonly kind: "contribution";

  /** Ledger-wide insertion id */
  readonly id: number;

  readonly guildId: string;

  /** Member who made the contribution */
  readonly actorId: string;

  readonly category: string;
  readonly itemName: string;

  /** Units contributed (positive when appended) */
  readonly quantity: number;

  /** ISO 8601 timestamp (UTC) */
  readonly occurredAt: string;
}

/**
 * An administrative override of an item's aggregate stock.
 *
 * `oldQuantity` is whatever the caller believed the stock was. It is kept
 * for the audit trail and never used when replaying.
 */
export interface QuantityChangeEvent {
  readonly kind: "quantity_change";
  readonly id: number;
  readonly guildId: string;
  readonly itemName: string;
  readonly category: string;
  readonly oldQuantity: number;
  readonly newQuantity: number;
  readonly reason: string;
  readonly notes: string | null;

  /** Administrator (or "system") who made the change */
  readonly actorId: string;

  readonly occurredAt: string;
}

/** Any event in the ledger. Discriminated by `kind`. */
export type LedgerEvent = ContributionEvent | QuantityChangeEvent;
