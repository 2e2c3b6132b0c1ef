/**
 * Inventory Types
 *
 * Item identity and derived stock figures.
 */

import type { LedgerEventKind } from "./event.js";

/**
 * Identifies a distinct trackable stock unit.
 *
 * Matching is exact: "Rope" and "rope " are different items.
 */
export interface ItemKey {
  readonly category: string;
  readonly itemName: string;
}

/**
 * One point in an item's running-balance series.
 */
export interface StockPoint {
  readonly eventId: number;
  readonly kind: LedgerEventKind;
  readonly occurredAt: string;
  /** Signed change this event made to the balance */
  readonly delta: number;
  /** Balance after applying the event */
  readonly balance: number;
}

/**
 * Current stock for one item key.
 */
export interface InventoryLevel extends ItemKey {
  readonly quantity: number;
}

/**
 * Render an item key as `category::itemName`, for logs and messages.
 * Not unique: use itemKeyId() to index by item.
 */
export function formatItemKey(key: ItemKey): string {
  return `${key.category}::${key.itemName}`;
}

/**
 * Collision-free string id of an item key, for use as a map key.
 */
export function itemKeyId(key: ItemKey): string {
  return JSON.stringify([key.category, key.itemName]);
}

/**
 * True if the two keys name the same item (exact match).
 */
export function sameItem(a: ItemKey, b: ItemKey): boolean {
  return a.category === b.category && a.itemName === b.itemName;
}
