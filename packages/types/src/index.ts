/**
 * @stockpile/types: Shared domain types for the stockpile ledger.
 *
 * These types are used across all packages:
 * - Ledger events (contributions and quantity changes)
 * - Item keys and derived stock figures
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - Meaning lives in consuming code, not in the types
 */

// Event types
export type {
  LedgerEventKind,
  ContributionEvent,
  QuantityChangeEvent,
  LedgerEvent,
} from "./event.js";

// Inventory types
export type { ItemKey, StockPoint, InventoryLevel } from "./inventory.js";
export { formatItemKey, itemKeyId, sameItem } from "./inventory.js";

// Runtime type guards
export {
  isLedgerEventKind,
  isItemKey,
  isContributionEvent,
  isQuantityChangeEvent,
  isLedgerEvent,
} from "./guards.js";
