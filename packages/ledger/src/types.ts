/**
 * @stockpile/ledger: Ledger-specific types.
 *
 * Domain types (ContributionEvent, QuantityChangeEvent, ItemKey, etc.)
 * live in @stockpile/types. This module defines types specific to
 * replay and redistribution.
 */

import type {
  ContributionEvent,
  ItemKey,
  QuantityChangeEvent,
  StockPoint,
} from "@stockpile/types";
import type { QuantityUpdate } from "@stockpile/event-store";

// ─── Replay Types ────────────────────────────────────────────────────────

/**
 * Options for reconstructing a stock level.
 */
export interface ReconstructOptions {
  /** Ignore events after this ISO 8601 timestamp (inclusive bound). */
  readonly asOf?: string | undefined;
}

/**
 * Options for reconstructing a whole inventory.
 */
export interface InventoryOptions extends ReconstructOptions {
  /** Include item keys whose level is 0. Default: false */
  readonly includeZero?: boolean | undefined;
}

/**
 * Running-balance series for one item key.
 */
export interface StockSeries {
  readonly key: ItemKey;
  readonly points: readonly StockPoint[];
  /** Balance after the last point (0 when empty) */
  readonly balance: number;
}

/**
 * Total quantity one actor contributed to one item key.
 * Overrides and redistributions are not reflected.
 */
export interface ContributionTotal extends ItemKey {
  readonly actorId: string;
  readonly total: number;
  readonly contributions: number;
}

// ─── Redistribution Types ────────────────────────────────────────────────

/**
 * Record changes that move an item key's contributions to a new total.
 */
export interface RedistributionPlan {
  readonly currentTotal: number;
  readonly newTotal: number;
  readonly updates: readonly QuantityUpdate[];
  readonly deletions: readonly number[];
}

/**
 * Options for QuantityRedistributor.redistribute().
 */
export interface RedistributeOptions {
  /** Reason recorded on the correction event. Default: "redistribution" */
  readonly reason?: string | undefined;
  readonly notes?: string | null | undefined;
  /** Actor recorded on the correction event. Default: "system" */
  readonly actorId?: string | undefined;
}

/**
 * Outcome of a redistribution.
 */
export interface RedistributionResult {
  readonly key: ItemKey;

  /** False when the key had no contributions (nothing to redistribute) */
  readonly applied: boolean;

  readonly previousTotal: number;
  readonly newTotal: number;

  /** Surviving contributions, oldest first */
  readonly records: readonly ContributionEvent[];

  readonly updated: number;
  readonly deleted: number;

  /** The audit event appended alongside the rewrite */
  readonly correction: QuantityChangeEvent | undefined;
}

// ─── Error Types ─────────────────────────────────────────────────────────

/** Error codes for ledger operations. */
export type LedgerErrorCode =
  | "INVALID_QUANTITY"
  | "INVALID_TOTAL"
  | "MISSING_REASON"
  | "INVALID_ADJUSTMENT";

/**
 * Structured error from the ledger engine.
 */
export class LedgerError extends Error {
  public readonly code: LedgerErrorCode;

  constructor(code: LedgerErrorCode, message: string) {
    super(message);
    this.name = "LedgerError";
    this.code = code;
  }
}
