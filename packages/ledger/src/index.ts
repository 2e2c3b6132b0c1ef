/**
 * @stockpile/ledger: Stock replay and proportional redistribution.
 *
 * Replay derives stock levels from the event stream:
 * - Contributions add to the balance
 * - Quantity changes set the balance absolutely
 * - Order is (occurredAt, id), so replay is deterministic
 *
 * Redistribution maps a new aggregate total onto an item's contributions:
 * - The sum of surviving records equals the new total exactly
 * - No record is ever negative; records reaching zero are deleted
 * - All arithmetic uses bigint (no floating point)
 */

// Replay
export {
  applyEvent,
  reconstructStock,
  reconstructSeries,
  reconstructInventory,
  contributionTotals,
} from "./reconstructor.js";

// Redistribution
export {
  planRedistribution,
  QuantityRedistributor,
  lockKey,
  DEFAULT_REDISTRIBUTION_REASON,
  DEFAULT_REDISTRIBUTION_ACTOR,
} from "./redistribution.js";
export type { QuantityRedistributorOptions } from "./redistribution.js";

// Types
export type {
  ReconstructOptions,
  InventoryOptions,
  StockSeries,
  ContributionTotal,
  RedistributionPlan,
  RedistributeOptions,
  RedistributionResult,
  LedgerErrorCode,
} from "./types.js";
export { LedgerError } from "./types.js";
