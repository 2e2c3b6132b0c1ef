/**
 * @stockpile/ledger: Proportional redistribution.
 *
 * Re-maps an administrator-declared total onto the contributions that
 * currently make up an item key's stock:
 *
 *   current 8 = [5, 3], new total 10
 *   → [floor(10 × 5 / 8), 10 − 6] = [6, 4]
 *
 * Rules:
 * - Every record but the last gets floor(newTotal × quantity / currentTotal)
 * - The last record absorbs the remainder, so the sum is exactly newTotal
 * - Records that come out at 0 are deleted, never stored as 0
 * - Arithmetic is bigint; no floating point
 *
 * Contributions are rewritten in place. They act as a materialized view of
 * who holds what share; the correction QuantityChangeEvent appended with
 * every redistribution is the audit record.
 */

import type { Logger } from "pino";
import type { ContributionEvent, ItemKey } from "@stockpile/types";
import { formatItemKey } from "@stockpile/types";
import type { EventStore, QuantityUpdate } from "@stockpile/event-store";
import { KeyedMutex, silentLogger } from "@stockpile/storage";
import type {
  RedistributeOptions,
  RedistributionPlan,
  RedistributionResult,
} from "./types.js";
import { LedgerError } from "./types.js";

export const DEFAULT_REDISTRIBUTION_REASON = "redistribution";
export const DEFAULT_REDISTRIBUTION_ACTOR = "system";

/**
 * Lock key for writes on one item key within a guild.
 */
export function lockKey(guildId: string, key: ItemKey): string {
  return JSON.stringify([guildId, key.category, key.itemName]);
}

function assertTotal(newTotal: number): void {
  if (!Number.isSafeInteger(newTotal) || newTotal < 0) {
    throw new LedgerError(
      "INVALID_TOTAL",
      `New total must be a non-negative integer, got ${String(newTotal)}`,
    );
  }
}

/**
 * Plan the record changes that bring `records` (oldest first) to `newTotal`.
 *
 * @returns undefined when there are no records
 * @throws LedgerError INVALID_TOTAL
 */
export function planRedistribution(
  records: readonly ContributionEvent[],
  newTotal: number,
): RedistributionPlan | undefined {
  assertTotal(newTotal);

  if (records.length === 0) {
    return undefined;
  }

  const currentTotal = records.reduce((sum, r) => sum + r.quantity, 0);

  if (newTotal === 0) {
    return {
      currentTotal,
      newTotal,
      updates: [],
      deletions: records.map((r) => r.id),
    };
  }

  const updates: QuantityUpdate[] = [];
  const deletions: number[] = [];
  const assign = (record: ContributionEvent, quantity: number): void => {
    if (quantity === 0) {
      deletions.push(record.id);
    } else if (quantity !== record.quantity) {
      updates.push({ id: record.id, quantity });
    }
  };

  if (currentTotal === 0) {
    records.forEach((record, index) => assign(record, index === 0 ? newTotal : 0));
    return { currentTotal, newTotal, updates, deletions };
  }

  const target = BigInt(newTotal);
  const current = BigInt(currentTotal);
  let assigned = 0n;

  records.forEach((record, index) => {
    let quantity: bigint;
    if (index === records.length - 1) {
      const remaining = target - assigned;
      quantity = remaining > 0n ? remaining : 0n;
    } else {
      quantity = (target * BigInt(record.quantity)) / current;
    }
    assigned += quantity;
    assign(record, Number(quantity));
  });

  return { currentTotal, newTotal, updates, deletions };
}

/**
 * Options for creating a QuantityRedistributor.
 */
export interface QuantityRedistributorOptions {
  /** Shared with every other writer on the same item keys */
  readonly locks?: KeyedMutex | undefined;
  readonly logger?: Logger | undefined;
}

/**
 * Applies redistribution plans through an EventStore.
 *
 * Writes on one item key are serialized by the keyed mutex, and the read of
 * the current records, their rewrite, and the correction event share one
 * store transaction (rewriteContributions).
 */
export class QuantityRedistributor {
  private readonly _store: EventStore;
  private readonly _locks: KeyedMutex;
  private readonly _logger: Logger;

  constructor(store: EventStore, options: QuantityRedistributorOptions = {}) {
    this._store = store;
    this._locks = options.locks ?? new KeyedMutex();
    this._logger = options.logger ?? silentLogger();
  }

  get locks(): KeyedMutex {
    return this._locks;
  }

  /**
   * Redistribute `newTotal` across the key's contributions.
   *
   * No contributions: nothing happens and no event is appended.
   *
   * @throws LedgerError INVALID_TOTAL, MISSING_REASON
   */
  redistribute(
    guildId: string,
    key: ItemKey,
    newTotal: number,
    options: RedistributeOptions = {},
  ): Promise<RedistributionResult> {
    return this._locks.runExclusive(lockKey(guildId, key), () =>
      this.redistributeUnlocked(guildId, key, newTotal, options),
    );
  }

  /**
   * Redistribute without taking the item lock. The caller must already
   * hold `lockKey(guildId, key)` on this redistributor's locks.
   */
  async redistributeUnlocked(
    guildId: string,
    key: ItemKey,
    newTotal: number,
    options: RedistributeOptions = {},
  ): Promise<RedistributionResult> {
    assertTotal(newTotal);
    const reason = options.reason ?? DEFAULT_REDISTRIBUTION_REASON;
    if (reason.trim().length === 0) {
      throw new LedgerError("MISSING_REASON", "Redistribution reason must be non-blank");
    }

    const result = await this._store.rewriteContributions(guildId, key, (records) => {
      const plan = planRedistribution(records, newTotal);
      if (plan === undefined) {
        return undefined;
      }
      return {
        updates: plan.updates,
        deletions: plan.deletions,
        correction: {
          guildId,
          category: key.category,
          itemName: key.itemName,
          oldQuantity: plan.currentTotal,
          newQuantity: newTotal,
          reason,
          notes: options.notes,
          actorId: options.actorId ?? DEFAULT_REDISTRIBUTION_ACTOR,
        },
      };
    });

    const previousTotal = result.before.reduce((sum, r) => sum + r.quantity, 0);

    if (!result.applied) {
      this._logger.debug(
        { guildId, item: formatItemKey(key) },
        "ledger.redistribute.noop",
      );
      return {
        key,
        applied: false,
        previousTotal,
        newTotal,
        records: [],
        updated: 0,
        deleted: 0,
        correction: undefined,
      };
    }

    const original = new Map(result.before.map((r) => [r.id, r.quantity]));
    const updated = result.after.filter((r) => original.get(r.id) !== r.quantity).length;
    const deleted = result.before.length - result.after.length;

    this._logger.info(
      {
        guildId,
        item: formatItemKey(key),
        previousTotal,
        newTotal,
        updated,
        deleted,
        correctionId: result.correction?.id,
      },
      "ledger.redistributed",
    );

    return {
      key,
      applied: true,
      previousTotal,
      newTotal,
      records: result.after,
      updated,
      deleted,
      correction: result.correction,
    };
  }
}
