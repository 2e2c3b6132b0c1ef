/**
 * InventoryLedgerService: Composition root for the ledger packages.
 *
 * Route handlers delegate to this service; they never touch the event
 * store or the redistributor directly. Every write on an item key runs
 * under the same keyed mutex the redistributor uses, so contributions,
 * overrides and redistributions on one key are applied one at a time.
 */

import type { Logger } from "pino";
import type {
  ContributionEvent,
  InventoryLevel,
  ItemKey,
  LedgerEvent,
  LedgerEventKind,
  QuantityChangeEvent,
} from "@stockpile/types";
import { formatItemKey } from "@stockpile/types";
import type {
  AppendContributionInput,
  ArchiveInput,
  ArchiveSummary,
  BulkRemovalResult,
  EventRef,
  EventStore,
  LedgerArchive,
  QueryOptions,
} from "@stockpile/event-store";
import { normalizeItemKey } from "@stockpile/event-store";
import {
  LedgerError,
  QuantityRedistributor,
  contributionTotals,
  lockKey,
  reconstructInventory,
  reconstructSeries,
  reconstructStock,
} from "@stockpile/ledger";
import type {
  ContributionTotal,
  InventoryOptions,
  ReconstructOptions,
  RedistributeOptions,
  RedistributionResult,
  StockSeries,
} from "@stockpile/ledger";
import { KeyedMutex, silentLogger } from "@stockpile/storage";

// =============================================================================
// Inputs
// =============================================================================

export interface QuantityOverrideInput {
  readonly guildId: string;
  readonly category: string;
  readonly itemName: string;
  readonly newQuantity: number;
  readonly reason: string;
  readonly notes?: string | null | undefined;
  readonly actorId: string;
}

export type AdjustOperation = "set" | "add" | "remove";

export interface AdjustQuantityInput {
  readonly operation: AdjustOperation;
  readonly amount: number;
  readonly reason: string;
  readonly notes?: string | null | undefined;
  readonly actorId: string;
}

export interface AdjustQuantityResult {
  readonly key: ItemKey;
  readonly previousQuantity: number;
  readonly newQuantity: number;

  /** "redistributed" when contributions were rewritten, "override" otherwise */
  readonly mode: "redistributed" | "override";

  readonly correction: QuantityChangeEvent;
  readonly records: readonly ContributionEvent[];
}

export type ArchiveEpochInput = Omit<ArchiveInput, "guildId">;

export interface InventoryLedgerServiceOptions {
  readonly store: EventStore;
  readonly locks?: KeyedMutex | undefined;
  readonly logger?: Logger | undefined;
}

const OPERATION_TAGS: Record<AdjustOperation, string> = {
  set: "SET",
  add: "ADD",
  remove: "REMOVE",
};

function describeOperation(operation: AdjustOperation, amount: number): string {
  switch (operation) {
    case "set":
      return `Set to ${amount}`;
    case "add":
      return `Added ${amount}`;
    case "remove":
      return `Removed ${amount}`;
  }
}

function targetQuantity(operation: AdjustOperation, current: number, amount: number): number {
  switch (operation) {
    case "set":
      return amount;
    case "add":
      return current + amount;
    case "remove":
      return Math.max(0, current - amount);
  }
}

// =============================================================================
// Service
// =============================================================================

export class InventoryLedgerService {
  readonly store: EventStore;
  readonly redistributor: QuantityRedistributor;

  private readonly _locks: KeyedMutex;
  private readonly _logger: Logger;

  constructor(options: InventoryLedgerServiceOptions) {
    this.store = options.store;
    this._locks = options.locks ?? new KeyedMutex();
    this._logger = options.logger ?? silentLogger();
    this.redistributor = new QuantityRedistributor(this.store, {
      locks: this._locks,
      logger: this._logger,
    });
  }

  get locks(): KeyedMutex {
    return this._locks;
  }

  // ─── Writes ────────────────────────────────────────────────────────

  async addContribution(input: AppendContributionInput): Promise<ContributionEvent> {
    const key = normalizeItemKey(input);
    const event = await this._locks.runExclusive(lockKey(input.guildId, key), () =>
      this.store.appendContribution(input),
    );
    this._logger.info(
      {
        guildId: event.guildId,
        item: formatItemKey(event),
        actorId: event.actorId,
        quantity: event.quantity,
        eventId: event.id,
      },
      "ledger.contribution.recorded",
    );
    return event;
  }

  /**
   * Record an absolute override. `oldQuantity` is the replayed stock at the
   * moment the override is written.
   */
  async recordQuantityOverride(input: QuantityOverrideInput): Promise<QuantityChangeEvent> {
    const key = normalizeItemKey(input);
    const event = await this._locks.runExclusive(lockKey(input.guildId, key), async () => {
      const oldQuantity = await this._stockUnlocked(input.guildId, key);
      return this.store.appendQuantityChange({ ...input, ...key, oldQuantity });
    });
    this._logger.info(
      {
        guildId: event.guildId,
        item: formatItemKey(event),
        oldQuantity: event.oldQuantity,
        newQuantity: event.newQuantity,
        eventId: event.id,
      },
      "ledger.quantity_change.recorded",
    );
    return event;
  }

  redistribute(
    guildId: string,
    key: ItemKey,
    newTotal: number,
    options?: RedistributeOptions,
  ): Promise<RedistributionResult> {
    return this.redistributor.redistribute(guildId, normalizeItemKey(key), newTotal, options);
  }

  /**
   * Set, add to or remove from an item's stock.
   *
   * Existing contributions are redistributed to the target. An item with
   * no contributions gets a plain override instead. Removal never goes
   * below zero.
   *
   * @throws LedgerError INVALID_ADJUSTMENT, MISSING_REASON
   */
  async adjustQuantity(
    guildId: string,
    key: ItemKey,
    input: AdjustQuantityInput,
  ): Promise<AdjustQuantityResult> {
    if (!Number.isSafeInteger(input.amount) || input.amount < 0) {
      throw new LedgerError(
        "INVALID_ADJUSTMENT",
        `Adjustment amount must be a non-negative integer, got ${String(input.amount)}`,
      );
    }
    if (input.operation !== "set" && input.amount === 0) {
      throw new LedgerError("INVALID_ADJUSTMENT", `Cannot ${input.operation} zero units`);
    }
    const reason = input.reason.trim();
    if (reason.length === 0) {
      throw new LedgerError("MISSING_REASON", "Adjustment reason must be non-blank");
    }

    const item = normalizeItemKey(key);
    const summary = describeOperation(input.operation, input.amount);
    const extra = input.notes?.trim() ?? "";
    const notes = extra.length > 0 ? `Operation: ${summary}\nNotes: ${extra}` : `Operation: ${summary}`;
    const tagged = `[${OPERATION_TAGS[input.operation]}] ${reason}`;

    const result = await this._locks.runExclusive(
      lockKey(guildId, item),
      async (): Promise<AdjustQuantityResult> => {
        const previousQuantity = await this._stockUnlocked(guildId, item);
        const newQuantity = targetQuantity(input.operation, previousQuantity, input.amount);

        const redistributed = await this.redistributor.redistributeUnlocked(
          guildId,
          item,
          newQuantity,
          { reason: tagged, notes, actorId: input.actorId },
        );

        if (redistributed.applied && redistributed.correction !== undefined) {
          return {
            key: item,
            previousQuantity,
            newQuantity,
            mode: "redistributed",
            correction: redistributed.correction,
            records: redistributed.records,
          };
        }

        const correction = await this.store.appendQuantityChange({
          guildId,
          ...item,
          oldQuantity: previousQuantity,
          newQuantity,
          reason: tagged,
          notes,
          actorId: input.actorId,
        });
        return { key: item, previousQuantity, newQuantity, mode: "override", correction, records: [] };
      },
    );

    this._logger.info(
      {
        guildId,
        item: formatItemKey(item),
        operation: input.operation,
        previousQuantity: result.previousQuantity,
        newQuantity: result.newQuantity,
        mode: result.mode,
      },
      "ledger.adjusted",
    );
    return result;
  }

  async archiveEpoch(guildId: string, input: ArchiveEpochInput): Promise<LedgerArchive> {
    const archive = await this.store.archiveGuild({ ...input, guildId });
    this._logger.info(
      {
        guildId,
        archiveId: archive.id,
        contributions: archive.totalContributions,
        quantityChanges: archive.totalQuantityChanges,
        dataHash: archive.dataHash,
      },
      "ledger.archived",
    );
    return archive;
  }

  async removeEvent(kind: LedgerEventKind, id: number): Promise<boolean> {
    const removed = await this.store.deleteEvent(kind, id);
    this._logger.info({ kind, eventId: id, removed }, "ledger.event.removed");
    return removed;
  }

  /**
   * Remove several of a guild's events at once. Each entry is reported as
   * removed or failed; one missing entry does not stop the others.
   */
  async removeEvents(
    guildId: string,
    entries: readonly EventRef[],
    removedBy: string,
  ): Promise<BulkRemovalResult> {
    const result = await this.store.removeEvents(guildId, entries);
    this._logger.info(
      {
        guildId,
        removedBy,
        contributions: result.contributionsRemoved,
        quantityChanges: result.quantityChangesRemoved,
        failed: result.failed.length,
      },
      "ledger.events.removed",
    );
    return result;
  }

  // ─── Reads ─────────────────────────────────────────────────────────

  async currentStock(guildId: string, key: ItemKey, options?: ReconstructOptions): Promise<number> {
    const item = normalizeItemKey(key);
    return reconstructStock(await this._itemEvents(guildId, item), item, options);
  }

  async stockHistory(guildId: string, key: ItemKey, options?: ReconstructOptions): Promise<StockSeries> {
    const item = normalizeItemKey(key);
    return reconstructSeries(await this._itemEvents(guildId, item), item, options);
  }

  async inventory(guildId: string, options?: InventoryOptions): Promise<readonly InventoryLevel[]> {
    return reconstructInventory(await this.store.queryEvents(guildId), options);
  }

  async contributionTotals(guildId: string, key?: ItemKey): Promise<readonly ContributionTotal[]> {
    const events = await this.store.queryEvents(guildId, {
      kind: "contribution",
      ...(key !== undefined ? normalizeItemKey(key) : {}),
    });
    return contributionTotals(events);
  }

  auditTrail(guildId: string, query?: QueryOptions): Promise<readonly LedgerEvent[]> {
    return this.store.queryEvents(guildId, query);
  }

  getEvent(kind: LedgerEventKind, id: number): Promise<LedgerEvent | undefined> {
    return this.store.getEvent(kind, id);
  }

  getArchive(id: number): Promise<LedgerArchive | undefined> {
    return this.store.getArchive(id);
  }

  listArchives(guildId: string): Promise<readonly ArchiveSummary[]> {
    return this.store.listArchives(guildId);
  }

  // ─── Internal ──────────────────────────────────────────────────────

  private _itemEvents(guildId: string, key: ItemKey): Promise<readonly LedgerEvent[]> {
    return this.store.queryEvents(guildId, key);
  }

  private async _stockUnlocked(guildId: string, key: ItemKey): Promise<number> {
    return reconstructStock(await this._itemEvents(guildId, key), key);
  }
}
