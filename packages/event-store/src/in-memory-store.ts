/**
 * @stockpile/event-store: In-memory EventStore implementation.
 *
 * Stores events in plain arrays. Suitable for:
 * - Unit and integration tests
 * - Short-lived processes
 *
 * Not suitable for production (all state lost on process exit).
 *
 * Each operation runs synchronously inside its async method, so multi-step
 * operations are atomic with respect to other callers on the event loop.
 * Archives are kept as serialized JSON and parsed on read, like the SQLite
 * store.
 */

import type {
  ContributionEvent,
  ItemKey,
  LedgerEvent,
  LedgerEventKind,
  QuantityChangeEvent,
} from "@stockpile/types";
import { buildArchiveSnapshot, computeArchiveHash, parseArchiveSnapshot } from "./archive.js";
import { compareEvents, isPastCursor } from "./ordering.js";
import type {
  AppendContributionInput,
  AppendQuantityChangeInput,
  ArchiveInput,
  ArchiveSummary,
  BulkRemovalResult,
  ContributionRewriter,
  EventRef,
  EventStore,
  EventStoreOptions,
  FailedRemoval,
  LedgerArchive,
  QueryOptions,
  RewriteResult,
} from "./types.js";
import {
  applyRewrite,
  checkRemovalEntry,
  missingEntry,
  normalizeArchiveInput,
  normalizeContribution,
  normalizeItemKey,
  normalizeQuantityChange,
  normalizeQuery,
  requireIdentifier,
  stampAfter,
  summarizeRemovals,
  validateRewrite,
} from "./validation.js";
import type { NewQuantityChange } from "./validation.js";

interface StoredArchive {
  readonly summary: ArchiveSummary;
  readonly json: string;
}

/**
 * In-memory event store.
 */
export class InMemoryEventStore implements EventStore {
  private _contributions: ContributionEvent[] = [];
  private _quantityChanges: QuantityChangeEvent[] = [];
  private readonly _archives: StoredArchive[] = [];

  /** Shared by both event kinds */
  private _nextEventId = 1;
  private _nextArchiveId = 1;

  private readonly _now: () => Date;

  constructor(options: EventStoreOptions = {}) {
    this._now = options.now ?? (() => new Date());
  }

  // ─── Append ─────────────────────────────────────────────────────────

  async appendContribution(input: AppendContributionInput): Promise<ContributionEvent> {
    const record = normalizeContribution(input, this._now);
    const event: ContributionEvent = { ...record, id: this._nextEventId++ };
    this._contributions.push(event);
    return event;
  }

  async appendQuantityChange(input: AppendQuantityChangeInput): Promise<QuantityChangeEvent> {
    return this._insertQuantityChange(normalizeQuantityChange(input, this._now));
  }

  // ─── Read ───────────────────────────────────────────────────────────

  async queryEvents(guildId: string, options?: QueryOptions): Promise<readonly LedgerEvent[]> {
    requireIdentifier(guildId, "guildId");
    const query = normalizeQuery(options);

    const pool: LedgerEvent[] = [];
    if (query.kind === undefined || query.kind === "contribution") {
      pool.push(...this._contributions);
    }
    if (query.kind === undefined || query.kind === "quantity_change") {
      pool.push(...this._quantityChanges);
    }

    const { after, direction } = query;
    const matching = pool
      .filter(
        (e) =>
          e.guildId === guildId &&
          (query.category === undefined || e.category === query.category) &&
          (query.itemName === undefined || e.itemName === query.itemName) &&
          (after === undefined || isPastCursor(e, after, direction)),
      )
      .sort(compareEvents);

    if (direction === "backward") {
      matching.reverse();
    }
    return query.limit === undefined ? matching : matching.slice(0, query.limit);
  }

  async getEvent(kind: LedgerEventKind, id: number): Promise<LedgerEvent | undefined> {
    const pool: readonly LedgerEvent[] =
      kind === "contribution" ? this._contributions : this._quantityChanges;
    return pool.find((e) => e.id === id);
  }

  async listContributions(guildId: string, key: ItemKey): Promise<readonly ContributionEvent[]> {
    requireIdentifier(guildId, "guildId");
    return this._selectContributions(guildId, normalizeItemKey(key));
  }

  // ─── Mutation ───────────────────────────────────────────────────────

  async deleteEvent(kind: LedgerEventKind, id: number): Promise<boolean> {
    if (kind === "contribution") {
      const before = this._contributions.length;
      this._contributions = this._contributions.filter((e) => e.id !== id);
      return this._contributions.length < before;
    }
    const before = this._quantityChanges.length;
    this._quantityChanges = this._quantityChanges.filter((e) => e.id !== id);
    return this._quantityChanges.length < before;
  }

  async removeEvents(
    guildId: string,
    entries: readonly EventRef[],
  ): Promise<BulkRemovalResult> {
    requireIdentifier(guildId, "guildId");
    const removed: EventRef[] = [];
    const failed: FailedRemoval[] = [];

    for (const { kind, id } of entries) {
      const invalid = checkRemovalEntry({ kind, id });
      if (invalid !== undefined) {
        failed.push({ kind, id, message: invalid });
        continue;
      }
      const owned = (e: LedgerEvent): boolean => e.id === id && e.guildId === guildId;
      const found =
        kind === "contribution"
          ? this._contributions.some(owned)
          : this._quantityChanges.some(owned);
      if (!found) {
        failed.push(missingEntry({ kind, id }));
        continue;
      }
      if (kind === "contribution") {
        this._contributions = this._contributions.filter((e) => !owned(e));
      } else {
        this._quantityChanges = this._quantityChanges.filter((e) => !owned(e));
      }
      removed.push({ kind, id });
    }
    return summarizeRemovals(removed, failed);
  }

  async rewriteContributions(
    guildId: string,
    key: ItemKey,
    rewriter: ContributionRewriter,
  ): Promise<RewriteResult> {
    requireIdentifier(guildId, "guildId");
    const itemKey = normalizeItemKey(key);

    const before = this._selectContributions(guildId, itemKey);
    const rewrite = rewriter(before);
    if (rewrite === undefined) {
      return { applied: false, before, after: before, correction: undefined };
    }

    // Validate everything before touching state
    validateRewrite(before, rewrite);
    const correction =
      rewrite.correction === undefined
        ? undefined
        : stampAfter(
            normalizeQuantityChange(rewrite.correction, this._now),
            this._latestOccurredAt(guildId, itemKey),
          );

    const after = applyRewrite(before, rewrite);
    const survivors = new Map(after.map((e) => [e.id, e]));
    const rewritten = new Set(before.map((e) => e.id));

    this._contributions = this._contributions.flatMap((e) => {
      if (!rewritten.has(e.id)) return [e];
      const next = survivors.get(e.id);
      return next === undefined ? [] : [next];
    });

    return {
      applied: true,
      before,
      after,
      correction: correction === undefined ? undefined : this._insertQuantityChange(correction),
    };
  }

  // ─── Archives ───────────────────────────────────────────────────────

  async archiveGuild(input: ArchiveInput): Promise<LedgerArchive> {
    const request = normalizeArchiveInput(input);
    const archivedAt = this._now().toISOString();

    const contributions = this._contributions
      .filter((e) => e.guildId === request.guildId)
      .sort(compareEvents);
    const quantityChanges = this._quantityChanges
      .filter((e) => e.guildId === request.guildId)
      .sort(compareEvents);

    const data = buildArchiveSnapshot(
      contributions,
      quantityChanges,
      archivedAt,
      request.resetQuantityChanges,
    );

    const summary: ArchiveSummary = {
      id: this._nextArchiveId++,
      guildId: request.guildId,
      archiveName: request.archiveName,
      description: request.description,
      notes: request.notes,
      createdAt: archivedAt,
      createdBy: request.createdBy,
      dataHash: computeArchiveHash(data),
      totalContributions: data.totalContributions,
      totalQuantityChanges: data.totalQuantityChanges,
    };
    this._archives.push({ summary, json: JSON.stringify(data) });

    this._contributions = this._contributions.filter((e) => e.guildId !== request.guildId);
    if (request.resetQuantityChanges) {
      this._quantityChanges = this._quantityChanges.filter(
        (e) => e.guildId !== request.guildId,
      );
    }

    return { ...summary, data };
  }

  async getArchive(id: number): Promise<LedgerArchive | undefined> {
    const stored = this._archives.find((a) => a.summary.id === id);
    if (stored === undefined) {
      return undefined;
    }
    return {
      ...stored.summary,
      data: parseArchiveSnapshot(stored.json, stored.summary.dataHash),
    };
  }

  async listArchives(guildId: string): Promise<readonly ArchiveSummary[]> {
    requireIdentifier(guildId, "guildId");
    return this._archives
      .filter((a) => a.summary.guildId === guildId)
      .map((a) => a.summary)
      .sort((a, b) =>
        a.createdAt === b.createdAt
          ? b.id - a.id
          : a.createdAt < b.createdAt ? 1 : -1,
      );
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private _insertQuantityChange(record: NewQuantityChange): QuantityChangeEvent {
    const event: QuantityChangeEvent = { ...record, id: this._nextEventId++ };
    this._quantityChanges.push(event);
    return event;
  }

  private _selectContributions(guildId: string, key: ItemKey): ContributionEvent[] {
    return this._contributions
      .filter(
        (e) =>
          e.guildId === guildId &&
          e.category === key.category &&
          e.itemName === key.itemName,
      )
      .sort(compareEvents);
  }

  private _latestOccurredAt(guildId: string, key: ItemKey): string | undefined {
    let latest: string | undefined;
    for (const e of [...this._contributions, ...this._quantityChanges]) {
      if (
        e.guildId === guildId &&
        e.category === key.category &&
        e.itemName === key.itemName &&
        (latest === undefined || e.occurredAt > latest)
      ) {
        latest = e.occurredAt;
      }
    }
    return latest;
  }
}
