/**
 * @stockpile/event-store: Core types.
 *
 * Defines the interface and types for ledger event persistence.
 *
 * Design principles:
 * - Two event kinds, one table each, ids from one shared sequence
 * - Reads are ordered by (occurredAt, id), which is a total order
 * - Contributions are rewritten only through rewriteContributions(),
 *   which applies a whole plan in one transaction
 * - Archival snapshots a guild's events and starts a new epoch
 */

import type {
  ContributionEvent,
  ItemKey,
  LedgerEvent,
  LedgerEventKind,
  QuantityChangeEvent,
} from "@stockpile/types";

// =============================================================================
// Append Inputs
// =============================================================================

/**
 * A new contribution.
 */
export interface AppendContributionInput {
  readonly guildId: string;
  readonly actorId: string;
  readonly category: string;
  readonly itemName: string;

  /** Must be a positive integer */
  readonly quantity: number;

  /** ISO 8601 timestamp. Default: the store clock */
  readonly occurredAt?: string | undefined;
}

/**
 * A new quantity change (absolute override).
 */
export interface AppendQuantityChangeInput {
  readonly guildId: string;
  readonly itemName: string;
  readonly category: string;

  /** What the caller believed the stock was (advisory) */
  readonly oldQuantity: number;

  /** Must be a non-negative integer */
  readonly newQuantity: number;

  /** Must be non-blank */
  readonly reason: string;

  readonly notes?: string | null | undefined;
  readonly actorId: string;
  readonly occurredAt?: string | undefined;
}

// =============================================================================
// Query Options
// =============================================================================

/**
 * Direction for reading events.
 */
export type ReadDirection = "forward" | "backward";

/**
 * Position of an event in (occurredAt, id) order.
 * Pass the last event read to resume after it.
 */
export interface EventCursor {
  readonly occurredAt: string;
  readonly id: number;
}

/**
 * Options for querying a guild's events.
 */
export interface QueryOptions {
  readonly itemName?: string | undefined;
  readonly category?: string | undefined;

  /** Only one kind of event. Default: both */
  readonly kind?: LedgerEventKind | undefined;

  /** Return only events past this cursor in the reading direction */
  readonly after?: EventCursor | undefined;

  /** Maximum number of events, applied after ordering. Default: unlimited */
  readonly limit?: number | undefined;

  /** Reading direction. Default: "forward" (oldest first) */
  readonly direction?: ReadDirection | undefined;
}

// =============================================================================
// Contribution Rewrite
// =============================================================================

/**
 * New quantity for an existing contribution.
 */
export interface QuantityUpdate {
  readonly id: number;
  /** Must be positive; use a deletion for zero */
  readonly quantity: number;
}

/**
 * Changes to apply to an item key's contributions, atomically.
 */
export interface ContributionRewrite {
  readonly updates: readonly QuantityUpdate[];
  readonly deletions: readonly number[];

  /** Quantity change appended in the same transaction */
  readonly correction?: AppendQuantityChangeInput | undefined;
}

/**
 * Decides a rewrite from the key's current contributions (oldest first).
 * Returning undefined leaves everything untouched.
 *
 * Must be pure: a storage retry may call it again.
 */
export type ContributionRewriter = (
  records: readonly ContributionEvent[],
) => ContributionRewrite | undefined;

/**
 * Outcome of rewriteContributions().
 */
export interface RewriteResult {
  /** False when the rewriter returned undefined */
  readonly applied: boolean;

  /** Contributions as read, before the rewrite */
  readonly before: readonly ContributionEvent[];

  /** Surviving contributions after the rewrite */
  readonly after: readonly ContributionEvent[];

  readonly correction: QuantityChangeEvent | undefined;
}

// =============================================================================
// Bulk Removal
// =============================================================================

/**
 * Names one event to remove.
 */
export interface EventRef {
  readonly kind: LedgerEventKind;
  readonly id: number;
}

/**
 * An entry removeEvents() could not remove, with the reason.
 */
export interface FailedRemoval extends EventRef {
  readonly message: string;
}

/**
 * Outcome of removeEvents(), one verdict per requested entry.
 */
export interface BulkRemovalResult {
  readonly totalRemoved: number;
  readonly contributionsRemoved: number;
  readonly quantityChangesRemoved: number;
  readonly removed: readonly EventRef[];
  readonly failed: readonly FailedRemoval[];
}

// =============================================================================
// Archives
// =============================================================================

/**
 * Request to archive a guild's ledger.
 */
export interface ArchiveInput {
  readonly guildId: string;
  readonly archiveName: string;
  readonly description: string;
  readonly notes?: string | null | undefined;
  readonly createdBy: string;

  /**
   * Also delete the guild's quantity changes. Default: false, so overrides
   * outlive the epoch and keep feeding replay.
   */
  readonly resetQuantityChanges?: boolean | undefined;
}

/**
 * Everything captured by an archive. Stored as JSON.
 */
export interface ArchiveSnapshot {
  readonly archivedAt: string;
  readonly totalContributions: number;
  readonly totalQuantityChanges: number;
  readonly quantityChangesReset: boolean;
  readonly contributions: readonly ContributionEvent[];
  readonly quantityChanges: readonly QuantityChangeEvent[];
}

/**
 * Archive metadata, without the snapshot body.
 */
export interface ArchiveSummary {
  readonly id: number;
  readonly guildId: string;
  readonly archiveName: string;
  readonly description: string;
  readonly notes: string | null;
  readonly createdAt: string;
  readonly createdBy: string;

  /** SHA-256 of the canonical JSON snapshot */
  readonly dataHash: string;

  readonly totalContributions: number;
  readonly totalQuantityChanges: number;
}

/**
 * A stored archive with its snapshot.
 */
export interface LedgerArchive extends ArchiveSummary {
  readonly data: ArchiveSnapshot;
}

// =============================================================================
// Event Store Interface
// =============================================================================

/**
 * Options shared by EventStore implementations.
 */
export interface EventStoreOptions {
  /** Clock for default timestamps. Default: () => new Date() */
  readonly now?: (() => Date) | undefined;
}

/**
 * Ledger event persistence.
 *
 * Invariants:
 * - Event ids are unique across both kinds and never reused
 * - queryEvents() order is deterministic: (occurredAt, id)
 * - A contribution is never stored with a negative quantity
 * - rewriteContributions() and archiveGuild() are atomic
 */
export interface EventStore {
  /**
   * Append a contribution.
   *
   * @throws EventStoreError INVALID_QUANTITY unless quantity is a positive integer
   */
  appendContribution(input: AppendContributionInput): Promise<ContributionEvent>;

  /**
   * Append a quantity change.
   *
   * @throws EventStoreError INVALID_QUANTITY, MISSING_REASON
   */
  appendQuantityChange(input: AppendQuantityChangeInput): Promise<QuantityChangeEvent>;

  /**
   * Read a guild's events of both kinds in (occurredAt, id) order.
   */
  queryEvents(guildId: string, options?: QueryOptions): Promise<readonly LedgerEvent[]>;

  getEvent(kind: LedgerEventKind, id: number): Promise<LedgerEvent | undefined>;

  /**
   * Contributions for one item key, oldest first.
   */
  listContributions(guildId: string, key: ItemKey): Promise<readonly ContributionEvent[]>;

  /**
   * Delete one event.
   *
   * @returns True if an event was deleted
   */
  deleteEvent(kind: LedgerEventKind, id: number): Promise<boolean>;

  /**
   * Delete several of a guild's events in one transaction. Entries that do
   * not exist, belong to another guild or were already named earlier in
   * the list are reported as failed; the rest are removed.
   */
  removeEvents(guildId: string, entries: readonly EventRef[]): Promise<BulkRemovalResult>;

  /**
   * Read an item key's contributions, let `rewriter` plan changes, and apply
   * them together with the optional correction event, in one transaction.
   *
   * @throws EventStoreError INVALID_REWRITE if the plan is inconsistent
   */
  rewriteContributions(
    guildId: string,
    key: ItemKey,
    rewriter: ContributionRewriter,
  ): Promise<RewriteResult>;

  /**
   * Snapshot a guild's events into an archive and clear its contributions
   * (and quantity changes when asked).
   */
  archiveGuild(input: ArchiveInput): Promise<LedgerArchive>;

  /**
   * @throws EventStoreError ARCHIVE_CORRUPT if the stored snapshot fails validation
   */
  getArchive(id: number): Promise<LedgerArchive | undefined>;

  /** Newest first. */
  listArchives(guildId: string): Promise<readonly ArchiveSummary[]>;
}

// =============================================================================
// Errors
// =============================================================================

/**
 * Error codes for EventStore operations.
 */
export type EventStoreErrorCode =
  | "INVALID_QUANTITY"
  | "MISSING_REASON"
  | "INVALID_IDENTIFIER"
  | "INVALID_TIMESTAMP"
  | "INVALID_QUERY"
  | "INVALID_REWRITE"
  | "INVALID_ARCHIVE"
  | "ARCHIVE_CORRUPT";

/**
 * Error thrown by EventStore operations.
 */
export class EventStoreError extends Error {
  constructor(
    public readonly code: EventStoreErrorCode,
    message: string,
    options?: { readonly cause?: unknown },
  ) {
    super(message, options);
    this.name = "EventStoreError";
  }
}
