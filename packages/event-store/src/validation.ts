/**
 * Input validation shared by every EventStore implementation.
 *
 * Each normalize*() function either returns the exact record to persist
 * (minus id) or throws EventStoreError. Stores never write unvalidated input.
 */

import type {
  ContributionEvent,
  ItemKey,
  QuantityChangeEvent,
} from "@stockpile/types";
import type {
  AppendContributionInput,
  AppendQuantityChangeInput,
  ArchiveInput,
  BulkRemovalResult,
  ContributionRewrite,
  EventCursor,
  EventRef,
  FailedRemoval,
  QueryOptions,
} from "./types.js";
import { EventStoreError } from "./types.js";

export type NewContribution = Omit<ContributionEvent, "id">;
export type NewQuantityChange = Omit<QuantityChangeEvent, "id">;

/**
 * Query options with defaults applied.
 */
export interface NormalizedQuery extends QueryOptions {
  readonly direction: "forward" | "backward";
}

export interface NormalizedArchiveInput {
  readonly guildId: string;
  readonly archiveName: string;
  readonly description: string;
  readonly notes: string | null;
  readonly createdBy: string;
  readonly resetQuantityChanges: boolean;
}

// =============================================================================
// Scalars
// =============================================================================

export function requireIdentifier(value: string, field: string): string {
  if (typeof value !== "string" || value.trim().length === 0) {
    throw new EventStoreError(
      "INVALID_IDENTIFIER",
      `${field} must be a non-empty string`,
    );
  }
  return value;
}

export function requirePositiveQuantity(value: number, field: string): number {
  if (!Number.isSafeInteger(value) || value <= 0) {
    throw new EventStoreError(
      "INVALID_QUANTITY",
      `${field} must be a positive integer, got ${String(value)}`,
    );
  }
  return value;
}

export function requireNonNegativeQuantity(value: number, field: string): number {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new EventStoreError(
      "INVALID_QUANTITY",
      `${field} must be a non-negative integer, got ${String(value)}`,
    );
  }
  return value;
}

/**
 * Parse a timestamp into canonical ISO 8601 (UTC, millisecond precision),
 * so that string order equals time order.
 */
export function parseTimestamp(value: string): string {
  const parsed = new Date(value);
  if (typeof value !== "string" || Number.isNaN(parsed.getTime())) {
    throw new EventStoreError(
      "INVALID_TIMESTAMP",
      `Invalid timestamp: ${String(value)}`,
    );
  }
  return parsed.toISOString();
}

export function normalizeTimestamp(
  value: string | undefined,
  now: () => Date,
): string {
  return value === undefined ? now().toISOString() : parseTimestamp(value);
}

function normalizeNotes(notes: string | null | undefined): string | null {
  if (notes === undefined || notes === null || notes.trim().length === 0) {
    return null;
  }
  return notes;
}

export function normalizeItemKey(key: ItemKey): ItemKey {
  return {
    category: requireIdentifier(key.category, "category"),
    itemName: requireIdentifier(key.itemName, "itemName"),
  };
}

// =============================================================================
// Appends
// =============================================================================

export function normalizeContribution(
  input: AppendContributionInput,
  now: () => Date,
): NewContribution {
  return {
    kind: "contribution",
    guildId: requireIdentifier(input.guildId, "guildId"),
    actorId: requireIdentifier(input.actorId, "actorId"),
    category: requireIdentifier(input.category, "category"),
    itemName: requireIdentifier(input.itemName, "itemName"),
    quantity: requirePositiveQuantity(input.quantity, "quantity"),
    occurredAt: normalizeTimestamp(input.occurredAt, now),
  };
}

export function normalizeQuantityChange(
  input: AppendQuantityChangeInput,
  now: () => Date,
): NewQuantityChange {
  if (typeof input.reason !== "string" || input.reason.trim().length === 0) {
    throw new EventStoreError(
      "MISSING_REASON",
      "A quantity change requires a non-blank reason",
    );
  }

  return {
    kind: "quantity_change",
    guildId: requireIdentifier(input.guildId, "guildId"),
    itemName: requireIdentifier(input.itemName, "itemName"),
    category: requireIdentifier(input.category, "category"),
    oldQuantity: requireNonNegativeQuantity(input.oldQuantity, "oldQuantity"),
    newQuantity: requireNonNegativeQuantity(input.newQuantity, "newQuantity"),
    reason: input.reason.trim(),
    notes: normalizeNotes(input.notes),
    actorId: requireIdentifier(input.actorId, "actorId"),
    occurredAt: normalizeTimestamp(input.occurredAt, now),
  };
}

// =============================================================================
// Queries
// =============================================================================

export function normalizeQuery(options: QueryOptions = {}): NormalizedQuery {
  const { limit, after } = options;

  if (limit !== undefined && (!Number.isSafeInteger(limit) || limit < 1)) {
    throw new EventStoreError(
      "INVALID_QUERY",
      `limit must be a positive integer, got ${String(limit)}`,
    );
  }

  let cursor: EventCursor | undefined;
  if (after !== undefined) {
    if (!Number.isSafeInteger(after.id) || after.id < 0) {
      throw new EventStoreError(
        "INVALID_QUERY",
        `Cursor id must be a non-negative integer, got ${String(after.id)}`,
      );
    }
    cursor = { id: after.id, occurredAt: parseTimestamp(after.occurredAt) };
  }

  return {
    ...options,
    after: cursor,
    direction: options.direction ?? "forward",
  };
}

// =============================================================================
// Rewrites
// =============================================================================

/**
 * Check a rewrite plan against the records it was computed from.
 *
 * Every referenced id must belong to `records`, an id may be touched once,
 * and updated quantities must stay positive.
 */
export function validateRewrite(
  records: readonly ContributionEvent[],
  rewrite: ContributionRewrite,
): void {
  const known = new Set(records.map((r) => r.id));
  const touched = new Set<number>();

  const claim = (id: number): void => {
    if (!known.has(id)) {
      throw new EventStoreError(
        "INVALID_REWRITE",
        `Contribution ${id} is not part of this item's records`,
      );
    }
    if (touched.has(id)) {
      throw new EventStoreError(
        "INVALID_REWRITE",
        `Contribution ${id} appears more than once in the rewrite`,
      );
    }
    touched.add(id);
  };

  for (const update of rewrite.updates) {
    claim(update.id);
    if (!Number.isSafeInteger(update.quantity) || update.quantity <= 0) {
      throw new EventStoreError(
        "INVALID_REWRITE",
        `Contribution ${update.id} must be updated to a positive integer or deleted`,
      );
    }
  }

  for (const id of rewrite.deletions) {
    claim(id);
  }
}

/**
 * Move a correction's timestamp forward to `latest`, the newest event on
 * its item key, so that replay applies the correction last.
 */
export function stampAfter(
  correction: NewQuantityChange,
  latest: string | undefined,
): NewQuantityChange {
  if (latest === undefined || latest <= correction.occurredAt) {
    return correction;
  }
  return { ...correction, occurredAt: latest };
}

/**
 * Apply a validated rewrite to records, preserving order.
 */
export function applyRewrite(
  records: readonly ContributionEvent[],
  rewrite: ContributionRewrite,
): ContributionEvent[] {
  const updates = new Map(rewrite.updates.map((u) => [u.id, u.quantity]));
  const deletions = new Set(rewrite.deletions);

  return records
    .filter((r) => !deletions.has(r.id))
    .map((r) => {
      const quantity = updates.get(r.id);
      return quantity === undefined ? r : { ...r, quantity };
    });
}

// =============================================================================
// Removals
// =============================================================================

const KIND_LABELS = {
  contribution: "Contribution",
  quantity_change: "Quantity change",
} as const;

/**
 * Why `entry` cannot be removed before the store is consulted, or undefined
 * if it is well formed.
 */
export function checkRemovalEntry(entry: EventRef): string | undefined {
  if (entry.kind !== "contribution" && entry.kind !== "quantity_change") {
    return `Invalid event kind: ${String(entry.kind)}`;
  }
  if (!Number.isSafeInteger(entry.id) || entry.id < 1) {
    return `Invalid event id: ${String(entry.id)}`;
  }
  return undefined;
}

export function missingEntry(entry: EventRef): FailedRemoval {
  return { ...entry, message: `${KIND_LABELS[entry.kind]} ${entry.id} not found` };
}

/**
 * Count removed entries per kind.
 */
export function summarizeRemovals(
  removed: readonly EventRef[],
  failed: readonly FailedRemoval[],
): BulkRemovalResult {
  const contributionsRemoved = removed.filter((e) => e.kind === "contribution").length;
  return {
    totalRemoved: removed.length,
    contributionsRemoved,
    quantityChangesRemoved: removed.length - contributionsRemoved,
    removed,
    failed,
  };
}

// =============================================================================
// Archives
// =============================================================================

export function normalizeArchiveInput(input: ArchiveInput): NormalizedArchiveInput {
  if (typeof input.archiveName !== "string" || input.archiveName.trim().length === 0) {
    throw new EventStoreError("INVALID_ARCHIVE", "archiveName must be non-blank");
  }
  if (typeof input.description !== "string" || input.description.trim().length === 0) {
    throw new EventStoreError("INVALID_ARCHIVE", "description must be non-blank");
  }

  return {
    guildId: requireIdentifier(input.guildId, "guildId"),
    archiveName: input.archiveName.trim(),
    description: input.description.trim(),
    notes: normalizeNotes(input.notes),
    createdBy: requireIdentifier(input.createdBy, "createdBy"),
    resetQuantityChanges: input.resetQuantityChanges ?? false,
  };
}
