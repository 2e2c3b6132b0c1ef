/**
 * @stockpile/event-store: Ledger event persistence.
 *
 * Provides:
 * - EventStore interface over contributions and quantity changes
 * - SqliteEventStore for durable storage through a StorageHandle
 * - InMemoryEventStore for tests and development
 * - Archive snapshots with canonical SHA-256 integrity hashes
 *
 * @packageDocumentation
 */

// Core types
export type {
  AppendContributionInput,
  AppendQuantityChangeInput,
  ReadDirection,
  EventCursor,
  QueryOptions,
  QuantityUpdate,
  ContributionRewrite,
  ContributionRewriter,
  RewriteResult,
  EventRef,
  FailedRemoval,
  BulkRemovalResult,
  ArchiveInput,
  ArchiveSnapshot,
  ArchiveSummary,
  LedgerArchive,
  EventStoreOptions,
  EventStore,
  EventStoreErrorCode,
} from "./types.js";
export { EventStoreError } from "./types.js";

// Ordering
export { compareEvents, isPastCursor, sortEvents, cursorOf } from "./ordering.js";

// Validation
export { parseTimestamp, normalizeItemKey, summarizeRemovals } from "./validation.js";

// Archives
export {
  computeArchiveHash,
  buildArchiveSnapshot,
  parseArchiveSnapshot,
} from "./archive.js";

// Implementations
export { LEDGER_SCHEMA_SQL, applyLedgerSchema } from "./schema.js";
export { SqliteEventStore } from "./sqlite-store.js";
export { InMemoryEventStore } from "./in-memory-store.js";
