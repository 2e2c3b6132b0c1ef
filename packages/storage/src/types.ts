/**
 * @stockpile/storage: Core types.
 */

import type Database from "better-sqlite3";

/** An open SQLite connection. */
export type Connection = Database.Database;

/** Positional bind parameters for a prepared statement. */
export type SqlParams = readonly unknown[];

/**
 * Opens a connection. Injected so tests can count or fail connection attempts.
 */
export type ConnectionFactory = (
  filePath: string,
  options: { readonly timeoutMs: number },
) => Connection;

/**
 * Runs on every fresh connection, after the pragmas (schema creation).
 */
export type ConnectionInitializer = (db: Connection) => void;

// =============================================================================
// Errors
// =============================================================================

/**
 * Error codes for storage operations.
 */
export type StorageErrorCode =
  | "STORAGE_UNAVAILABLE"
  | "STORAGE_CLOSED";

/**
 * Error thrown by StorageHandle.
 *
 * STORAGE_UNAVAILABLE carries the last underlying failure as `cause`.
 */
export class StorageError extends Error {
  constructor(
    public readonly code: StorageErrorCode,
    message: string,
    options?: { readonly cause?: unknown },
  ) {
    super(message, options);
    this.name = "StorageError";
  }
}
