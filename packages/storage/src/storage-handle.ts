/**
 * @stockpile/storage: Shared SQLite connection with resilient execution.
 *
 * One StorageHandle owns the process's single connection to the ledger file.
 * Every other component routes its statements through it.
 *
 * Connection lifecycle:
 * - Opened lazily on first use (acquire)
 * - (Re)creation is serialized by a mutex; ordinary statements take no lock
 * - On open: WAL journal, NORMAL sync, busy timeout, in-memory temp store,
 *   foreign keys, then the caller's initializer (schema)
 * - Discarded after a transient failure and reopened on the next attempt
 *
 * Retry: transient failures are retried with exponential backoff. Once
 * attempts run out the caller gets StorageError("STORAGE_UNAVAILABLE").
 * Anything else propagates unchanged on first occurrence.
 */

import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import Database from "better-sqlite3";
import type { Logger } from "pino";
import { silentLogger } from "./logger.js";
import { Mutex } from "./mutex.js";
import {
  isTransientStorageError,
  resolveRetryConfig,
  RetryExhaustedError,
  sleep,
  withRetry,
} from "./retry.js";
import type { RetryConfig } from "./retry.js";
import type {
  Connection,
  ConnectionFactory,
  ConnectionInitializer,
  SqlParams,
} from "./types.js";
import { StorageError } from "./types.js";

export const DEFAULT_BUSY_TIMEOUT_MS = 30_000;

/**
 * Options for creating a StorageHandle.
 */
export interface StorageHandleOptions {
  /** Path to the SQLite file, or ":memory:" */
  readonly filePath: string;

  /** SQLite busy timeout. Default: 30000 */
  readonly busyTimeoutMs?: number;

  /** Backoff overrides. Defaults: 5 attempts, 100 ms doubling, 5 s ceiling */
  readonly retry?: Partial<RetryConfig>;

  /** Which failures are retried. Default: isTransientStorageError */
  readonly shouldRetry?: (err: unknown) => boolean;

  /** Runs on every fresh connection (schema creation) */
  readonly initialize?: ConnectionInitializer;

  /** Connection factory. Default: better-sqlite3 */
  readonly connect?: ConnectionFactory;

  /** Backoff sleep. Injectable for tests */
  readonly sleep?: (ms: number) => Promise<void>;

  readonly logger?: Logger;
}

/**
 * Open a better-sqlite3 connection, creating the parent directory of a
 * file-backed database.
 */
export const openDatabase: ConnectionFactory = (filePath, { timeoutMs }) => {
  if (filePath !== ":memory:") {
    mkdirSync(dirname(filePath), { recursive: true });
  }
  return new Database(filePath, { timeout: timeoutMs });
};

/**
 * Apply durability and concurrency settings to a fresh connection.
 */
export function applyConnectionPragmas(db: Connection, busyTimeoutMs: number): void {
  db.pragma("journal_mode = WAL");
  db.pragma("synchronous = NORMAL");
  db.pragma(`busy_timeout = ${Math.trunc(busyTimeoutMs)}`);
  db.pragma("temp_store = MEMORY");
  db.pragma("foreign_keys = ON");
}

export class StorageHandle {
  private readonly _filePath: string;
  private readonly _busyTimeoutMs: number;
  private readonly _retry: RetryConfig;
  private readonly _shouldRetry: (err: unknown) => boolean;
  private readonly _initialize: ConnectionInitializer | undefined;
  private readonly _connect: ConnectionFactory;
  private readonly _sleep: (ms: number) => Promise<void>;
  private readonly _logger: Logger;

  /** Guards connection (re)creation and close */
  private readonly _connectionLock = new Mutex();

  private _db: Connection | undefined;
  private _closed = false;
  private _connectionCount = 0;

  constructor(options: StorageHandleOptions) {
    this._filePath = options.filePath;
    this._busyTimeoutMs = options.busyTimeoutMs ?? DEFAULT_BUSY_TIMEOUT_MS;
    this._retry = resolveRetryConfig(options.retry);
    this._shouldRetry = options.shouldRetry ?? isTransientStorageError;
    this._initialize = options.initialize;
    this._connect = options.connect ?? openDatabase;
    this._sleep = options.sleep ?? sleep;
    this._logger = options.logger ?? silentLogger();
  }

  // ─── Connection ─────────────────────────────────────────────────────

  /**
   * Get the shared connection, opening it if needed.
   *
   * @throws StorageError("STORAGE_CLOSED") after close()
   */
  async acquire(): Promise<Connection> {
    this._assertOpen();

    const current = this._db;
    if (current !== undefined) {
      return current;
    }

    return this._connectionLock.runExclusive(() => {
      this._assertOpen();
      if (this._db !== undefined) {
        return this._db;
      }
      const db = this._openConnection();
      this._db = db;
      return db;
    });
  }

  /**
   * Close the connection. Further use rejects with STORAGE_CLOSED.
   */
  async close(): Promise<void> {
    await this._connectionLock.runExclusive(() => {
      if (this._closed) {
        return;
      }
      this._closed = true;

      const db = this._db;
      this._db = undefined;
      if (db !== undefined) {
        db.close();
        this._logger.info({ filePath: this._filePath }, "storage.closed");
      }
    });
  }

  // ─── Execution ──────────────────────────────────────────────────────

  /**
   * Run `work` against the connection, retrying transient failures.
   *
   * `work` is synchronous, so nothing else touches the connection while it
   * runs. It may be called more than once; it must not have side effects
   * outside the database.
   */
  async execute<T>(work: (db: Connection) => T): Promise<T> {
    try {
      return await withRetry(
        async () => {
          const db = await this.acquire();
          try {
            return work(db);
          } catch (err: unknown) {
            if (this._shouldRetry(err)) {
              await this._discard(db);
            }
            throw err;
          }
        },
        this._retry,
        this._shouldRetry,
        this._sleep,
        ({ attempt, delayMs, error }) => {
          this._logger.warn(
            { attempt, delayMs, err: error },
            "storage.retry",
          );
        },
      );
    } catch (err: unknown) {
      if (err instanceof RetryExhaustedError) {
        this._logger.error(
          { attempts: err.attempts, err: err.lastError },
          "storage.unavailable",
        );
        throw new StorageError(
          "STORAGE_UNAVAILABLE",
          `Storage unavailable after ${err.attempts} attempts: ${describe(err.lastError)}`,
          { cause: err.lastError },
        );
      }
      throw err;
    }
  }

  /**
   * Run `work` inside one BEGIN IMMEDIATE transaction.
   *
   * Commits when `work` returns, rolls back when it throws. A transient
   * failure retries the whole transaction.
   */
  transaction<T>(work: (db: Connection) => T): Promise<T> {
    return this.execute((db) => db.transaction(() => work(db)).immediate());
  }

  run(sql: string, params: SqlParams = []): Promise<Database.RunResult> {
    return this.execute((db) => db.prepare(sql).run(...params));
  }

  all<Row>(sql: string, params: SqlParams = []): Promise<Row[]> {
    return this.execute((db) => db.prepare<unknown[], Row>(sql).all(...params));
  }

  get<Row>(sql: string, params: SqlParams = []): Promise<Row | undefined> {
    return this.execute((db) => db.prepare<unknown[], Row>(sql).get(...params));
  }

  // ─── Introspection ──────────────────────────────────────────────────

  get filePath(): string {
    return this._filePath;
  }

  /** True while a connection is open. */
  get isConnected(): boolean {
    return this._db !== undefined;
  }

  get isClosed(): boolean {
    return this._closed;
  }

  /** Number of connections opened so far (1 + reconnects). */
  get connectionCount(): number {
    return this._connectionCount;
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private _assertOpen(): void {
    if (this._closed) {
      throw new StorageError("STORAGE_CLOSED", "Storage handle has been closed");
    }
  }

  private _openConnection(): Connection {
    const db = this._connect(this._filePath, { timeoutMs: this._busyTimeoutMs });
    try {
      applyConnectionPragmas(db, this._busyTimeoutMs);
      this._initialize?.(db);
    } catch (err: unknown) {
      db.close();
      throw err;
    }

    this._connectionCount++;
    this._logger.info(
      { filePath: this._filePath, connection: this._connectionCount },
      "storage.connected",
    );
    return db;
  }

  /**
   * Drop a connection that failed, unless another caller already replaced it.
   */
  private async _discard(db: Connection): Promise<void> {
    await this._connectionLock.runExclusive(() => {
      if (this._db !== db) {
        return;
      }
      this._db = undefined;
      try {
        db.close();
      } catch (closeErr: unknown) {
        this._logger.warn({ err: closeErr }, "storage.close_failed");
      }
    });
  }
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
