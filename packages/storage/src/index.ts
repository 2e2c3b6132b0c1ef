/**
 * @stockpile/storage: Shared SQLite connection and concurrency primitives.
 *
 * Provides:
 * - StorageHandle: the single connection, with reconnect and backoff
 * - withRetry: generic retry with exponential backoff
 * - Mutex / KeyedMutex: FIFO async locks
 * - createLogger: pino logger factory
 *
 * @packageDocumentation
 */

export type {
  Connection,
  ConnectionFactory,
  ConnectionInitializer,
  SqlParams,
  StorageErrorCode,
} from "./types.js";
export { StorageError } from "./types.js";

export type { RetryConfig, RetryListener } from "./retry.js";
export {
  DEFAULT_RETRY_CONFIG,
  RetryExhaustedError,
  computeDelay,
  isTransientStorageError,
  resolveRetryConfig,
  sleep,
  withRetry,
} from "./retry.js";

export { Mutex, KeyedMutex } from "./mutex.js";

export type { LoggerOptions } from "./logger.js";
export { createLogger, silentLogger } from "./logger.js";

export type { StorageHandleOptions } from "./storage-handle.js";
export {
  StorageHandle,
  DEFAULT_BUSY_TIMEOUT_MS,
  applyConnectionPragmas,
  openDatabase,
} from "./storage-handle.js";
