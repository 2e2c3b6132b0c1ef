/**
 * @stockpile/storage: Retry with exponential backoff.
 *
 * Generic retry utility for transient failures. StorageHandle uses it to
 * re-run statements after SQLite lock contention or a dropped connection.
 *
 * Backoff formula: min(baseDelayMs * 2^attempt + jitter, maxDelayMs)
 * where jitter = random(0, jitterMs)
 */

/**
 * Configuration for retry behavior.
 */
export interface RetryConfig {
  /** Maximum number of attempts (including the first try). Default: 5 */
  readonly maxAttempts: number;
  /** Base delay in ms before first retry. Default: 100 */
  readonly baseDelayMs: number;
  /** Maximum delay in ms between retries. Default: 5000 */
  readonly maxDelayMs: number;
  /** Maximum random jitter in ms added to each delay. Default: 0 */
  readonly jitterMs: number;
}

/**
 * Default retry configuration.
 */
export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxAttempts: 5,
  baseDelayMs: 100,
  maxDelayMs: 5000,
  jitterMs: 0,
};

/**
 * Error thrown when all retry attempts are exhausted.
 */
export class RetryExhaustedError extends Error {
  constructor(
    /** Number of attempts made */
    public readonly attempts: number,
    /** The last error encountered */
    public readonly lastError: unknown,
  ) {
    const msg = lastError instanceof Error ? lastError.message : String(lastError);
    super(`All ${attempts} retry attempts exhausted. Last error: ${msg}`);
    this.name = "RetryExhaustedError";
  }
}

/**
 * Called before each backoff sleep.
 */
export type RetryListener = (info: {
  readonly attempt: number;
  readonly delayMs: number;
  readonly error: unknown;
}) => void | Promise<void>;

/**
 * Sleep for the specified duration.
 * Injectable through StorageHandleOptions.sleep.
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Compute the delay before the next retry attempt.
 *
 * @param attempt - Zero-based attempt index (0 = first retry)
 * @returns Delay in milliseconds
 */
export function computeDelay(attempt: number, config: RetryConfig): number {
  const exponential = config.baseDelayMs * Math.pow(2, attempt);
  const jitter = Math.random() * config.jitterMs;
  return Math.min(exponential + jitter, config.maxDelayMs);
}

/**
 * Merge partial overrides onto the defaults.
 *
 * @throws RangeError if maxAttempts is below 1 or a delay is negative
 */
export function resolveRetryConfig(
  overrides: Partial<RetryConfig> = {},
): RetryConfig {
  const config: RetryConfig = { ...DEFAULT_RETRY_CONFIG, ...overrides };
  if (!Number.isInteger(config.maxAttempts) || config.maxAttempts < 1) {
    throw new RangeError(`maxAttempts must be a positive integer, got ${config.maxAttempts}`);
  }
  if (config.baseDelayMs < 0 || config.maxDelayMs < 0 || config.jitterMs < 0) {
    throw new RangeError("Retry delays must be non-negative");
  }
  return config;
}

/**
 * Execute a function with retry on failure.
 *
 * @param fn - The async function to execute
 * @param shouldRetry - Predicate to determine if an error is retryable (default: all errors)
 * @param sleepFn - Sleep function (injectable for testing)
 * @param onRetry - Invoked before each backoff sleep; an async listener is awaited
 * @throws RetryExhaustedError if all attempts fail
 * @throws The original error if shouldRetry returns false
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  config: RetryConfig = DEFAULT_RETRY_CONFIG,
  shouldRetry: (err: unknown) => boolean = () => true,
  sleepFn: (ms: number) => Promise<void> = sleep,
  onRetry?: RetryListener,
): Promise<T> {
  let lastError: unknown;

  for (let attempt = 0; attempt < config.maxAttempts; attempt++) {
    try {
      return await fn();
    } catch (err: unknown) {
      lastError = err;

      if (!shouldRetry(err)) {
        throw err;
      }

      // Last attempt: no sleep, fall through to throw
      if (attempt < config.maxAttempts - 1) {
        const delay = computeDelay(attempt, config);
        if (onRetry !== undefined) {
          await onRetry({ attempt: attempt + 1, delayMs: delay, error: err });
        }
        await sleepFn(delay);
      }
    }
  }

  throw new RetryExhaustedError(config.maxAttempts, lastError);
}

// SQLite primary result codes that clear up on their own: lock contention,
// I/O hiccups, a file that could not be opened yet. Extended codes
// (SQLITE_BUSY_SNAPSHOT, SQLITE_IOERR_SHORT_READ, ...) share the prefix.
const TRANSIENT_SQLITE_PREFIXES = [
  "SQLITE_BUSY",
  "SQLITE_LOCKED",
  "SQLITE_IOERR",
  "SQLITE_CANTOPEN",
  "SQLITE_PROTOCOL",
] as const;

/**
 * Default storage retry predicate.
 *
 * Returns true for errors after which the statement was not applied and a
 * fresh attempt may succeed. Constraint violations, SQL errors and anything
 * that is not an Error are permanent.
 */
export function isTransientStorageError(err: unknown): boolean {
  if (!(err instanceof Error)) return false;

  if ("code" in err && typeof err.code === "string") {
    const code = err.code;
    return TRANSIENT_SQLITE_PREFIXES.some((prefix) => code.startsWith(prefix));
  }

  // better-sqlite3 throws a TypeError once the handle has been closed
  return err.message.includes("database connection is not open");
}
