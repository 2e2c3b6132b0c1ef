/**
 * @stockpile/node: Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 */

import { z } from "zod";
import type { RetryConfig, StorageHandleOptions } from "@stockpile/storage";

// =============================================================================
// Schema
// =============================================================================

export const ConfigSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  HOST: z.string().default("0.0.0.0"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // Storage
  DATABASE_PATH: z.string().min(1).default("data/stockpile.db"),
  DB_BUSY_TIMEOUT_MS: z.coerce.number().int().min(0).default(30000),
  DB_MAX_ATTEMPTS: z.coerce.number().int().min(1).max(20).default(5),
  DB_RETRY_BASE_DELAY_MS: z.coerce.number().int().min(0).default(100),
  DB_RETRY_MAX_DELAY_MS: z.coerce.number().int().min(0).default(5000),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if env vars are invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  return ConfigSchema.parse(env);
}

/**
 * StorageHandle settings derived from the loaded config.
 */
export function storageOptions(
  config: AppConfig,
): Pick<StorageHandleOptions, "filePath" | "busyTimeoutMs"> & {
  readonly retry: Partial<RetryConfig>;
} {
  return {
    filePath: config.DATABASE_PATH,
    busyTimeoutMs: config.DB_BUSY_TIMEOUT_MS,
    retry: {
      maxAttempts: config.DB_MAX_ATTEMPTS,
      baseDelayMs: config.DB_RETRY_BASE_DELAY_MS,
      maxDelayMs: config.DB_RETRY_MAX_DELAY_MS,
    },
  };
}
