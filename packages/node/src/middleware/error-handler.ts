/**
 * Global error handler middleware.
 *
 * Catches all errors thrown by route handlers and produces
 * a consistent error envelope response.
 *
 * Domain errors carry a string `code`; the code picks the HTTP status.
 * Anything unrecognised becomes a 500 with a generic message.
 */

import type { Context } from "hono";
import type { Logger } from "pino";
import { EventStoreError } from "@stockpile/event-store";
import { LedgerError } from "@stockpile/ledger";
import { StorageError } from "@stockpile/storage";
import type { AppEnv } from "../types/api-contract.js";
import { createErrorEnvelope } from "../types/error.js";
import type { DomainErrorCode } from "../types/error.js";

// =============================================================================
// Domain Error → HTTP Status Mapping
// =============================================================================

type ErrorStatus = 400 | 404 | 500 | 503;

const STATUS_MAP: Readonly<Partial<Record<DomainErrorCode, ErrorStatus>>> = {
  // Validation
  INVALID_QUANTITY: 400,
  INVALID_TOTAL: 400,
  INVALID_ADJUSTMENT: 400,
  MISSING_REASON: 400,
  INVALID_IDENTIFIER: 400,
  INVALID_TIMESTAMP: 400,
  INVALID_QUERY: 400,
  INVALID_REWRITE: 400,
  INVALID_ARCHIVE: 400,

  // Storage
  STORAGE_UNAVAILABLE: 503,
  STORAGE_CLOSED: 503,
  ARCHIVE_CORRUPT: 500,
};

function domainCode(err: Error): DomainErrorCode | undefined {
  if (err instanceof EventStoreError || err instanceof LedgerError || err instanceof StorageError) {
    return err.code;
  }
  return undefined;
}

// =============================================================================
// Middleware
// =============================================================================

/**
 * Build the onError handler. Unexpected errors are logged with the
 * request id; expected domain errors are not.
 */
export function createErrorHandler(logger?: Logger): (err: Error, c: Context<AppEnv>) => Response {
  return (err, c) => {
    const code = domainCode(err);
    const status = (code !== undefined ? STATUS_MAP[code] : undefined) ?? 500;

    if (status >= 500) {
      logger?.error({ err, requestId: c.get("requestId") }, "request.failed");
    }

    // Don't leak internal details
    const envelope =
      status === 500
        ? createErrorEnvelope("INTERNAL_ERROR", "Internal server error")
        : createErrorEnvelope(code ?? "INTERNAL_ERROR", err.message);

    return c.json(envelope, status);
  };
}

/** Error handler without logging. */
export const handleError = createErrorHandler();
