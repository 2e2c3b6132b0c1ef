/**
 * Failure bodies returned by the ledger API.
 *
 * Every non-2xx response carries exactly one `error` object. Its `code` is
 * either one of the transport codes below or the code of the ledger error
 * that caused it, so clients can branch on INVALID_QUANTITY or
 * MISSING_REASON without parsing messages.
 */

import type { EventStoreErrorCode } from "@stockpile/event-store";
import type { LedgerErrorCode } from "@stockpile/ledger";
import type { StorageErrorCode } from "@stockpile/storage";

// =============================================================================
// Error Codes
// =============================================================================

/**
 * Codes raised by the HTTP layer itself: bad input, unknown route or
 * resource, and the masked form of any server-side failure.
 */
export type ApiErrorCode =
  | "VALIDATION_ERROR"
  | "NOT_FOUND"
  | "INTERNAL_ERROR";

/** Codes thrown by the ledger packages and passed through to clients. */
export type DomainErrorCode = EventStoreErrorCode | LedgerErrorCode | StorageErrorCode;

export type ResponseErrorCode = ApiErrorCode | DomainErrorCode;

// =============================================================================
// Error Response
// =============================================================================

export interface ErrorDetail {
  readonly code: ResponseErrorCode;
  readonly message: string;
  /** Validation issues, when the request failed a schema */
  readonly details?: Record<string, unknown>;
}

export interface ErrorEnvelope {
  readonly error: ErrorDetail;
}

// =============================================================================
// Factory
// =============================================================================

export function createErrorEnvelope(
  code: ResponseErrorCode,
  message: string,
  details?: Record<string, unknown>,
): ErrorEnvelope {
  return details === undefined
    ? { error: { code, message } }
    : { error: { code, message, details } };
}
