/**
 * Archive snapshots.
 *
 * An archive freezes a guild's events at the end of an epoch. The snapshot
 * is stored as JSON alongside a SHA-256 of its RFC 8785 canonical form;
 * reading an archive re-validates both the shape and the hash.
 */

import { createHash } from "node:crypto";
import { canonicalize } from "json-canonicalize";
import type { ContributionEvent, QuantityChangeEvent } from "@stockpile/types";
import { isContributionEvent, isQuantityChangeEvent } from "@stockpile/types";
import type { ArchiveSnapshot } from "./types.js";
import { EventStoreError } from "./types.js";

/**
 * Hash of a snapshot. Key order does not affect the result.
 */
export function computeArchiveHash(snapshot: ArchiveSnapshot): string {
  return createHash("sha256").update(canonicalize(snapshot)).digest("hex");
}

export function buildArchiveSnapshot(
  contributions: readonly ContributionEvent[],
  quantityChanges: readonly QuantityChangeEvent[],
  archivedAt: string,
  quantityChangesReset: boolean,
): ArchiveSnapshot {
  return {
    archivedAt,
    totalContributions: contributions.length,
    totalQuantityChanges: quantityChanges.length,
    quantityChangesReset,
    contributions: [...contributions],
    quantityChanges: [...quantityChanges],
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

function corrupt(message: string, cause?: unknown): EventStoreError {
  return new EventStoreError("ARCHIVE_CORRUPT", message, { cause });
}

/**
 * Parse stored archive JSON and check it against its recorded hash.
 *
 * @throws EventStoreError ARCHIVE_CORRUPT
 */
export function parseArchiveSnapshot(raw: string, expectedHash: string): ArchiveSnapshot {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err: unknown) {
    throw corrupt("Archive data is not valid JSON", err);
  }

  if (!isRecord(parsed)) {
    throw corrupt("Archive data is not an object");
  }

  const {
    archivedAt,
    totalContributions,
    totalQuantityChanges,
    quantityChangesReset,
    contributions,
    quantityChanges,
  } = parsed;

  if (
    typeof archivedAt !== "string" ||
    typeof totalContributions !== "number" ||
    typeof totalQuantityChanges !== "number" ||
    typeof quantityChangesReset !== "boolean"
  ) {
    throw corrupt("Archive header fields are missing or mistyped");
  }

  if (!Array.isArray(contributions) || !contributions.every(isContributionEvent)) {
    throw corrupt("Archive contains malformed contributions");
  }
  if (!Array.isArray(quantityChanges) || !quantityChanges.every(isQuantityChangeEvent)) {
    throw corrupt("Archive contains malformed quantity changes");
  }

  if (
    totalContributions !== contributions.length ||
    totalQuantityChanges !== quantityChanges.length
  ) {
    throw corrupt("Archive totals do not match its contents");
  }

  const snapshot: ArchiveSnapshot = {
    archivedAt,
    totalContributions,
    totalQuantityChanges,
    quantityChangesReset,
    contributions,
    quantityChanges,
  };

  const actualHash = computeArchiveHash(snapshot);
  if (actualHash !== expectedHash) {
    throw corrupt(
      `Archive hash mismatch: expected ${expectedHash}, got ${actualHash}`,
    );
  }

  return snapshot;
}
