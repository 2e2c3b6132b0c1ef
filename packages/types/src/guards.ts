/**
 * Runtime Type Guards
 *
 * Narrowing functions for ledger types. Used at system boundaries
 * (deserialized archives, API inputs) where a value's shape is unknown.
 */

import type {
  ContributionEvent,
  LedgerEvent,
  LedgerEventKind,
  QuantityChangeEvent,
} from "./event.js";
import type { ItemKey } from "./inventory.js";

const EVENT_KINDS = new Set<string>(["contribution", "quantity_change"]);

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

function isNonEmptyString(value: unknown): value is string {
  return typeof value === "string" && value.length > 0;
}

function isNonNegativeInteger(value: unknown): value is number {
  return typeof value === "number" && Number.isSafeInteger(value) && value >= 0;
}

function isPositiveInteger(value: unknown): value is number {
  return isNonNegativeInteger(value) && value > 0;
}

export function isLedgerEventKind(value: unknown): value is LedgerEventKind {
  return typeof value === "string" && EVENT_KINDS.has(value);
}

export function isItemKey(value: unknown): value is ItemKey {
  if (!isRecord(value)) return false;
  return isNonEmptyString(value.category) && isNonEmptyString(value.itemName);
}

export function isContributionEvent(value: unknown): value is ContributionEvent {
  if (!isRecord(value)) return false;
  return (
    value.kind === "contribution" &&
    isPositiveInteger(value.id) &&
    isNonEmptyString(value.guildId) &&
    isNonEmptyString(value.actorId) &&
    isNonEmptyString(value.category) &&
    isNonEmptyString(value.itemName) &&
    isNonNegativeInteger(value.quantity) &&
    typeof value.occurredAt === "string"
  );
}

export function isQuantityChangeEvent(
  value: unknown,
): value is QuantityChangeEvent {
  if (!isRecord(value)) return false;
  return (
    value.kind === "quantity_change" &&
    isPositiveInteger(value.id) &&
    isNonEmptyString(value.guildId) &&
    isNonEmptyString(value.itemName) &&
    isNonEmptyString(value.category) &&
    isNonNegativeInteger(value.oldQuantity) &&
    isNonNegativeInteger(value.newQuantity) &&
    isNonEmptyString(value.reason) &&
    (value.notes === null || typeof value.notes === "string") &&
    isNonEmptyString(value.actorId) &&
    typeof value.occurredAt === "string"
  );
}

export function isLedgerEvent(value: unknown): value is LedgerEvent {
  return isContributionEvent(value) || isQuantityChangeEvent(value);
}
