/**
 * @stockpile/ledger: Stock reconstruction by replay.
 *
 * Derives stock levels by folding an ordered event stream.
 *
 * Rules:
 * - Events are replayed in (occurredAt, id) order
 * - A contribution adds its quantity to the balance
 * - A quantity change sets the balance to its newQuantity
 *   (oldQuantity is audit metadata and never read here)
 * - An item key with no events has balance 0
 *
 * All functions are pure.
 */

import type {
  InventoryLevel,
  ItemKey,
  LedgerEvent,
  StockPoint,
} from "@stockpile/types";
import { itemKeyId, sameItem } from "@stockpile/types";
import { parseTimestamp, sortEvents } from "@stockpile/event-store";
import type {
  ContributionTotal,
  InventoryOptions,
  ReconstructOptions,
  StockSeries,
} from "./types.js";

/**
 * Balance after applying one event to `balance`.
 */
export function applyEvent(balance: number, event: LedgerEvent): number {
  return event.kind === "contribution"
    ? balance + event.quantity
    : event.newQuantity;
}

/**
 * Events for `key`, in replay order, cut off at `asOf` when given.
 */
function replayOrder(
  events: readonly LedgerEvent[],
  key: ItemKey,
  asOf: string | undefined,
): LedgerEvent[] {
  const cutoff = asOf === undefined ? undefined : parseTimestamp(asOf);
  return sortEvents(
    events.filter(
      (e) => sameItem(e, key) && (cutoff === undefined || e.occurredAt <= cutoff),
    ),
  );
}

/**
 * Current (or as-of) stock for one item key.
 */
export function reconstructStock(
  events: readonly LedgerEvent[],
  key: ItemKey,
  options: ReconstructOptions = {},
): number {
  return replayOrder(events, key, options.asOf).reduce(applyEvent, 0);
}

/**
 * Running balance after every event for one item key.
 */
export function reconstructSeries(
  events: readonly LedgerEvent[],
  key: ItemKey,
  options: ReconstructOptions = {},
): StockSeries {
  const points: StockPoint[] = [];
  let balance = 0;

  for (const event of replayOrder(events, key, options.asOf)) {
    const next = applyEvent(balance, event);
    points.push({
      eventId: event.id,
      kind: event.kind,
      occurredAt: event.occurredAt,
      delta: next - balance,
      balance: next,
    });
    balance = next;
  }

  return {
    key: { category: key.category, itemName: key.itemName },
    points,
    balance,
  };
}

/**
 * Stock for every item key that appears in `events`, sorted by category
 * then item name.
 */
export function reconstructInventory(
  events: readonly LedgerEvent[],
  options: InventoryOptions = {},
): InventoryLevel[] {
  const cutoff = options.asOf === undefined ? undefined : parseTimestamp(options.asOf);
  const levels = new Map<string, { key: ItemKey; quantity: number }>();

  for (const event of sortEvents(events)) {
    if (cutoff !== undefined && event.occurredAt > cutoff) {
      continue;
    }
    const id = itemKeyId(event);
    const level = levels.get(id);
    if (level === undefined) {
      levels.set(id, {
        key: { category: event.category, itemName: event.itemName },
        quantity: applyEvent(0, event),
      });
    } else {
      level.quantity = applyEvent(level.quantity, event);
    }
  }

  return [...levels.values()]
    .filter((l) => options.includeZero === true || l.quantity !== 0)
    .map((l) => ({ ...l.key, quantity: l.quantity }))
    .sort(compareItemKeys);
}

/**
 * Contribution totals per actor and item key. Quantity changes are ignored.
 * Sorted by category, item name, then descending total.
 */
export function contributionTotals(
  events: readonly LedgerEvent[],
): ContributionTotal[] {
  const totals = new Map<string, ContributionTotal>();

  for (const event of events) {
    if (event.kind !== "contribution") {
      continue;
    }
    const id = JSON.stringify([event.actorId, event.category, event.itemName]);
    const current = totals.get(id);
    totals.set(id, {
      actorId: event.actorId,
      category: event.category,
      itemName: event.itemName,
      total: (current?.total ?? 0) + event.quantity,
      contributions: (current?.contributions ?? 0) + 1,
    });
  }

  return [...totals.values()].sort(
    (a, b) =>
      compareItemKeys(a, b) ||
      b.total - a.total ||
      (a.actorId < b.actorId ? -1 : a.actorId > b.actorId ? 1 : 0),
  );
}

function compareItemKeys(a: ItemKey, b: ItemKey): number {
  if (a.category !== b.category) return a.category < b.category ? -1 : 1;
  if (a.itemName !== b.itemName) return a.itemName < b.itemName ? -1 : 1;
  return 0;
}
