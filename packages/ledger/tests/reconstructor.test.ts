/**
 * Tests for stock reconstruction by replay.
 */

import { describe, it, expect } from "vitest";
import {
  contributionTotals,
  reconstructInventory,
  reconstructSeries,
  reconstructStock,
} from "../src/reconstructor.js";
import { ROPE, contributed, day, overridden } from "./fixtures.js";

// =============================================================================
// reconstructStock
// =============================================================================

describe("reconstructStock", () => {
  it("returns 0 for an empty stream", () => {
    expect(reconstructStock([], ROPE)).toBe(0);
  });

  it("sums contributions", () => {
    const events = [contributed(1, 5, day(1)), contributed(2, 3, day(2))];
    expect(reconstructStock(events, ROPE)).toBe(8);
  });

  it("treats a quantity change as an absolute set", () => {
    const events = [
      contributed(1, 5, day(1)),
      overridden(2, 2, day(2)),
      contributed(3, 4, day(3)),
    ];
    expect(reconstructStock(events, ROPE)).toBe(6);
  });

  it("ignores oldQuantity", () => {
    const events = [contributed(1, 5, day(1)), overridden(2, 7, day(2), { oldQuantity: 999 })];
    expect(reconstructStock(events, ROPE)).toBe(7);
  });

  it("replays by timestamp regardless of input order", () => {
    const events = [
      contributed(3, 4, day(3)),
      overridden(2, 2, day(2)),
      contributed(1, 5, day(1)),
    ];
    expect(reconstructStock(events, ROPE)).toBe(6);
  });

  it("breaks timestamp ties by id", () => {
    const setThenAdd = [contributed(3, 5, day(1)), overridden(2, 10, day(1))];
    const addThenSet = [contributed(2, 5, day(1)), overridden(3, 10, day(1))];

    expect(reconstructStock(setThenAdd, ROPE)).toBe(15);
    expect(reconstructStock(addThenSet, ROPE)).toBe(10);
  });

  it("only counts the requested item key", () => {
    const events = [
      contributed(1, 5, day(1)),
      contributed(2, 7, day(1), { itemName: "Nails" }),
      contributed(3, 9, day(1), { category: "Tools" }),
      overridden(4, 0, day(2), { itemName: "Nails" }),
    ];
    expect(reconstructStock(events, ROPE)).toBe(5);
  });

  it("stops at asOf, inclusive", () => {
    const events = [contributed(1, 5, day(1)), contributed(2, 3, day(3))];

    expect(reconstructStock(events, ROPE, { asOf: day(2) })).toBe(5);
    expect(reconstructStock(events, ROPE, { asOf: day(3) })).toBe(8);
    expect(reconstructStock(events, ROPE, { asOf: "2024-12-31T00:00:00Z" })).toBe(0);
  });
});

// =============================================================================
// reconstructSeries
// =============================================================================

describe("reconstructSeries", () => {
  it("reports the running balance and signed delta per event", () => {
    const events = [
      contributed(1, 5, day(1)),
      overridden(2, 2, day(2)),
      contributed(3, 4, day(3)),
    ];

    expect(reconstructSeries(events, ROPE)).toEqual({
      key: { category: "Misc", itemName: "Rope" },
      points: [
        { eventId: 1, kind: "contribution", occurredAt: day(1), delta: 5, balance: 5 },
        { eventId: 2, kind: "quantity_change", occurredAt: day(2), delta: -3, balance: 2 },
        { eventId: 3, kind: "contribution", occurredAt: day(3), delta: 4, balance: 6 },
      ],
      balance: 6,
    });
  });

  it("is empty with balance 0 when the key has no events", () => {
    const series = reconstructSeries([contributed(1, 5, day(1))], {
      category: "Misc",
      itemName: "Nails",
    });
    expect(series.points).toEqual([]);
    expect(series.balance).toBe(0);
  });
});

// =============================================================================
// reconstructInventory
// =============================================================================

describe("reconstructInventory", () => {
  const events = [
    contributed(1, 5, day(1)),
    contributed(2, 2, day(1), { category: "Tools", itemName: "Hammer" }),
    contributed(3, 4, day(1), { itemName: "Nails" }),
    overridden(4, 0, day(2), { itemName: "Nails" }),
  ];

  it("lists non-zero levels sorted by category then item", () => {
    expect(reconstructInventory(events)).toEqual([
      { category: "Misc", itemName: "Rope", quantity: 5 },
      { category: "Tools", itemName: "Hammer", quantity: 2 },
    ]);
  });

  it("includes zero levels when asked", () => {
    expect(reconstructInventory(events, { includeZero: true })).toEqual([
      { category: "Misc", itemName: "Nails", quantity: 0 },
      { category: "Misc", itemName: "Rope", quantity: 5 },
      { category: "Tools", itemName: "Hammer", quantity: 2 },
    ]);
  });

  it("keeps keys apart when names contain the display separator", () => {
    const tricky = [
      contributed(1, 5, day(1), { category: "a::b", itemName: "c" }),
      contributed(2, 3, day(1), { category: "a", itemName: "b::c" }),
    ];

    expect(reconstructInventory(tricky)).toEqual([
      { category: "a", itemName: "b::c", quantity: 3 },
      { category: "a::b", itemName: "c", quantity: 5 },
    ]);
  });

  it("honours asOf", () => {
    expect(reconstructInventory(events, { asOf: day(1) })).toEqual([
      { category: "Misc", itemName: "Nails", quantity: 4 },
      { category: "Misc", itemName: "Rope", quantity: 5 },
      { category: "Tools", itemName: "Hammer", quantity: 2 },
    ]);
  });
});

// =============================================================================
// contributionTotals
// =============================================================================

describe("contributionTotals", () => {
  it("sums per actor and item, ignoring overrides", () => {
    const events = [
      contributed(1, 5, day(1)),
      contributed(2, 3, day(2)),
      contributed(3, 10, day(2), { actorId: "user-2" }),
      contributed(4, 1, day(3), { category: "Tools", itemName: "Hammer" }),
      overridden(5, 100, day(4)),
    ];

    expect(contributionTotals(events)).toEqual([
      { actorId: "user-2", category: "Misc", itemName: "Rope", total: 10, contributions: 1 },
      { actorId: "user-1", category: "Misc", itemName: "Rope", total: 8, contributions: 2 },
      { actorId: "user-1", category: "Tools", itemName: "Hammer", total: 1, contributions: 1 },
    ]);
  });

  it("does not merge keys that format alike", () => {
    const events = [
      contributed(1, 5, day(1), { category: "a::b", itemName: "c" }),
      contributed(2, 3, day(1), { category: "a", itemName: "b::c" }),
    ];

    expect(contributionTotals(events)).toEqual([
      { actorId: "user-1", category: "a", itemName: "b::c", total: 3, contributions: 1 },
      { actorId: "user-1", category: "a::b", itemName: "c", total: 5, contributions: 1 },
    ]);
  });

  it("is empty without contributions", () => {
    expect(contributionTotals([overridden(1, 4, day(1))])).toEqual([]);
  });
});
