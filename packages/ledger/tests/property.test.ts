/**
 * Property-Based Tests for @stockpile/ledger
 *
 * Uses fast-check to verify invariants that must hold for ANY valid input:
 *
 * 1. Sum invariant: after redistribution, surviving quantities sum to newTotal
 * 2. Non-negativity: no record is written as zero or below
 * 3. Replay determinism: input order does not change the reconstructed stock
 * 4. Override semantics: set X then add Y yields X + Y, whatever came before
 * 5. Timestamp ties are broken by id
 */

import { describe, it, expect } from "vitest";
import fc from "fast-check";
import type { LedgerEvent } from "@stockpile/types";
import { InMemoryEventStore } from "@stockpile/event-store";
import { planRedistribution, QuantityRedistributor } from "../src/redistribution.js";
import { reconstructStock, reconstructSeries } from "../src/reconstructor.js";
import { ROPE, contributed, day, overridden } from "./fixtures.js";

// =============================================================================
// Arbitraries
// =============================================================================

/** 1-20 positive contribution quantities. */
const arbQuantities = fc.array(fc.integer({ min: 1, max: 1_000_000 }), {
  minLength: 1,
  maxLength: 20,
});

/** A new total, sometimes zero. */
const arbTotal = fc.oneof(
  fc.constant(0),
  fc.integer({ min: 1, max: 100 }),
  fc.integer({ min: 0, max: 1_000_000_000_000 }),
);

/** One event for the Rope key on one of the first 28 days of January. */
const arbEventShape = fc.record({
  isOverride: fc.boolean(),
  quantity: fc.integer({ min: 1, max: 10_000 }),
  dayOfMonth: fc.integer({ min: 1, max: 28 }),
});

/** A stream of Rope events with unique ids. */
const arbEvents: fc.Arbitrary<LedgerEvent[]> = fc
  .array(arbEventShape, { maxLength: 30 })
  .map((shapes) =>
    shapes.map((s, i) =>
      s.isOverride
        ? overridden(i + 1, s.quantity, day(s.dayOfMonth))
        : contributed(i + 1, s.quantity, day(s.dayOfMonth)),
    ),
  );

// =============================================================================
// Property: Sum Invariant
// =============================================================================

describe("property: redistribution preserves the exact sum", () => {
  it("planned quantities sum to newTotal and stay positive", () => {
    fc.assert(
      fc.property(arbQuantities, arbTotal, (quantities, newTotal) => {
        const records = quantities.map((q, i) => contributed(i + 1, q, day(1)));
        const plan = planRedistribution(records, newTotal);
        expect(plan).toBeDefined();
        if (plan === undefined) return;

        const updates = new Map(plan.updates.map((u) => [u.id, u.quantity]));
        const deleted = new Set(plan.deletions);
        const surviving = records
          .filter((r) => !deleted.has(r.id))
          .map((r) => updates.get(r.id) ?? r.quantity);

        expect(surviving.reduce((a, b) => a + b, 0)).toBe(newTotal);
        expect(surviving.every((q) => q > 0)).toBe(true);
        expect(plan.updates.every((u) => u.quantity > 0)).toBe(true);
        if (newTotal === 0) {
          expect(surviving).toEqual([]);
        }
      }),
      { numRuns: 500 },
    );
  });

  it("holds through the store, and replay agrees with the new total", async () => {
    await fc.assert(
      fc.asyncProperty(arbQuantities, arbTotal, async (quantities, newTotal) => {
        const store = new InMemoryEventStore();
        const redistributor = new QuantityRedistributor(store);
        for (const quantity of quantities) {
          await store.appendContribution({
            guildId: "guild-1",
            actorId: "user-1",
            ...ROPE,
            quantity,
          });
        }

        const result = await redistributor.redistribute("guild-1", ROPE, newTotal);
        const stored = await store.listContributions("guild-1", ROPE);

        expect(stored.reduce((sum, r) => sum + r.quantity, 0)).toBe(newTotal);
        expect(stored.every((r) => r.quantity > 0)).toBe(true);
        expect(result.correction?.oldQuantity).toBe(
          quantities.reduce((a, b) => a + b, 0),
        );
        expect(
          reconstructStock(await store.queryEvents("guild-1"), ROPE),
        ).toBe(newTotal);
      }),
      { numRuns: 100 },
    );
  });
});

// =============================================================================
// Property: Replay Determinism
// =============================================================================

describe("property: replay is deterministic", () => {
  it("any permutation of the input yields the same stock", () => {
    fc.assert(
      fc.property(
        arbEvents.chain((events) =>
          fc.tuple(
            fc.constant(events),
            fc.shuffledSubarray(events, {
              minLength: events.length,
              maxLength: events.length,
            }),
          ),
        ),
        ([events, shuffled]) => {
          expect(reconstructStock(shuffled, ROPE)).toBe(reconstructStock(events, ROPE));
          expect(reconstructSeries(shuffled, ROPE)).toEqual(reconstructSeries(events, ROPE));
        },
      ),
      { numRuns: 300 },
    );
  });

  it("the series ends at the reconstructed stock", () => {
    fc.assert(
      fc.property(arbEvents, (events) => {
        const series = reconstructSeries(events, ROPE);
        expect(series.balance).toBe(reconstructStock(events, ROPE));
        expect(series.points).toHaveLength(events.length);
      }),
    );
  });
});

// =============================================================================
// Property: Override Semantics
// =============================================================================

describe("property: quantity changes are absolute", () => {
  it("set X then add Y gives X + Y regardless of history", () => {
    fc.assert(
      fc.property(
        arbEvents,
        fc.integer({ min: 0, max: 1_000_000 }),
        fc.integer({ min: 1, max: 1_000_000 }),
        (history, x, y) => {
          const next = history.length + 1;
          const events: LedgerEvent[] = [
            ...history,
            overridden(next, x, day(29)),
            contributed(next + 1, y, day(30)),
          ];
          expect(reconstructStock(events, ROPE)).toBe(x + y);
        },
      ),
      { numRuns: 300 },
    );
  });
});

// =============================================================================
// Property: Timestamp Ties
// =============================================================================

describe("property: identical timestamps replay in id order", () => {
  it("matches a left fold in ascending id order", () => {
    fc.assert(
      fc.property(arbEvents, (events) => {
        const sameInstant = events.map((e) => ({ ...e, occurredAt: day(1) }));
        const reversed = [...sameInstant].reverse();

        let expected = 0;
        for (const e of sameInstant) {
          expected = e.kind === "contribution" ? expected + e.quantity : e.newQuantity;
        }

        expect(reconstructStock(reversed, ROPE)).toBe(expected);
      }),
      { numRuns: 300 },
    );
  });
});
