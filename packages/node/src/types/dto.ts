/**
 * Request DTOs with Zod validation schemas.
 *
 * Each DTO has a Zod schema and a derived TypeScript type.
 * Route handlers use these for body/query validation; the domain
 * packages still enforce their own invariants behind them.
 */

import { z } from "zod";

// =============================================================================
// Shared Schemas
// =============================================================================

const Identifier = z.string().min(1).max(200);
const Count = z.number().int().min(0).max(Number.MAX_SAFE_INTEGER);
const Timestamp = z.string().datetime({ offset: true });

export const ItemKeySchema = z.object({
  category: Identifier,
  itemName: Identifier,
});

export const EventKindSchema = z.enum(["contribution", "quantity_change"]);

// =============================================================================
// Write DTOs
// =============================================================================

export const AddContributionSchema = ItemKeySchema.extend({
  actorId: Identifier,
  quantity: Count,
  occurredAt: Timestamp.optional(),
});

export type AddContributionDto = z.infer<typeof AddContributionSchema>;

export const QuantityOverrideSchema = ItemKeySchema.extend({
  newQuantity: Count,
  reason: z.string().min(1).max(500),
  notes: z.string().max(2000).nullable().optional(),
  actorId: Identifier,
});

export type QuantityOverrideDto = z.infer<typeof QuantityOverrideSchema>;

export const RedistributeSchema = ItemKeySchema.extend({
  newTotal: Count,
  reason: z.string().min(1).max(500).optional(),
  notes: z.string().max(2000).nullable().optional(),
  actorId: Identifier.optional(),
});

export type RedistributeDto = z.infer<typeof RedistributeSchema>;

export const AdjustQuantitySchema = ItemKeySchema.extend({
  operation: z.enum(["set", "add", "remove"]),
  amount: Count,
  reason: z.string().min(1).max(500),
  notes: z.string().max(2000).nullable().optional(),
  actorId: Identifier,
});

export type AdjustQuantityDto = z.infer<typeof AdjustQuantitySchema>;

export const RemoveEventsSchema = z.object({
  entries: z
    .array(z.object({ kind: EventKindSchema, id: z.number().int().min(1) }))
    .min(1)
    .max(500),
  removedBy: Identifier,
});

export type RemoveEventsDto = z.infer<typeof RemoveEventsSchema>;

export const ArchiveEpochSchema = z.object({
  archiveName: z.string().min(1).max(200),
  description: z.string().min(1).max(2000),
  notes: z.string().max(2000).nullable().optional(),
  createdBy: Identifier,
  resetQuantityChanges: z.boolean().optional(),
});

export type ArchiveEpochDto = z.infer<typeof ArchiveEpochSchema>;

// =============================================================================
// Query DTOs
// =============================================================================

export const StockQuerySchema = ItemKeySchema.extend({
  asOf: Timestamp.optional(),
});

export type StockQuery = z.infer<typeof StockQuerySchema>;

export const InventoryQuerySchema = z.object({
  includeZero: z.enum(["true", "false"]).transform((v) => v === "true").optional(),
  asOf: Timestamp.optional(),
});

export type InventoryQuery = z.infer<typeof InventoryQuerySchema>;

export const ListEventsQuerySchema = z.object({
  category: Identifier.optional(),
  itemName: Identifier.optional(),
  kind: EventKindSchema.optional(),
  direction: z.enum(["forward", "backward"]).default("forward"),
  cursor: z.string().optional(),
  limit: z.coerce.number().int().min(1).max(500).default(100),
});

export type ListEventsQuery = z.infer<typeof ListEventsQuerySchema>;

export const ContributorsQuerySchema = z.object({
  category: Identifier.optional(),
  itemName: Identifier.optional(),
});

export type ContributorsQuery = z.infer<typeof ContributorsQuerySchema>;

// =============================================================================
// Path Params
// =============================================================================

export const EventParamsSchema = z.object({
  kind: EventKindSchema,
  id: z.coerce.number().int().min(1),
});

export const ArchiveParamsSchema = z.object({
  archiveId: z.coerce.number().int().min(1),
});
