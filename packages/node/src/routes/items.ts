/**
 * Item stock routes.
 *
 * POST /api/v1/guilds/:guildId/contributions       Record a contribution
 * POST /api/v1/guilds/:guildId/quantity-changes    Record an absolute override
 * POST /api/v1/guilds/:guildId/items/redistribute  Redistribute to a new total
 * POST /api/v1/guilds/:guildId/items/adjust        Set, add or remove stock
 * GET  /api/v1/guilds/:guildId/stock               Current stock of one item
 * GET  /api/v1/guilds/:guildId/stock/history       Running balance of one item
 * GET  /api/v1/guilds/:guildId/inventory           Every item's stock
 * GET  /api/v1/guilds/:guildId/contributors        Totals per contributor
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import {
  AddContributionSchema,
  AdjustQuantitySchema,
  ContributorsQuerySchema,
  InventoryQuerySchema,
  QuantityOverrideSchema,
  RedistributeSchema,
  StockQuerySchema,
} from "../types/dto.js";
import { parseInput, validateBody } from "../middleware/validate.js";
import { createErrorEnvelope } from "../types/error.js";

export function createItemRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post(
    "/guilds/:guildId/contributions",
    validateBody(AddContributionSchema),
    async (c) => {
      const body = c.get("validatedBody");
      const event = await c.get("service").addContribution({
        ...body,
        guildId: c.req.param("guildId"),
      });
      return c.json({ data: event }, 201);
    },
  );

  routes.post(
    "/guilds/:guildId/quantity-changes",
    validateBody(QuantityOverrideSchema),
    async (c) => {
      const body = c.get("validatedBody");
      const event = await c.get("service").recordQuantityOverride({
        ...body,
        guildId: c.req.param("guildId"),
      });
      return c.json({ data: event }, 201);
    },
  );

  routes.post(
    "/guilds/:guildId/items/redistribute",
    validateBody(RedistributeSchema),
    async (c) => {
      const { category, itemName, newTotal, reason, notes, actorId } = c.get("validatedBody");
      const result = await c.get("service").redistribute(
        c.req.param("guildId"),
        { category, itemName },
        newTotal,
        { reason, notes, actorId },
      );
      return c.json({ data: result });
    },
  );

  routes.post(
    "/guilds/:guildId/items/adjust",
    validateBody(AdjustQuantitySchema),
    async (c) => {
      const { category, itemName, ...adjustment } = c.get("validatedBody");
      const result = await c.get("service").adjustQuantity(
        c.req.param("guildId"),
        { category, itemName },
        adjustment,
      );
      return c.json({ data: result });
    },
  );

  routes.get("/guilds/:guildId/stock", async (c) => {
    const query = parseInput(StockQuerySchema, c.req.query(), "query parameters");
    if (!query.ok) {
      return c.json(query.envelope, 400);
    }

    const { category, itemName, asOf } = query.value;
    const quantity = await c.get("service").currentStock(
      c.req.param("guildId"),
      { category, itemName },
      { asOf },
    );
    return c.json({ data: { category, itemName, quantity } });
  });

  routes.get("/guilds/:guildId/stock/history", async (c) => {
    const query = parseInput(StockQuerySchema, c.req.query(), "query parameters");
    if (!query.ok) {
      return c.json(query.envelope, 400);
    }

    const { category, itemName, asOf } = query.value;
    const series = await c.get("service").stockHistory(
      c.req.param("guildId"),
      { category, itemName },
      { asOf },
    );
    return c.json({ data: series });
  });

  routes.get("/guilds/:guildId/inventory", async (c) => {
    const query = parseInput(InventoryQuerySchema, c.req.query(), "query parameters");
    if (!query.ok) {
      return c.json(query.envelope, 400);
    }

    const levels = await c.get("service").inventory(c.req.param("guildId"), query.value);
    return c.json({ data: levels });
  });

  routes.get("/guilds/:guildId/contributors", async (c) => {
    const query = parseInput(ContributorsQuerySchema, c.req.query(), "query parameters");
    if (!query.ok) {
      return c.json(query.envelope, 400);
    }

    const { category, itemName } = query.value;
    if ((category === undefined) !== (itemName === undefined)) {
      return c.json(
        createErrorEnvelope(
          "VALIDATION_ERROR",
          "category and itemName must be given together",
        ),
        400,
      );
    }

    const key =
      category !== undefined && itemName !== undefined ? { category, itemName } : undefined;
    const totals = await c.get("service").contributionTotals(c.req.param("guildId"), key);
    return c.json({ data: totals });
  });

  return routes;
}
