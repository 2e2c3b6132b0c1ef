/**
 * Audit trail routes.
 *
 * GET    /api/v1/guilds/:guildId/events            Ledger events (cursor pagination)
 * GET    /api/v1/guilds/:guildId/events/:kind/:id  One event
 * DELETE /api/v1/guilds/:guildId/events/:kind/:id  Remove one event
 * POST   /api/v1/guilds/:guildId/events/remove     Remove several events
 *
 * Events of another guild are reported as not found.
 */

import { Hono } from "hono";
import { cursorOf } from "@stockpile/event-store";
import type { AppEnv } from "../types/api-contract.js";
import {
  EventParamsSchema,
  ListEventsQuerySchema,
  RemoveEventsSchema,
} from "../types/dto.js";
import { parseInput, validateBody } from "../middleware/validate.js";
import { createErrorEnvelope } from "../types/error.js";
import { decodeCursor, paginate } from "../types/pagination.js";

export function createEventRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/guilds/:guildId/events", async (c) => {
    const query = parseInput(ListEventsQuerySchema, c.req.query(), "query parameters");
    if (!query.ok) {
      return c.json(query.envelope, 400);
    }

    const { cursor, limit, ...filters } = query.value;
    const after = cursor !== undefined ? decodeCursor(cursor) : undefined;
    if (cursor !== undefined && after === undefined) {
      return c.json(createErrorEnvelope("VALIDATION_ERROR", "Invalid cursor"), 400);
    }

    const events = await c.get("service").auditTrail(c.req.param("guildId"), {
      ...filters,
      after,
      limit: limit + 1,
    });

    return c.json(paginate(events, limit, cursorOf));
  });

  routes.get("/guilds/:guildId/events/:kind/:id", async (c) => {
    const params = parseInput(EventParamsSchema, c.req.param(), "path parameters");
    if (!params.ok) {
      return c.json(params.envelope, 400);
    }

    const { kind, id } = params.value;
    const event = await c.get("service").getEvent(kind, id);
    if (event === undefined || event.guildId !== c.req.param("guildId")) {
      return c.json(createErrorEnvelope("NOT_FOUND", `No ${kind} event with id ${id}`), 404);
    }
    return c.json({ data: event });
  });

  routes.delete("/guilds/:guildId/events/:kind/:id", async (c) => {
    const params = parseInput(EventParamsSchema, c.req.param(), "path parameters");
    if (!params.ok) {
      return c.json(params.envelope, 400);
    }

    const { kind, id } = params.value;
    const service = c.get("service");
    const event = await service.getEvent(kind, id);
    if (event === undefined || event.guildId !== c.req.param("guildId")) {
      return c.json(createErrorEnvelope("NOT_FOUND", `No ${kind} event with id ${id}`), 404);
    }

    const removed = await service.removeEvent(kind, id);
    if (!removed) {
      return c.json(createErrorEnvelope("NOT_FOUND", `No ${kind} event with id ${id}`), 404);
    }
    return c.json({ data: { kind, id, removed } });
  });

  routes.post(
    "/guilds/:guildId/events/remove",
    validateBody(RemoveEventsSchema),
    async (c) => {
      const { entries, removedBy } = c.get("validatedBody");
      const result = await c
        .get("service")
        .removeEvents(c.req.param("guildId"), entries, removedBy);
      return c.json({ data: result });
    },
  );

  return routes;
}
