/**
 * Archive routes.
 *
 * POST /api/v1/guilds/:guildId/archives             Archive the current epoch
 * GET  /api/v1/guilds/:guildId/archives             List archives, newest first
 * GET  /api/v1/guilds/:guildId/archives/:archiveId  One archive with its snapshot
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { ArchiveEpochSchema, ArchiveParamsSchema } from "../types/dto.js";
import { parseInput, validateBody } from "../middleware/validate.js";
import { createErrorEnvelope } from "../types/error.js";

export function createArchiveRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/guilds/:guildId/archives", validateBody(ArchiveEpochSchema), async (c) => {
    const archive = await c
      .get("service")
      .archiveEpoch(c.req.param("guildId"), c.get("validatedBody"));
    return c.json({ data: archive }, 201);
  });

  routes.get("/guilds/:guildId/archives", async (c) => {
    const archives = await c.get("service").listArchives(c.req.param("guildId"));
    return c.json({ data: archives });
  });

  routes.get("/guilds/:guildId/archives/:archiveId", async (c) => {
    const params = parseInput(ArchiveParamsSchema, c.req.param(), "path parameters");
    if (!params.ok) {
      return c.json(params.envelope, 400);
    }

    const { archiveId } = params.value;
    const archive = await c.get("service").getArchive(archiveId);
    if (archive === undefined || archive.guildId !== c.req.param("guildId")) {
      return c.json(createErrorEnvelope("NOT_FOUND", `No archive with id ${archiveId}`), 404);
    }
    return c.json({ data: archive });
  });

  return routes;
}
