/**
 * Health check routes.
 *
 * GET /health  Liveness probe (always 200 if server is running)
 * GET /ready   Readiness probe (storage answers a trivial query)
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";

/** Resolves when the backing storage can serve a query. */
export type ReadinessCheck = () => Promise<void>;

export function createHealthRoutes(ready?: ReadinessCheck): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/health", (c) => {
    return c.json({
      status: "ok",
      timestamp: new Date().toISOString(),
    });
  });

  routes.get("/ready", async (c) => {
    const timestamp = new Date().toISOString();
    if (ready === undefined) {
      return c.json({ status: "ready", storage: "unchecked", timestamp });
    }
    try {
      await ready();
    } catch (err: unknown) {
      const detail = err instanceof Error ? err.message : String(err);
      return c.json({ status: "not_ready", storage: "down", detail, timestamp }, 503);
    }
    return c.json({ status: "ready", storage: "ok", timestamp });
  });

  return routes;
}
