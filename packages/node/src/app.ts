/**
 * Hono application factory.
 *
 * Creates the Hono app with middleware and routes. main.ts serves it;
 * tests call app.request() directly.
 */

import { Hono } from "hono";
import type { Logger } from "pino";
import type { AppEnv } from "./types/api-contract.js";
import type { InventoryLedgerService } from "./services/inventory-service.js";
import { createErrorHandler } from "./middleware/error-handler.js";
import { requestIdMiddleware } from "./middleware/request-id.js";
import { loggerMiddleware } from "./middleware/logger.js";
import type { RequestLogFn } from "./middleware/logger.js";
import { createHealthRoutes } from "./routes/health.js";
import type { ReadinessCheck } from "./routes/health.js";
import { createItemRoutes } from "./routes/items.js";
import { createEventRoutes } from "./routes/events.js";
import { createArchiveRoutes } from "./routes/archives.js";
import { createErrorEnvelope } from "./types/error.js";

// =============================================================================
// App Config
// =============================================================================

export interface CreateAppOptions {
  readonly service: InventoryLedgerService;
  /** Request log sink. Omit to disable request logging */
  readonly logFn?: RequestLogFn | undefined;
  /** Logger for unexpected errors */
  readonly logger?: Logger | undefined;
  /** Backs GET /ready */
  readonly ready?: ReadinessCheck | undefined;
}

// =============================================================================
// Factory
// =============================================================================

export interface AppInstance {
  readonly app: Hono<AppEnv>;
  readonly service: InventoryLedgerService;
}

/**
 * Create the Hono application with all middleware and routes.
 */
export function createApp(options: CreateAppOptions): AppInstance {
  const { service } = options;
  const app = new Hono<AppEnv>();

  // ─── Global Middleware ───────────────────────────────────────────
  app.use("*", requestIdMiddleware());

  if (options.logFn !== undefined) {
    app.use("*", loggerMiddleware(options.logFn));
  }

  // ─── Error Handling ─────────────────────────────────────────────
  app.onError(createErrorHandler(options.logger));
  app.notFound((c) =>
    c.json(createErrorEnvelope("NOT_FOUND", `No route for ${c.req.method} ${c.req.path}`), 404),
  );

  // ─── Health Routes ──────────────────────────────────────────────
  app.route("/", createHealthRoutes(options.ready));

  // ─── API Routes ─────────────────────────────────────────────────
  app.use("/api/*", async (c, next) => {
    c.set("service", service);
    await next();
  });

  app.route("/api/v1", createItemRoutes());
  app.route("/api/v1", createEventRoutes());
  app.route("/api/v1", createArchiveRoutes());

  return { app, service };
}
