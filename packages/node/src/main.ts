/**
 * @stockpile/node: Entry point.
 *
 * Bootstraps the Hono app, loads config, opens the ledger database,
 * starts the HTTP server, and handles graceful shutdown.
 */

import { serve } from "@hono/node-server";
import { applyLedgerSchema, SqliteEventStore } from "@stockpile/event-store";
import { createLogger, StorageHandle } from "@stockpile/storage";
import { loadConfig, storageOptions } from "./config.js";
import { createApp } from "./app.js";
import { pinoRequestLog } from "./middleware/logger.js";
import { InventoryLedgerService } from "./services/inventory-service.js";

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = createLogger({
    level: config.LOG_LEVEL,
    pretty: config.NODE_ENV === "development",
    name: "stockpile",
  });

  const handle = new StorageHandle({
    ...storageOptions(config),
    initialize: applyLedgerSchema,
    logger: logger.child({ component: "storage" }),
  });
  // Fail fast on an unusable database path
  await handle.acquire();

  const service = new InventoryLedgerService({
    store: new SqliteEventStore(handle),
    logger: logger.child({ component: "ledger" }),
  });

  const { app } = createApp({
    service,
    logFn: pinoRequestLog(logger.child({ component: "http" })),
    logger,
    ready: async () => {
      await handle.get("SELECT 1 AS ok");
    },
  });

  const server = serve({
    fetch: app.fetch,
    port: config.PORT,
    hostname: config.HOST,
  });

  logger.info(
    { port: config.PORT, host: config.HOST, database: config.DATABASE_PATH },
    "Stockpile ledger started",
  );

  // Graceful shutdown
  const shutdown = async (signal: string): Promise<void> => {
    logger.info({ signal }, "Shutdown signal received");
    server.close();
    await handle.close();
    logger.info("Shutdown complete");
    process.exit(0);
  };

  process.on("SIGTERM", () => void shutdown("SIGTERM"));
  process.on("SIGINT", () => void shutdown("SIGINT"));
}

main().catch((err: unknown) => {
  // eslint-disable-next-line no-console
  console.error("Fatal startup error:", err);
  process.exit(1);
});
