/**
 * @stockpile/node: HTTP service for the stockpile ledger.
 *
 * Importing this module never starts a server; main.ts does.
 */

export { InventoryLedgerService } from "./services/inventory-service.js";
export type {
  InventoryLedgerServiceOptions,
  QuantityOverrideInput,
  AdjustOperation,
  AdjustQuantityInput,
  AdjustQuantityResult,
  ArchiveEpochInput,
} from "./services/inventory-service.js";
export { loadConfig, storageOptions, ConfigSchema } from "./config.js";
export type { AppConfig } from "./config.js";
export { createApp } from "./app.js";
export type { CreateAppOptions, AppInstance } from "./app.js";
export * from "./middleware/index.js";
export * from "./routes/index.js";
export * from "./types/index.js";
