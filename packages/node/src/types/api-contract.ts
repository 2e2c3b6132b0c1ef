/**
 * Hono application environment type.
 *
 * Defines the typed context variables available in all route handlers.
 * These are set by middleware and consumed by route handlers.
 */

import type { InventoryLedgerService } from "../services/inventory-service.js";

/**
 * Middleware populates Variables; route handlers read them via c.get().
 */
export interface AppEnv {
  Variables: {
    /** Unique request identifier (set by request-id middleware) */
    requestId: string;

    /** Ledger service shared by every route */
    service: InventoryLedgerService;
  };
}

/**
 * AppEnv plus a body validated by validateBody().
 */
export interface ValidatedEnv<T> {
  Variables: AppEnv["Variables"] & {
    validatedBody: T;
  };
}
