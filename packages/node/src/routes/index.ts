/**
 * Route barrel: re-exports all route modules.
 */

export { createHealthRoutes } from "./health.js";
export type { ReadinessCheck } from "./health.js";
export { createItemRoutes } from "./items.js";
export { createEventRoutes } from "./events.js";
export { createArchiveRoutes } from "./archives.js";
