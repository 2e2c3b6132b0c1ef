/**
 * Middleware barrel: re-exports all middleware.
 */

export { handleError, createErrorHandler } from "./error-handler.js";
export { requestIdMiddleware, REQUEST_ID_HEADER } from "./request-id.js";
export { loggerMiddleware, pinoRequestLog } from "./logger.js";
export type { RequestLogEntry, RequestLogFn } from "./logger.js";
export { validateBody, parseInput } from "./validate.js";
export type { Schema, ParseOutcome } from "./validate.js";
