/**
 * Structured request logging middleware.
 *
 * Reports method, path, status, duration and request id for every request
 * to a sink. `pinoRequestLog` adapts a pino logger into that sink.
 */

import type { MiddlewareHandler } from "hono";
import type { Logger } from "pino";
import type { AppEnv } from "../types/api-contract.js";

export interface RequestLogEntry {
  readonly method: string;
  readonly path: string;
  readonly status: number;
  readonly durationMs: number;
  readonly requestId: string;
}

export type RequestLogFn = (entry: RequestLogEntry) => void;

export function loggerMiddleware(log: RequestLogFn): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const start = performance.now();

    await next();

    log({
      method: c.req.method,
      path: c.req.path,
      status: c.res.status,
      durationMs: Math.round(performance.now() - start),
      requestId: c.get("requestId"),
    });
  };
}

/**
 * Server errors log at error, client errors at warn, the rest at info.
 */
export function pinoRequestLog(logger: Logger): RequestLogFn {
  return (entry) => {
    const msg = `${entry.method} ${entry.path} ${entry.status}`;
    if (entry.status >= 500) {
      logger.error(entry, msg);
    } else if (entry.status >= 400) {
      logger.warn(entry, msg);
    } else {
      logger.info(entry, msg);
    }
  };
}
