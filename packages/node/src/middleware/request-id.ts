/**
 * Request ID middleware.
 *
 * Propagates an incoming X-Request-Id header, or generates a UUID when the
 * header is missing or unusable, and echoes it on the response.
 */

import { randomUUID } from "node:crypto";
import type { MiddlewareHandler } from "hono";
import type { AppEnv } from "../types/api-contract.js";

export const REQUEST_ID_HEADER = "X-Request-Id";

const MAX_REQUEST_ID_LENGTH = 128;
const REQUEST_ID_PATTERN = /^[\w.:-]+$/;

function acceptRequestId(value: string | undefined): string | undefined {
  if (value === undefined || value.length > MAX_REQUEST_ID_LENGTH) {
    return undefined;
  }
  return REQUEST_ID_PATTERN.test(value) ? value : undefined;
}

export function requestIdMiddleware(): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const requestId = acceptRequestId(c.req.header(REQUEST_ID_HEADER)) ?? randomUUID();
    c.set("requestId", requestId);

    await next();

    c.header(REQUEST_ID_HEADER, requestId);
  };
}
