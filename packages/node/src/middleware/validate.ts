/**
 * Zod validation middleware and helpers.
 *
 * Bodies are validated by middleware that places the parsed value in the
 * `validatedBody` context variable; queries and path params are parsed
 * inside the handler with parseInput().
 */

import type { MiddlewareHandler } from "hono";
import type { ZodError, ZodType, ZodTypeDef } from "zod";
import type { ValidatedEnv } from "../types/api-contract.js";
import { createErrorEnvelope } from "../types/error.js";
import type { ErrorEnvelope } from "../types/error.js";

export type Schema<T> = ZodType<T, ZodTypeDef, unknown>;

/**
 * Validate the JSON request body against a Zod schema.
 *
 * On failure, returns 400 with structured validation errors.
 */
export function validateBody<T>(schema: Schema<T>): MiddlewareHandler<ValidatedEnv<T>> {
  return async (c, next) => {
    let body: unknown;
    try {
      body = await c.req.json();
    } catch {
      return c.json(
        createErrorEnvelope("VALIDATION_ERROR", "Invalid JSON in request body"),
        400,
      );
    }

    const result = schema.safeParse(body);
    if (!result.success) {
      return c.json(validationEnvelope("Request body validation failed", result.error), 400);
    }

    c.set("validatedBody", result.data);
    await next();
  };
}

export type ParseOutcome<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly envelope: ErrorEnvelope };

/**
 * Parse query parameters or path params.
 */
export function parseInput<T>(schema: Schema<T>, input: unknown, what: string): ParseOutcome<T> {
  const result = schema.safeParse(input);
  if (result.success) {
    return { ok: true, value: result.data };
  }
  return { ok: false, envelope: validationEnvelope(`Invalid ${what}`, result.error) };
}

function validationEnvelope(message: string, error: ZodError): ErrorEnvelope {
  return createErrorEnvelope("VALIDATION_ERROR", message, {
    issues: error.issues.map((issue) => ({
      path: issue.path.join("."),
      message: issue.message,
    })),
  });
}
