/**
 * Zod validation middleware.
 *
 * Validates request bodies and query strings against Zod schemas.
 * Returns 400 with error envelope on validation failure.
 */

import type { Context, MiddlewareHandler } from "hono";
import type { ZodError, ZodType, ZodTypeDef } from "zod";
import type { AppEnv } from "../types/api-contract.js";
import { createErrorEnvelope } from "../types/error.js";

/**
 * Validate JSON request body against a Zod schema.
 *
 * On success, sets `validatedBody` in context variables.
 * On failure, returns 400 with structured validation errors.
 */
export function validateBody<T>(
  schema: ZodType<T, ZodTypeDef, unknown>,
): MiddlewareHandler<AppEnv> {
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
      return c.json(
        createErrorEnvelope("VALIDATION_ERROR", "Request body validation failed", {
          issues: formatZodErrors(result.error),
        }),
        400,
      );
    }

    c.set("validatedBody", result.data);
    return next();
  };
}

/**
 * Read the body validateBody stored, re-checked against the same
 * schema so the handler gets it typed.
 */
export function bodyOf<T>(c: Context<AppEnv>, schema: ZodType<T, ZodTypeDef, unknown>): T {
  return schema.parse(c.get("validatedBody"));
}

/**
 * Parse the query string, or return the 400 response to send.
 */
export function parseQuery<T>(
  c: Context<AppEnv>,
  schema: ZodType<T, ZodTypeDef, unknown>,
): { ok: true; value: T } | { ok: false; response: Response } {
  const result = schema.safeParse(c.req.query());
  if (result.success) return { ok: true, value: result.data };
  return {
    ok: false,
    response: c.json(
      createErrorEnvelope("VALIDATION_ERROR", "Invalid query parameters", {
        issues: formatZodErrors(result.error),
      }),
      400,
    ),
  };
}

function formatZodErrors(
  error: ZodError,
): readonly { path: string; message: string }[] {
  return error.issues.map((issue) => ({
    path: issue.path.join("."),
    message: issue.message,
  }));
}
