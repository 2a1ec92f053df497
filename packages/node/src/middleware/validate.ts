/**
 * Zod validation middleware.
 *
 * Validates request body against a Zod schema.
 * Returns 400 with error envelope on validation failure.
 */

import type { MiddlewareHandler } from "hono";
import type { z, ZodError } from "zod";
import { createErrorEnvelope } from "../types/error.js";

/**
 * Validate JSON request body against a Zod schema.
 *
 * On success, sets the parsed `validatedBody` in context variables.
 */
export function validateBody<S extends z.ZodTypeAny>(
  schema: S,
): MiddlewareHandler<{ Variables: { validatedBody: z.output<S> } }> {
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

export function formatZodErrors(
  error: ZodError,
): readonly { path: string; message: string }[] {
  return error.issues.map((issue) => ({
    path: issue.path.join("."),
    message: issue.message,
  }));
}
