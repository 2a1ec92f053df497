/**
 * Path parameter validation for `:vault`.
 */

import type { MiddlewareHandler } from "hono";
import type { Address } from "viem";
import { VaultParamSchema } from "../types/dto.js";
import { createErrorEnvelope } from "../types/error.js";
import { formatZodErrors } from "./validate.js";

/**
 * Validate the `:vault` path segment as an address and expose it as the
 * `vault` context variable.
 */
export function vaultParam(): MiddlewareHandler<{ Variables: { vault: Address } }> {
  return async (c, next) => {
    const result = VaultParamSchema.safeParse(c.req.param("vault"));
    if (!result.success) {
      return c.json(
        createErrorEnvelope("VALIDATION_ERROR", "Invalid vault address", {
          issues: formatZodErrors(result.error),
        }),
        400,
      );
    }

    c.set("vault", result.data);
    return next();
  };
}
