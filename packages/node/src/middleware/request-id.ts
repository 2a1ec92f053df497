/**
 * Request ID middleware.
 *
 * Propagates an incoming X-Request-Id or assigns a fresh one, and echoes
 * it on the response.
 */

import { randomUUID } from "node:crypto";
import type { MiddlewareHandler } from "hono";
import type { AppEnv } from "../types/api-contract.js";

export const REQUEST_ID_HEADER = "X-Request-Id";

export function requestIdMiddleware(
  generate: () => string = randomUUID,
): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const requestId = c.req.header(REQUEST_ID_HEADER) ?? generate();

    c.set("requestId", requestId);

    await next();

    c.header(REQUEST_ID_HEADER, requestId);
  };
}
