/**
 * Request logging middleware.
 *
 * Emits one structured entry per request once the response is ready.
 */

import type { MiddlewareHandler } from "hono";
import type { AppEnv } from "../types/api-contract.js";

export interface RequestLogEntry {
  readonly method: string;
  readonly path: string;
  readonly status: number;
  readonly durationMs: number;
  readonly requestId: string;
}

export function loggerMiddleware(
  log: (entry: RequestLogEntry) => void,
): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const start = Date.now();

    await next();

    log({
      method: c.req.method,
      path: c.req.path,
      status: c.res.status,
      durationMs: Date.now() - start,
      requestId: c.get("requestId"),
    });
  };
}
