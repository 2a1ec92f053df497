/**
 * Hono application factory.
 *
 * Creates the Hono app with middleware and routes.
 * Separated from main.ts so tests can build the app without an HTTP server.
 */

import { Hono } from "hono";
import type { Logger } from "pino";
import type { CashoutService } from "@cashout/vault";
import type { AppEnv } from "./types/api-contract.js";
import { createErrorHandler } from "./middleware/error-handler.js";
import { requestIdMiddleware } from "./middleware/request-id.js";
import { loggerMiddleware } from "./middleware/logger.js";
import type { RequestLogEntry } from "./middleware/logger.js";
import { createHealthRoutes } from "./routes/health.js";
import { createCashoutRoutes } from "./routes/cashout.js";

// =============================================================================
// App Config
// =============================================================================

export interface CreateAppOptions {
  readonly service: CashoutService;
  readonly logger: Logger;
  readonly logFn?: (entry: RequestLogEntry) => void;
}

export interface AppInstance {
  readonly app: Hono<AppEnv>;
  readonly service: CashoutService;
}

// =============================================================================
// Factory
// =============================================================================

/**
 * Create the Hono application with all middleware and routes.
 */
export function createApp(options: CreateAppOptions): AppInstance {
  const { service } = options;
  const app = new Hono<AppEnv>();

  // ─── Global Middleware ───────────────────────────────────────────
  app.use("*", requestIdMiddleware());

  if (options.logFn !== undefined) {
    app.use("*", loggerMiddleware(options.logFn));
  }

  // ─── Error Handler ──────────────────────────────────────────────
  app.onError(createErrorHandler(options.logger));

  // ─── Health ─────────────────────────────────────────────────────
  app.route("/", createHealthRoutes(service.supervisor));

  // ─── API Routes ─────────────────────────────────────────────────
  app.use("/api/*", async (c, next) => {
    c.set("service", service);
    await next();
  });

  app.route("/api/v1", createCashoutRoutes());

  return { app, service };
}
