/**
 * Health check route.
 *
 * GET /health - Liveness probe with the number of unfinished finalize tasks
 */

import { Hono } from "hono";
import type { TaskSupervisor } from "@cashout/vault";
import type { AppEnv } from "../types/api-contract.js";

export function createHealthRoutes(supervisor: TaskSupervisor): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/health", (c) => {
    return c.json({
      status: "ok",
      pendingFinalizations: supervisor.inFlight,
      timestamp: new Date().toISOString(),
    });
  });

  return routes;
}
