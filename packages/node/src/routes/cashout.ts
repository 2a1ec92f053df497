/**
 * Cashout routes.
 *
 * POST /api/v1/vaults/:vault/cashout          Submit the latest cheque
 * GET  /api/v1/vaults/:vault/cashout          Reconciled cashout status
 * GET  /api/v1/vaults/:vault/cashout/exists   Whether a cashout was ever submitted
 * GET  /api/v1/cashouts                       Finalized cashout results
 * GET  /api/v1/cashouts/stats                 Received-cashed aggregates
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import {
  CashoutRequestSchema,
  toCashOutResultDto,
  toCashoutStatsDto,
  toCashoutStatusDto,
} from "../types/dto.js";
import { validateBody } from "../middleware/validate.js";
import { vaultParam } from "../middleware/vault-param.js";

export function createCashoutRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  // POST /api/v1/vaults/:vault/cashout (submit)
  routes.post(
    "/vaults/:vault/cashout",
    vaultParam(),
    validateBody(CashoutRequestSchema),
    async (c) => {
      const service = c.get("service");
      const { recipient } = c.get("validatedBody");

      const txHash = await service.cashCheque(c.get("vault"), recipient);

      // Accepted: settlement completes in the background
      return c.json({ data: { txHash } }, 202);
    },
  );

  // GET /api/v1/vaults/:vault/cashout (status)
  routes.get("/vaults/:vault/cashout", vaultParam(), async (c) => {
    const status = await c.get("service").cashoutStatus(c.get("vault"));
    return c.json({ data: toCashoutStatusDto(status) });
  });

  // GET /api/v1/vaults/:vault/cashout/exists
  routes.get("/vaults/:vault/cashout/exists", vaultParam(), async (c) => {
    const exists = await c.get("service").hasCashoutAction(c.get("vault"));
    return c.json({ data: { exists } });
  });

  // GET /api/v1/cashouts (history)
  routes.get("/cashouts", async (c) => {
    const results = await c.get("service").cashoutResults();
    return c.json({ data: results.map(toCashOutResultDto) });
  });

  // GET /api/v1/cashouts/stats
  routes.get("/cashouts/stats", async (c) => {
    const stats = await c.get("service").cashoutStats();
    return c.json({ data: toCashoutStatsDto(stats) });
  });

  return routes;
}
