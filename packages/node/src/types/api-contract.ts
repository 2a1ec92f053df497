/**
 * Hono application environment type.
 *
 * Middleware populates Variables; route handlers read them via c.get().
 */

import type { CashoutService } from "@cashout/vault";

export interface AppEnv {
  Variables: {
    /** Unique request identifier (set by request-id middleware) */
    requestId: string;

    /** Cashout service backing the API routes */
    service: CashoutService;
  };
}
