/**
 * Global error handler.
 *
 * Maps coded domain errors (CashoutError, ReceiptDecodeError, ChainError,
 * StateStoreError) to HTTP statuses and writes the error envelope.
 * Anything unrecognized is a 500 without internal details.
 */

import type { Context, ErrorHandler } from "hono";
import type { ContentfulStatusCode } from "hono/utils/http-status";
import type { Logger } from "pino";
import type { AppEnv } from "../types/api-contract.js";
import { createErrorEnvelope } from "../types/error.js";

// =============================================================================
// Domain Error → HTTP Status Mapping
// =============================================================================

const STATUS_MAP: Record<string, ContentfulStatusCode> = {
  // Cheques
  NO_PRIOR_CHEQUE: 404,
  CHEQUE_NOT_INCREASING: 409,
  CHEQUE_BENEFICIARY_MISMATCH: 409,

  // Receipts: the ledger returned something we cannot interpret
  EVENT_NOT_FOUND: 502,
  EVENT_AMBIGUOUS: 502,
  TRANSACTION_REVERTED: 502,

  // Ledger connectivity
  NOT_CONNECTED: 503,
  EMPTY_CALL_RESULT: 502,

  // Store
  INVALID_KEY: 400,
};

function errorCode(err: Error): string | undefined {
  if ("code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}

// =============================================================================
// Handler
// =============================================================================

/**
 * Create the onError handler. 500s are logged with their cause.
 */
export function createErrorHandler(logger: Logger): ErrorHandler<AppEnv> {
  return (err: Error, c: Context<AppEnv>): Response => {
    const code = errorCode(err);
    const status = code === undefined ? undefined : STATUS_MAP[code];

    if (code === undefined || status === undefined) {
      logger.error({ err, requestId: c.get("requestId") }, "unhandled request error");
      return c.json(
        createErrorEnvelope("INTERNAL_ERROR", "Internal server error"),
        500,
      );
    }

    return c.json(createErrorEnvelope(code, err.message), status);
  };
}
