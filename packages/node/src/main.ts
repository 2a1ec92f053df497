/**
 * @cashout/node: Entry point.
 *
 * Loads config, connects to the ledger, starts the HTTP server and
 * handles graceful shutdown.
 */

import { serve } from "@hono/node-server";
import pino from "pino";
import { JsonlRecordStore } from "@cashout/state-store";
import { EvmLedgerReader, EvmTransactionService, getViemChain } from "@cashout/chain";
import { CashoutService, StoredChequeSource } from "@cashout/vault";
import { loadConfig } from "./config.js";
import { createApp } from "./app.js";

// =============================================================================
// Bootstrap
// =============================================================================

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = pino({
    level: config.LOG_LEVEL,
    ...(config.NODE_ENV === "development"
      ? { transport: { target: "pino-pretty" } }
      : {}),
  });

  const chain = getViemChain(config.CHAIN_ID);
  const connection = {
    chainId: config.CHAIN_ID,
    rpcUrl: config.RPC_URL,
    timeoutMs: config.RPC_TIMEOUT_MS,
  };

  const ledger = new EvmLedgerReader(connection);
  const transactions = new EvmTransactionService({
    ...connection,
    privateKey: config.PRIVATE_KEY,
    receiptTimeoutMs: config.RECEIPT_TIMEOUT_MS,
  });
  await ledger.connect();
  await transactions.connect();
  logger.info(
    { chain: chain.name, chainId: config.CHAIN_ID, account: transactions.account },
    "Ledger connected",
  );

  const store = new JsonlRecordStore({ filePath: config.STATE_FILE });
  const service = new CashoutService({
    store,
    ledger,
    transactions,
    cheques: new StoredChequeSource(store),
    logger,
  });

  const { app } = createApp({
    service,
    logger,
    logFn: (entry) => {
      logger.info(entry, `${entry.method} ${entry.path} ${entry.status}`);
    },
  });

  const server = serve({
    fetch: app.fetch,
    port: config.PORT,
    hostname: config.HOST,
  });

  logger.info(
    { port: config.PORT, host: config.HOST, stateFile: store.filePath },
    "Cashout node started",
  );

  // Graceful shutdown. Finalize tasks are not awaited: a receipt wait may
  // never end. Unfinished ones leave no result record.
  const shutdown = async (signal: string): Promise<void> => {
    logger.info(
      { signal, pendingFinalizations: service.supervisor.inFlight },
      "Shutdown signal received",
    );
    server.close();
    await transactions.disconnect();
    await ledger.disconnect();
    logger.info("Shutdown complete");
    process.exit(0);
  };

  process.on("SIGTERM", () => void shutdown("SIGTERM"));
  process.on("SIGINT", () => void shutdown("SIGINT"));
}

main().catch((err: unknown) => {
  // eslint-disable-next-line no-console
  console.error("Fatal startup error:", err);
  process.exit(1);
});
