/**
 * EVM adapters: Public API
 */
export { EvmLedgerReader, toReceipt } from "./evm-ledger-reader.js";
export type { EvmConnectionConfig } from "./evm-ledger-reader.js";
export { EvmTransactionService } from "./evm-transaction-service.js";
export type { EvmSignerConfig } from "./evm-transaction-service.js";
