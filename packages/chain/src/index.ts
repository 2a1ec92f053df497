/**
 * @cashout/chain: Ledger access for settlement.
 *
 * Provides the collaborator contracts the settlement core consumes
 * (LedgerReader, TransactionSubmitter) and their EVM implementations.
 *
 * Design rules:
 * - Chain-agnostic interfaces, chain-specific implementations
 * - Transaction lookups report "not found" as undefined
 * - Transport errors are surfaced, never swallowed
 * - No retries and no deadlines beyond the transport's own
 */

export type {
  LedgerReader,
  TransactionSubmitter,
  TransactionReceipt,
  TransactionLookup,
  ReceiptLog,
  CallRequest,
  TxRequest,
} from "./transaction.js";

export { ChainError } from "./errors.js";
export type { ChainErrorCode } from "./errors.js";

export { VIEM_CHAINS, getViemChain, isSupportedChain } from "./chains.js";

export { EvmLedgerReader, EvmTransactionService, toReceipt } from "./evm/index.js";
export type { EvmConnectionConfig, EvmSignerConfig } from "./evm/index.js";
