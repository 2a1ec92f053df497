/**
 * Ledger Interfaces
 *
 * The two collaborator contracts the settlement core talks to:
 * - LedgerReader: read-only lookups of transactions and receipts
 * - TransactionSubmitter: read-only calls, submission, and receipt waits
 *
 * Design rules:
 * - All methods return Promises (ledger queries are inherently async)
 * - "Not found" on a transaction lookup is `undefined`, not an error
 * - Transport errors are thrown and propagate verbatim
 * - No method here retries or imposes its own deadline
 */

import type { Address, Hash, Hex } from "viem";

// =============================================================================
// Receipts
// =============================================================================

/**
 * A log entry emitted by a mined transaction.
 */
export interface ReceiptLog {
  /** Contract that emitted the log */
  readonly address: Address;

  /** Indexed topics; topic 0 is the event selector */
  readonly topics: readonly Hex[];

  /** ABI-encoded non-indexed arguments */
  readonly data: Hex;
}

/**
 * The ledger's record of a mined transaction.
 *
 * Structurally compatible with viem's TransactionReceipt.
 */
export interface TransactionReceipt {
  readonly transactionHash: Hash;
  readonly status: "success" | "reverted";
  readonly blockNumber: bigint;
  readonly logs: readonly ReceiptLog[];
}

/**
 * Result of looking a transaction up by hash.
 */
export interface TransactionLookup {
  readonly hash: Hash;

  /** True while the transaction has not been included in a block */
  readonly pending: boolean;
}

// =============================================================================
// Requests
// =============================================================================

/**
 * A read-only contract call.
 */
export interface CallRequest {
  readonly to: Address;
  readonly data: Hex;
}

/**
 * A state-mutating transaction to be signed and broadcast.
 */
export interface TxRequest {
  readonly to: Address;
  readonly data: Hex;

  /** Native value to transfer, in the smallest unit */
  readonly value: bigint;

  /** Human-readable purpose, for logs only */
  readonly description: string;
}

// =============================================================================
// Collaborators
// =============================================================================

/**
 * Read-only ledger lookups.
 */
export interface LedgerReader {
  /**
   * Look a transaction up by hash.
   *
   * @returns undefined when the node does not know the transaction
   */
  transactionByHash(hash: Hash): Promise<TransactionLookup | undefined>;

  /**
   * Fetch the receipt of a mined transaction.
   */
  transactionReceipt(hash: Hash): Promise<TransactionReceipt>;
}

/**
 * Builds, signs and broadcasts transactions; performs read-only calls.
 */
export interface TransactionSubmitter {
  /** Execute a read-only call and return the raw return data. */
  call(request: CallRequest): Promise<Hex>;

  /** Sign and broadcast a transaction, returning its hash. */
  send(request: TxRequest): Promise<Hash>;

  /**
   * Block until the receipt of `hash` is available.
   *
   * May take far longer than any request timeout.
   */
  waitForReceipt(hash: Hash): Promise<TransactionReceipt>;
}
