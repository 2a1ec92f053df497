/**
 * EVM Ledger Reader: read-only transaction and receipt lookups.
 *
 * Uses viem for all chain interactions.
 *
 * Non-capabilities:
 * - No signing
 * - No transaction submission
 */

import {
  createPublicClient,
  http,
  TransactionNotFoundError,
  type Chain,
  type Hash,
  type HttpTransport,
  type PublicClient,
  type TransactionReceipt as ViemTransactionReceipt,
} from "viem";
import { getViemChain } from "../chains.js";
import { ChainError } from "../errors.js";
import type {
  LedgerReader,
  TransactionLookup,
  TransactionReceipt,
} from "../transaction.js";

// =============================================================================
// Configuration
// =============================================================================

/**
 * Configuration for connecting to an EVM JSON-RPC endpoint.
 */
export interface EvmConnectionConfig {
  /** Numeric chain id (1 = Ethereum mainnet, 199 = BitTorrent Chain, ...) */
  readonly chainId: number;

  /** HTTP JSON-RPC endpoint URL */
  readonly rpcUrl: string;

  /** Optional per-request timeout in milliseconds */
  readonly timeoutMs?: number;
}

// =============================================================================
// EVM Ledger Reader
// =============================================================================

export class EvmLedgerReader implements LedgerReader {
  readonly chainId: number;
  private client: PublicClient<HttpTransport, Chain> | null = null;
  private readonly config: EvmConnectionConfig;

  constructor(config: EvmConnectionConfig) {
    this.chainId = config.chainId;
    this.config = config;
  }

  async connect(): Promise<void> {
    const chain = getViemChain(this.chainId);
    this.client = createPublicClient({
      chain,
      transport: http(this.config.rpcUrl, {
        timeout: this.config.timeoutMs ?? 30_000,
      }),
    });
  }

  async disconnect(): Promise<void> {
    this.client = null;
  }

  async transactionByHash(hash: Hash): Promise<TransactionLookup | undefined> {
    const client = this.requireClient();

    try {
      const tx = await client.getTransaction({ hash });
      const blockNumber: bigint | null = tx.blockNumber;
      return { hash: tx.hash, pending: blockNumber === null };
    } catch (err: unknown) {
      if (err instanceof TransactionNotFoundError) {
        return undefined;
      }
      throw err;
    }
  }

  async transactionReceipt(hash: Hash): Promise<TransactionReceipt> {
    const client = this.requireClient();
    const receipt = await client.getTransactionReceipt({ hash });
    return toReceipt(receipt);
  }

  // ===========================================================================
  // Private helpers
  // ===========================================================================

  private requireClient(): PublicClient<HttpTransport, Chain> {
    if (!this.client) {
      throw new ChainError(
        "NOT_CONNECTED",
        "EvmLedgerReader: not connected. Call connect() before querying.",
      );
    }
    return this.client;
  }
}

/**
 * Narrow a viem receipt to the fields the settlement core reads.
 */
export function toReceipt(receipt: ViemTransactionReceipt): TransactionReceipt {
  return {
    transactionHash: receipt.transactionHash,
    status: receipt.status,
    blockNumber: receipt.blockNumber,
    logs: receipt.logs.map((log) => ({
      address: log.address,
      topics: log.topics,
      data: log.data,
    })),
  };
}
