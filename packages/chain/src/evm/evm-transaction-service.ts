/**
 * EVM Transaction Service
 *
 * Signs and broadcasts transactions from a single private-key account,
 * performs read-only calls, and waits for receipts.
 *
 * Transaction flow:
 * 1. Build the request (target, calldata, value)
 * 2. Let viem fill nonce, gas and fees
 * 3. Sign locally with the configured key
 * 4. Broadcast and return the hash without waiting
 *
 * Nothing here retries. A stuck or failed transaction is surfaced to
 * the caller, who decides whether to submit again.
 */

import {
  createPublicClient,
  createWalletClient,
  http,
  type Address,
  type Chain,
  type Hash,
  type Hex,
  type HttpTransport,
  type PublicClient,
} from "viem";
import { privateKeyToAccount, type PrivateKeyAccount } from "viem/accounts";
import { getViemChain } from "../chains.js";
import { ChainError } from "../errors.js";
import type {
  CallRequest,
  TransactionReceipt,
  TransactionSubmitter,
  TxRequest,
} from "../transaction.js";
import { toReceipt, type EvmConnectionConfig } from "./evm-ledger-reader.js";

// =============================================================================
// Configuration
// =============================================================================

export interface EvmSignerConfig extends EvmConnectionConfig {
  /** Hex-encoded secp256k1 private key of the sending account */
  readonly privateKey: Hex;

  /**
   * Receipt wait limit in milliseconds. 0 (the default) waits without
   * limit; confirmation can outlast any request timeout.
   */
  readonly receiptTimeoutMs?: number;
}

function createSignerClient(chain: Chain, transport: HttpTransport, account: PrivateKeyAccount) {
  return createWalletClient({ account, chain, transport });
}

type SignerClient = ReturnType<typeof createSignerClient>;

interface Clients {
  readonly publicClient: PublicClient<HttpTransport, Chain>;
  readonly walletClient: SignerClient;
}

// =============================================================================
// EVM Transaction Service
// =============================================================================

export class EvmTransactionService implements TransactionSubmitter {
  readonly chainId: number;
  readonly account: Address;
  private clients: Clients | null = null;
  private readonly signer: PrivateKeyAccount;
  private readonly config: EvmSignerConfig;

  constructor(config: EvmSignerConfig) {
    this.chainId = config.chainId;
    this.config = config;
    this.signer = privateKeyToAccount(config.privateKey);
    this.account = this.signer.address;
  }

  async connect(): Promise<void> {
    const chain = getViemChain(this.chainId);
    const transport = http(this.config.rpcUrl, {
      timeout: this.config.timeoutMs ?? 30_000,
    });

    this.clients = {
      publicClient: createPublicClient({ chain, transport }),
      walletClient: createSignerClient(chain, transport, this.signer),
    };
  }

  async disconnect(): Promise<void> {
    this.clients = null;
  }

  async call(request: CallRequest): Promise<Hex> {
    const { publicClient } = this.requireClients();
    const result = await publicClient.call({
      account: this.account,
      to: request.to,
      data: request.data,
    });

    if (result.data === undefined) {
      throw new ChainError(
        "EMPTY_CALL_RESULT",
        `call to ${request.to} returned no data`,
      );
    }
    return result.data;
  }

  async send(request: TxRequest): Promise<Hash> {
    const { walletClient } = this.requireClients();
    return walletClient.sendTransaction({
      to: request.to,
      data: request.data,
      value: request.value,
    });
  }

  async waitForReceipt(hash: Hash): Promise<TransactionReceipt> {
    const { publicClient } = this.requireClients();
    const receipt = await publicClient.waitForTransactionReceipt({
      hash,
      timeout: this.config.receiptTimeoutMs ?? 0,
    });
    return toReceipt(receipt);
  }

  // ===========================================================================
  // Private helpers
  // ===========================================================================

  private requireClients(): Clients {
    if (!this.clients) {
      throw new ChainError(
        "NOT_CONNECTED",
        "EvmTransactionService: not connected. Call connect() before use.",
      );
    }
    return this.clients;
  }
}
