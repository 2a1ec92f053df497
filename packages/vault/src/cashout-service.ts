/**
 * CashoutService: submits cheques for settlement and reconciles their
 * status against the ledger.
 *
 * Sources of truth, in the order they are consulted:
 * 1. The latest off-chain cheque (ChequeSource)
 * 2. The last submitted CashoutAction (RecordStore)
 * 3. The live ledger: pending / reverted / confirmed (LedgerReader)
 *
 * A submission returns as soon as the transaction is broadcast. A detached
 * finalize task then waits for the receipt, records a CashOutResult and
 * updates the received-cashed aggregates.
 *
 * Known hazards, kept as-is:
 * - One action record per vault; concurrent submissions are last-write-wins
 *   and an older finalize task may record against a newer action.
 * - Aggregate counters are read-then-write without a guard; concurrent
 *   finalizations can lose an increment.
 */

import {
  decodeFunctionResult,
  encodeFunctionData,
  type Address,
  type Hash,
} from "viem";
import type { Logger } from "pino";
import type { RecordStore } from "@cashout/state-store";
import type { LedgerReader, TransactionSubmitter } from "@cashout/chain";
import {
  AmountSchema,
  CashOutResultSchema,
  CashoutActionSchema,
  CountSchema,
  decodeRecord,
  encodeRecord,
} from "./codec.js";
import {
  CASHOUT_RESULT_PREFIX,
  TOTAL_RECEIVED_CASHED_COUNT_KEY,
  TOTAL_RECEIVED_CASHED_KEY,
  cashoutActionKey,
  cashoutResultKey,
  dailyReceivedCashedKey,
  uncashedRecordsCountKey,
} from "./keys.js";
import { parseCashChequeBeneficiaryReceipt } from "./receipt-parser.js";
import { TaskSupervisor } from "./supervisor.js";
import { VAULT_ABI } from "./vault-abi.js";
import { CashoutError } from "./types.js";
import type {
  CashOutResult,
  CashoutAction,
  CashoutStats,
  CashoutStatus,
  ChequeSource,
  SignedCheque,
} from "./types.js";

// =============================================================================
// Configuration
// =============================================================================

export interface CashoutServiceDeps {
  readonly store: RecordStore;
  readonly ledger: LedgerReader;
  readonly transactions: TransactionSubmitter;
  readonly cheques: ChequeSource;
  readonly logger: Logger;

  /** Runs finalize tasks. Default: a supervisor on `logger` */
  readonly supervisor?: TaskSupervisor;

  /** Clock for result timestamps and daily buckets. Default: system time */
  readonly now?: () => Date;
}

type Settlement = Pick<CashOutResult, "amount" | "status">;

// =============================================================================
// CashoutService
// =============================================================================

export class CashoutService {
  readonly supervisor: TaskSupervisor;
  private readonly store: RecordStore;
  private readonly ledger: LedgerReader;
  private readonly transactions: TransactionSubmitter;
  private readonly cheques: ChequeSource;
  private readonly log: Logger;
  private readonly now: () => Date;

  constructor(deps: CashoutServiceDeps) {
    this.store = deps.store;
    this.ledger = deps.ledger;
    this.transactions = deps.transactions;
    this.cheques = deps.cheques;
    this.log = deps.logger.child({ component: "cashout" });
    this.supervisor = deps.supervisor ?? new TaskSupervisor(this.log);
    this.now = deps.now ?? (() => new Date());
  }

  // ───────────────────────────────────────────────────────────────────────
  // Submission
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Send a cashing transaction for the latest cheque of `vault`, paying
   * `recipient`. Returns the transaction hash without waiting for it to
   * be mined.
   *
   * @throws CashoutError NO_PRIOR_CHEQUE
   */
  async cashCheque(vault: Address, recipient: Address): Promise<Hash> {
    const cheque = await this.requireCheque(vault);

    const data = encodeFunctionData({
      abi: VAULT_ABI,
      functionName: "cashChequeBeneficiary",
      args: [recipient, cheque.cumulativePayout, cheque.signature],
    });

    const txHash = await this.transactions.send({
      to: vault,
      data,
      value: 0n,
      description: "cheque cashout",
    });

    const action: CashoutAction = { txHash, cheque };
    await this.store.put(cashoutActionKey(vault), encodeRecord(action));

    this.log.info(
      { vault, txHash, cumulativePayout: cheque.cumulativePayout.toString() },
      "cashout submitted",
    );

    this.supervisor.spawn(`finalize-cashout:${txHash}`, () =>
      this.finalizeCashout(vault, txHash, cheque),
    );

    return txHash;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Status
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Reconcile the latest cheque, the last submitted action and the ledger
   * into a point-in-time status for `vault`.
   *
   * @throws CashoutError NO_PRIOR_CHEQUE
   * @throws ReceiptDecodeError when a confirmed receipt lacks the settlement event
   */
  async cashoutStatus(vault: Address): Promise<CashoutStatus> {
    const cheque = await this.requireCheque(vault);

    const action = await this.loadAction(vault);
    if (action === undefined) {
      // Never cashed: everything is outstanding
      return { last: undefined, uncashedAmount: cheque.cumulativePayout };
    }

    // A transaction the node has not indexed yet looks the same as one
    // still in the mempool.
    const lookup = await this.ledger.transactionByHash(action.txHash);
    const pending = lookup === undefined || lookup.pending;

    if (pending) {
      return {
        last: {
          txHash: action.txHash,
          cheque: action.cheque,
          result: undefined,
          reverted: false,
        },
        // The in-flight transaction is assumed to clear the full cheque it carries
        uncashedAmount: cheque.cumulativePayout - action.cheque.cumulativePayout,
      };
    }

    const receipt = await this.ledger.transactionReceipt(action.txHash);

    if (receipt.status === "reverted") {
      // Local bookkeeping no longer describes what settled; ask the vault.
      const paidOut = await this.paidOut(vault, cheque.beneficiary);
      return {
        last: {
          txHash: action.txHash,
          cheque: action.cheque,
          result: undefined,
          reverted: true,
        },
        uncashedAmount: cheque.cumulativePayout - paidOut,
      };
    }

    const result = parseCashChequeBeneficiaryReceipt(vault, receipt);
    return {
      last: {
        txHash: action.txHash,
        cheque: action.cheque,
        result,
        reverted: false,
      },
      uncashedAmount: cheque.cumulativePayout - result.cumulativePayout,
    };
  }

  /**
   * Whether a cashout was ever submitted for `vault`, confirmed or not.
   */
  async hasCashoutAction(vault: Address): Promise<boolean> {
    return (await this.store.get(cashoutActionKey(vault))) !== undefined;
  }

  // ───────────────────────────────────────────────────────────────────────
  // History & statistics
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Every persisted CashOutResult, one per vault, in store key order.
   */
  async cashoutResults(): Promise<CashOutResult[]> {
    const results: CashOutResult[] = [];
    for await (const entry of this.store.entries(CASHOUT_RESULT_PREFIX)) {
      results.push(decodeRecord(CashOutResultSchema, entry.value));
    }
    return results;
  }

  async cashoutStats(): Promise<CashoutStats> {
    const [totalReceivedCashed, todayReceivedCashed, totalReceivedCashedCount] =
      await Promise.all([
        this.readAmount(TOTAL_RECEIVED_CASHED_KEY),
        this.readAmount(dailyReceivedCashedKey(this.now())),
        this.readCount(TOTAL_RECEIVED_CASHED_COUNT_KEY),
      ]);

    return { totalReceivedCashed, todayReceivedCashed, totalReceivedCashedCount };
  }

  // ───────────────────────────────────────────────────────────────────────
  // Finalize pipeline
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Wait for `txHash`, then persist its CashOutResult and, on a confirmed
   * settlement, fold it into the aggregates. Never throws.
   */
  private async finalizeCashout(
    vault: Address,
    txHash: Hash,
    cheque: SignedCheque,
  ): Promise<void> {
    const log = this.log.child({ vault, txHash });
    const cashTime = Math.floor(this.now().getTime() / 1000);

    const settlement = await this.settle(vault, txHash, cheque, log);
    const result: CashOutResult = { txHash, vault, cashTime, ...settlement };

    try {
      await this.store.put(cashoutResultKey(vault), encodeRecord(result));
      log.info(
        { status: result.status, amount: result.amount.toString() },
        "cashout result stored",
      );
    } catch (err: unknown) {
      log.error({ err }, "storing cashout result failed");
    }
  }

  private async settle(
    vault: Address,
    txHash: Hash,
    cheque: SignedCheque,
    log: Logger,
  ): Promise<Settlement> {
    const failed: Settlement = { amount: cheque.cumulativePayout, status: "fail" };

    try {
      await this.transactions.waitForReceipt(txHash);
    } catch (err: unknown) {
      log.warn({ err }, "waiting for cashout receipt failed");
      const estimate = await this.estimateUncashed(vault, log);
      return estimate === undefined ? failed : { amount: estimate, status: "fail" };
    }

    let status: CashoutStatus;
    try {
      status = await this.cashoutStatus(vault);
    } catch (err: unknown) {
      log.warn({ err }, "deriving cashout status failed");
      return failed;
    }

    if (status.last !== undefined && status.last.txHash !== txHash) {
      log.warn(
        { latestTxHash: status.last.txHash },
        "cashout action was replaced while finalizing",
      );
    }

    const confirmed = status.last?.result;
    if (confirmed === undefined) {
      log.warn(
        { reverted: status.last?.reverted ?? false },
        "cashout not confirmed after receipt",
      );
      return { amount: status.uncashedAmount, status: "fail" };
    }

    await this.recordCashed(vault, confirmed.totalPayout, log);
    return { amount: confirmed.totalPayout, status: "success" };
  }

  private async estimateUncashed(
    vault: Address,
    log: Logger,
  ): Promise<bigint | undefined> {
    try {
      return (await this.cashoutStatus(vault)).uncashedAmount;
    } catch (err: unknown) {
      log.warn({ err }, "estimating uncashed amount failed");
      return undefined;
    }
  }

  /**
   * Fold a confirmed payout into the aggregates. Each counter is updated
   * independently; a failure is logged and the rest still run.
   */
  private async recordCashed(
    vault: Address,
    totalPayout: bigint,
    log: Logger,
  ): Promise<void> {
    await this.addToAmount(TOTAL_RECEIVED_CASHED_KEY, totalPayout, log);
    await this.addToAmount(dailyReceivedCashedKey(this.now()), totalPayout, log);
    await this.moveUncashedCount(vault, log);
  }

  private async addToAmount(key: string, delta: bigint, log: Logger): Promise<void> {
    try {
      const current = await this.readAmount(key);
      await this.store.put(key, encodeRecord(current + delta));
    } catch (err: unknown) {
      log.warn({ err, key }, "updating received-cashed amount failed");
    }
  }

  private async moveUncashedCount(vault: Address, log: Logger): Promise<void> {
    const vaultKey = uncashedRecordsCountKey(vault);
    try {
      const uncashed = await this.readCount(vaultKey);
      const cashed = await this.readCount(TOTAL_RECEIVED_CASHED_COUNT_KEY);
      await this.store.put(TOTAL_RECEIVED_CASHED_COUNT_KEY, encodeRecord(cashed + uncashed));
      await this.store.put(vaultKey, encodeRecord(0));
    } catch (err: unknown) {
      log.warn({ err }, "updating received-cashed count failed");
    }
  }

  // ───────────────────────────────────────────────────────────────────────
  // Helpers
  // ───────────────────────────────────────────────────────────────────────

  private async requireCheque(vault: Address): Promise<SignedCheque> {
    const cheque = await this.cheques.latestCheque(vault);
    if (cheque === undefined) {
      throw new CashoutError(
        "NO_PRIOR_CHEQUE",
        `no cheque received for vault ${vault}`,
        vault,
      );
    }
    return cheque;
  }

  private async loadAction(vault: Address): Promise<CashoutAction | undefined> {
    const raw = await this.store.get(cashoutActionKey(vault));
    return raw === undefined ? undefined : decodeRecord(CashoutActionSchema, raw);
  }

  /**
   * Live cumulative amount the vault has paid to `beneficiary`.
   */
  private async paidOut(vault: Address, beneficiary: Address): Promise<bigint> {
    const output = await this.transactions.call({
      to: vault,
      data: encodeFunctionData({
        abi: VAULT_ABI,
        functionName: "paidOut",
        args: [beneficiary],
      }),
    });

    return decodeFunctionResult({
      abi: VAULT_ABI,
      functionName: "paidOut",
      data: output,
    });
  }

  private async readAmount(key: string): Promise<bigint> {
    const raw = await this.store.get(key);
    return raw === undefined ? 0n : decodeRecord(AmountSchema, raw);
  }

  private async readCount(key: string): Promise<number> {
    const raw = await this.store.get(key);
    return raw === undefined ? 0 : decodeRecord(CountSchema, raw);
  }
}
