/**
 * Tests for CashoutService.
 *
 * Ledger and submitter are vi.fn stand-ins; the record store is the
 * in-memory implementation shared with a StoredChequeSource.
 */

import { describe, it, expect, vi, beforeEach, type Mock } from "vitest";
import pino from "pino";
import { encodeFunctionData, encodeFunctionResult, type Hash } from "viem";
import { InMemoryRecordStore } from "@cashout/state-store";
import type {
  LedgerReader,
  TransactionReceipt,
  TransactionSubmitter,
} from "@cashout/chain";
import { CashoutService } from "../src/cashout-service.js";
import { StoredChequeSource } from "../src/cheque-store.js";
import { CashoutActionSchema, decodeRecord, encodeRecord } from "../src/codec.js";
import {
  CASHOUT_RESULT_PREFIX,
  TOTAL_RECEIVED_CASHED_COUNT_KEY,
  TOTAL_RECEIVED_CASHED_KEY,
  cashoutActionKey,
  dailyReceivedCashedKey,
  uncashedRecordsCountKey,
} from "../src/keys.js";
import { VAULT_ABI } from "../src/vault-abi.js";
import { CashoutError, ReceiptDecodeError } from "../src/types.js";
import {
  BENEFICIARY,
  OTHER_VAULT,
  RECIPIENT,
  SIGNATURE,
  TX_HASH,
  VAULT,
  cheque,
  chequeBouncedLog,
  chequeCashedLog,
  receipt,
} from "./fixtures.js";

// =============================================================================
// Harness
// =============================================================================

const NOW = new Date("2026-03-14T10:00:00.000Z");
const SECOND_TX_HASH = `0x${"ef".repeat(32)}` as const;

interface Harness {
  store: InMemoryRecordStore;
  cheques: StoredChequeSource;
  ledger: {
    transactionByHash: Mock<LedgerReader["transactionByHash"]>;
    transactionReceipt: Mock<LedgerReader["transactionReceipt"]>;
  };
  transactions: {
    call: Mock<TransactionSubmitter["call"]>;
    send: Mock<TransactionSubmitter["send"]>;
    waitForReceipt: Mock<TransactionSubmitter["waitForReceipt"]>;
  };
  clock: { now: Date };
  service: CashoutService;
}

function createHarness(
  store = new InMemoryRecordStore(),
  logger = pino({ level: "silent" }),
): Harness {
  const cheques = new StoredChequeSource(store);
  const ledger = {
    transactionByHash: vi.fn<LedgerReader["transactionByHash"]>(),
    transactionReceipt: vi.fn<LedgerReader["transactionReceipt"]>(),
  };
  const transactions = {
    call: vi.fn<TransactionSubmitter["call"]>(),
    send: vi.fn<TransactionSubmitter["send"]>(),
    waitForReceipt: vi.fn<TransactionSubmitter["waitForReceipt"]>(),
  };
  const clock = { now: NOW };

  transactions.send.mockResolvedValue(TX_HASH);
  ledger.transactionByHash.mockResolvedValue(undefined);

  const service = new CashoutService({
    store,
    ledger,
    transactions,
    cheques,
    logger,
    now: () => clock.now,
  });

  return { store, cheques, ledger, transactions, clock, service };
}

/** Store an action directly, as a previous submission would have. */
async function storeAction(h: Harness, cumulativePayout: bigint, txHash: Hash = TX_HASH) {
  await h.store.put(
    cashoutActionKey(VAULT),
    encodeRecord({ txHash, cheque: cheque(cumulativePayout) }),
  );
}

/** Make the ledger report `txHash` as mined with `mined`. */
function mine(h: Harness, mined: TransactionReceipt): void {
  h.ledger.transactionByHash.mockResolvedValue({
    hash: mined.transactionHash,
    pending: false,
  });
  h.ledger.transactionReceipt.mockResolvedValue(mined);
  h.transactions.waitForReceipt.mockResolvedValue(mined);
}

function paidOutReturns(amount: bigint): `0x${string}` {
  return encodeFunctionResult({ abi: VAULT_ABI, functionName: "paidOut", result: amount });
}

interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (reason: Error) => void;
}

function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  let reject: (reason: Error) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

/** Logger whose JSON lines are collected in `lines`. */
function capturingLogger() {
  const lines: Record<string, unknown>[] = [];
  const logger = pino(
    { level: "info" },
    {
      write(msg: string) {
        const parsed: unknown = JSON.parse(msg);
        if (typeof parsed === "object" && parsed !== null) {
          lines.push({ ...parsed });
        }
      },
    },
  );
  return { logger, lines };
}

// =============================================================================
// cashCheque
// =============================================================================

describe("CashoutService.cashCheque", () => {
  let h: Harness;

  beforeEach(() => {
    h = createHarness();
    h.transactions.waitForReceipt.mockRejectedValue(new Error("receipt timeout"));
  });

  it("submits the latest cheque and returns the transaction hash", async () => {
    await h.cheques.receiveCheque(cheque(100n));

    const txHash = await h.service.cashCheque(VAULT, RECIPIENT);

    expect(txHash).toBe(TX_HASH);
    expect(h.transactions.send).toHaveBeenCalledWith({
      to: VAULT,
      data: encodeFunctionData({
        abi: VAULT_ABI,
        functionName: "cashChequeBeneficiary",
        args: [RECIPIENT, 100n, SIGNATURE],
      }),
      value: 0n,
      description: "cheque cashout",
    });
    await h.service.supervisor.drain();
  });

  it("stores the action keyed by vault", async () => {
    await h.cheques.receiveCheque(cheque(100n));

    await h.service.cashCheque(VAULT, RECIPIENT);

    const raw = await h.store.get(cashoutActionKey(VAULT));
    expect(raw).toBeDefined();
    const action = decodeRecord(CashoutActionSchema, raw ?? "");
    expect(action.txHash).toBe(TX_HASH);
    expect(action.cheque.cumulativePayout).toBe(100n);
    await h.service.supervisor.drain();
  });

  it("flips hasCashoutAction from false to true", async () => {
    await h.cheques.receiveCheque(cheque(100n));
    expect(await h.service.hasCashoutAction(VAULT)).toBe(false);

    await h.service.cashCheque(VAULT, RECIPIENT);

    expect(await h.service.hasCashoutAction(VAULT)).toBe(true);
    expect(await h.service.hasCashoutAction(OTHER_VAULT)).toBe(false);
    await h.service.supervisor.drain();
  });

  it("returns before the receipt is available", async () => {
    await h.cheques.receiveCheque(cheque(100n));
    const wait = deferred<TransactionReceipt>();
    h.transactions.waitForReceipt.mockReturnValue(wait.promise);

    await h.service.cashCheque(VAULT, RECIPIENT);

    expect(h.service.supervisor.inFlight).toBe(1);
    wait.resolve(receipt([], "reverted"));
    await h.service.supervisor.drain();
    expect(h.service.supervisor.inFlight).toBe(0);
  });

  it("fails with NO_PRIOR_CHEQUE and sends nothing", async () => {
    await expect(h.service.cashCheque(VAULT, RECIPIENT)).rejects.toBeInstanceOf(CashoutError);
    await expect(h.service.cashCheque(VAULT, RECIPIENT)).rejects.toMatchObject({
      code: "NO_PRIOR_CHEQUE",
    });
    expect(h.transactions.send).not.toHaveBeenCalled();
    expect(await h.service.hasCashoutAction(VAULT)).toBe(false);
  });

  it("stores no action when sending fails", async () => {
    await h.cheques.receiveCheque(cheque(100n));
    h.transactions.send.mockRejectedValue(new Error("insufficient funds"));

    await expect(h.service.cashCheque(VAULT, RECIPIENT)).rejects.toThrow("insufficient funds");
    expect(await h.service.hasCashoutAction(VAULT)).toBe(false);
    expect(h.service.supervisor.inFlight).toBe(0);
  });
});

// =============================================================================
// cashoutStatus
// =============================================================================

describe("CashoutService.cashoutStatus", () => {
  let h: Harness;

  beforeEach(() => {
    h = createHarness();
  });

  it("reports the full cheque as uncashed when nothing was submitted", async () => {
    await h.cheques.receiveCheque(cheque(100n));

    const status = await h.service.cashoutStatus(VAULT);

    expect(status).toEqual({ last: undefined, uncashedAmount: 100n });
    expect(h.ledger.transactionByHash).not.toHaveBeenCalled();
  });

  it("fails with NO_PRIOR_CHEQUE without a cheque", async () => {
    await expect(h.service.cashoutStatus(VAULT)).rejects.toMatchObject({
      code: "NO_PRIOR_CHEQUE",
      vault: VAULT,
    });
  });

  it("subtracts the in-flight cheque while the transaction is not indexed", async () => {
    await h.cheques.receiveCheque(cheque(100n));
    const wait = deferred<TransactionReceipt>();
    h.transactions.waitForReceipt.mockReturnValue(wait.promise);
    await h.service.cashCheque(VAULT, RECIPIENT);
    await h.cheques.receiveCheque(cheque(150n));

    const status = await h.service.cashoutStatus(VAULT);

    expect(status.uncashedAmount).toBe(50n);
    expect(status.last?.txHash).toBe(TX_HASH);
    expect(status.last?.reverted).toBe(false);
    expect(status.last?.result).toBeUndefined();
    expect(status.last?.cheque.cumulativePayout).toBe(100n);

    wait.resolve(receipt([], "reverted"));
    await h.service.supervisor.drain();
  });

  it("treats a transaction still in the mempool as pending", async () => {
    await h.cheques.receiveCheque(cheque(150n));
    await storeAction(h, 100n);
    h.ledger.transactionByHash.mockResolvedValue({ hash: TX_HASH, pending: true });

    const status = await h.service.cashoutStatus(VAULT);

    expect(status.uncashedAmount).toBe(50n);
    expect(h.ledger.transactionReceipt).not.toHaveBeenCalled();
  });

  it("queries paidOut live for a reverted transaction", async () => {
    await h.cheques.receiveCheque(cheque(150n));
    await storeAction(h, 100n);
    mine(h, receipt([], "reverted"));
    h.transactions.call.mockResolvedValue(paidOutReturns(80n));

    const status = await h.service.cashoutStatus(VAULT);

    expect(status.uncashedAmount).toBe(70n);
    expect(status.last?.reverted).toBe(true);
    expect(status.last?.result).toBeUndefined();
    expect(h.transactions.call).toHaveBeenCalledWith({
      to: VAULT,
      data: encodeFunctionData({
        abi: VAULT_ABI,
        functionName: "paidOut",
        args: [BENEFICIARY],
      }),
    });
  });

  it("decodes a confirmed settlement", async () => {
    await h.cheques.receiveCheque(cheque(150n));
    await storeAction(h, 100n);
    mine(h, receipt([chequeCashedLog(VAULT, { totalPayout: 60n, cumulativePayout: 100n })]));

    const status = await h.service.cashoutStatus(VAULT);

    expect(status.uncashedAmount).toBe(50n);
    expect(status.last?.reverted).toBe(false);
    expect(status.last?.result?.totalPayout).toBe(60n);
    expect(status.last?.result?.bounced).toBe(false);
    expect(h.transactions.call).not.toHaveBeenCalled();
  });

  it("keeps the uncashed formula for a bounced settlement", async () => {
    await h.cheques.receiveCheque(cheque(150n));
    await storeAction(h, 100n);
    mine(
      h,
      receipt([
        chequeCashedLog(VAULT, { totalPayout: 60n, cumulativePayout: 100n }),
        chequeBouncedLog(VAULT),
      ]),
    );

    const status = await h.service.cashoutStatus(VAULT);

    expect(status.last?.result?.bounced).toBe(true);
    expect(status.uncashedAmount).toBe(50n);
  });

  it("fails when the confirmed receipt lacks the settlement event", async () => {
    await h.cheques.receiveCheque(cheque(150n));
    await storeAction(h, 100n);
    mine(h, receipt([chequeBouncedLog(VAULT)]));

    const pending = h.service.cashoutStatus(VAULT);
    await expect(pending).rejects.toBeInstanceOf(ReceiptDecodeError);
    await expect(h.service.cashoutStatus(VAULT)).rejects.toMatchObject({
      code: "EVENT_NOT_FOUND",
    });
  });

  it("propagates ledger errors", async () => {
    await h.cheques.receiveCheque(cheque(150n));
    await storeAction(h, 100n);
    h.ledger.transactionByHash.mockRejectedValue(new Error("rpc unavailable"));

    await expect(h.service.cashoutStatus(VAULT)).rejects.toThrow("rpc unavailable");
  });
});

// =============================================================================
// Finalize pipeline
// =============================================================================

describe("CashoutService finalize", () => {
  let h: Harness;

  beforeEach(async () => {
    h = createHarness();
    await h.cheques.receiveCheque(cheque(60n));
    await h.cheques.receiveCheque(cheque(100n));
  });

  it("records a confirmed cashout and updates the aggregates", async () => {
    mine(h, receipt([chequeCashedLog(VAULT, { totalPayout: 40n, cumulativePayout: 100n })]));

    await h.service.cashCheque(VAULT, RECIPIENT);
    await h.service.supervisor.drain();

    expect(await h.service.cashoutResults()).toEqual([
      {
        txHash: TX_HASH,
        vault: VAULT,
        amount: 40n,
        cashTime: Math.floor(NOW.getTime() / 1000),
        status: "success",
      },
    ]);
    expect(await h.service.cashoutStats()).toEqual({
      totalReceivedCashed: 40n,
      todayReceivedCashed: 40n,
      totalReceivedCashedCount: 2,
    });
    expect(await h.cheques.uncashedRecordsCount(VAULT)).toBe(0);
  });

  it("adds to existing totals", async () => {
    await h.store.put(TOTAL_RECEIVED_CASHED_KEY, encodeRecord(10n));
    await h.store.put(TOTAL_RECEIVED_CASHED_COUNT_KEY, encodeRecord(5));
    mine(h, receipt([chequeCashedLog(VAULT, { totalPayout: 40n, cumulativePayout: 100n })]));

    await h.service.cashCheque(VAULT, RECIPIENT);
    await h.service.supervisor.drain();

    const stats = await h.service.cashoutStats();
    expect(stats.totalReceivedCashed).toBe(50n);
    expect(stats.todayReceivedCashed).toBe(40n);
    expect(stats.totalReceivedCashedCount).toBe(7);
  });

  it("buckets the daily amount by UTC day", async () => {
    mine(h, receipt([chequeCashedLog(VAULT, { totalPayout: 40n, cumulativePayout: 100n })]));

    await h.service.cashCheque(VAULT, RECIPIENT);
    await h.service.supervisor.drain();

    expect(await h.store.get("cashout:daily-received-cashed:2026-03-14")).toBe('"40"');
    h.clock.now = new Date("2026-03-15T00:00:00.000Z");
    expect((await h.service.cashoutStats()).todayReceivedCashed).toBe(0n);
  });

  it("records a failure for a reverted transaction without touching aggregates", async () => {
    mine(h, receipt([], "reverted"));
    h.transactions.call.mockResolvedValue(paidOutReturns(30n));

    await h.service.cashCheque(VAULT, RECIPIENT);
    await h.service.supervisor.drain();

    const [result] = await h.service.cashoutResults();
    expect(result?.status).toBe("fail");
    expect(result?.amount).toBe(70n);
    expect(await h.store.get(TOTAL_RECEIVED_CASHED_KEY)).toBeUndefined();
    expect(await h.cheques.uncashedRecordsCount(VAULT)).toBe(2);
  });

  it("estimates the amount from status when the receipt wait fails", async () => {
    const wait = deferred<TransactionReceipt>();
    h.transactions.waitForReceipt.mockReturnValue(wait.promise);
    await h.cheques.receiveCheque(cheque(130n));

    await h.service.cashCheque(VAULT, RECIPIENT);
    await h.cheques.receiveCheque(cheque(170n));
    wait.reject(new Error("receipt timeout"));
    await h.service.supervisor.drain();

    const [result] = await h.service.cashoutResults();
    expect(result).toMatchObject({ status: "fail", amount: 40n, txHash: TX_HASH });
  });

  it("falls back to the cheque amount when no estimate is available", async () => {
    h.transactions.waitForReceipt.mockRejectedValue(new Error("receipt timeout"));
    h.ledger.transactionByHash.mockRejectedValue(new Error("rpc unavailable"));

    await h.service.cashCheque(VAULT, RECIPIENT);
    await h.service.supervisor.drain();

    const [result] = await h.service.cashoutResults();
    expect(result).toMatchObject({ status: "fail", amount: 100n });
  });

  it("records a failure when the receipt cannot be decoded", async () => {
    mine(h, receipt([]));

    await h.service.cashCheque(VAULT, RECIPIENT);
    await h.service.supervisor.drain();

    const [result] = await h.service.cashoutResults();
    expect(result).toMatchObject({ status: "fail", amount: 100n });
    expect(await h.store.get(TOTAL_RECEIVED_CASHED_KEY)).toBeUndefined();
  });

  it("records a failure when the transaction is still unindexed after the wait", async () => {
    const wait = deferred<TransactionReceipt>();
    h.transactions.waitForReceipt.mockReturnValue(wait.promise);

    await h.service.cashCheque(VAULT, RECIPIENT);
    await h.cheques.receiveCheque(cheque(130n));
    wait.resolve(receipt([chequeCashedLog(VAULT, { totalPayout: 40n, cumulativePayout: 100n })]));
    await h.service.supervisor.drain();

    expect(await h.service.cashoutResults()).toEqual([
      {
        txHash: TX_HASH,
        vault: VAULT,
        amount: 30n,
        cashTime: Math.floor(NOW.getTime() / 1000),
        status: "fail",
      },
    ]);
    expect(h.ledger.transactionReceipt).not.toHaveBeenCalled();
    expect(await h.store.get(TOTAL_RECEIVED_CASHED_KEY)).toBeUndefined();
    expect(await h.store.get(TOTAL_RECEIVED_CASHED_COUNT_KEY)).toBeUndefined();
    expect(await h.cheques.uncashedRecordsCount(VAULT)).toBe(3);
  });

  it("finalizes an older submission against the action that replaced it", async () => {
    const { logger, lines } = capturingLogger();
    h = createHarness(new InMemoryRecordStore(), logger);
    await h.cheques.receiveCheque(cheque(100n));

    const firstWait = deferred<TransactionReceipt>();
    const secondWait = deferred<TransactionReceipt>();
    h.transactions.send.mockResolvedValueOnce(TX_HASH).mockResolvedValueOnce(SECOND_TX_HASH);
    h.transactions.waitForReceipt
      .mockReturnValueOnce(firstWait.promise)
      .mockReturnValueOnce(secondWait.promise);

    await h.service.cashCheque(VAULT, RECIPIENT);
    await h.cheques.receiveCheque(cheque(150n));
    await h.service.cashCheque(VAULT, RECIPIENT);

    const stored = decodeRecord(CashoutActionSchema, (await h.store.get(cashoutActionKey(VAULT))) ?? "");
    expect(stored.txHash).toBe(SECOND_TX_HASH);

    // Only the replacing transaction is visible through the action record
    const second = receipt(
      [chequeCashedLog(VAULT, { totalPayout: 150n, cumulativePayout: 150n })],
      "success",
      SECOND_TX_HASH,
    );
    h.ledger.transactionByHash.mockResolvedValue({ hash: SECOND_TX_HASH, pending: false });
    h.ledger.transactionReceipt.mockResolvedValue(second);

    firstWait.resolve(receipt([], "success", TX_HASH));
    await vi.waitFor(async () => {
      expect(await h.service.cashoutResults()).toHaveLength(1);
    });

    expect(await h.service.cashoutResults()).toEqual([
      {
        txHash: TX_HASH,
        vault: VAULT,
        amount: 150n,
        cashTime: Math.floor(NOW.getTime() / 1000),
        status: "success",
      },
    ]);
    expect(await h.service.cashoutStats()).toEqual({
      totalReceivedCashed: 150n,
      todayReceivedCashed: 150n,
      totalReceivedCashedCount: 2,
    });
    expect(await h.cheques.uncashedRecordsCount(VAULT)).toBe(0);
    expect(lines).toContainEqual(
      expect.objectContaining({
        level: 40,
        msg: "cashout action was replaced while finalizing",
        txHash: TX_HASH,
        latestTxHash: SECOND_TX_HASH,
      }),
    );

    // The replacing task settles the same payout again: last write wins on
    // the result record, and the totals count it twice.
    secondWait.resolve(second);
    await h.service.supervisor.drain();

    const [result] = await h.service.cashoutResults();
    expect(result).toMatchObject({ txHash: SECOND_TX_HASH, amount: 150n, status: "success" });
    expect(await h.service.cashoutStats()).toEqual({
      totalReceivedCashed: 300n,
      todayReceivedCashed: 300n,
      totalReceivedCashedCount: 2,
    });
  });

  it("keeps updating other counters when one write fails", async () => {
    const store = new FailingStore((key) => key === TOTAL_RECEIVED_CASHED_KEY);
    h = createHarness(store);
    await h.cheques.receiveCheque(cheque(100n));
    mine(h, receipt([chequeCashedLog(VAULT, { totalPayout: 40n, cumulativePayout: 100n })]));

    await h.service.cashCheque(VAULT, RECIPIENT);
    await h.service.supervisor.drain();

    const stats = await h.service.cashoutStats();
    expect(stats.totalReceivedCashed).toBe(0n);
    expect(stats.todayReceivedCashed).toBe(40n);
    expect(stats.totalReceivedCashedCount).toBe(1);
    const [result] = await h.service.cashoutResults();
    expect(result?.status).toBe("success");
  });

  it("keeps the vault's uncashed count when the global count write fails", async () => {
    const store = new FailingStore((key) => key === TOTAL_RECEIVED_CASHED_COUNT_KEY);
    h = createHarness(store);
    await h.cheques.receiveCheque(cheque(100n));
    mine(h, receipt([chequeCashedLog(VAULT, { totalPayout: 40n, cumulativePayout: 100n })]));

    await h.service.cashCheque(VAULT, RECIPIENT);
    await h.service.supervisor.drain();

    expect(await h.store.get(uncashedRecordsCountKey(VAULT))).toBe("1");
    expect((await h.service.cashoutStats()).totalReceivedCashed).toBe(40n);
  });

  it("never rejects into the caller when the result write fails", async () => {
    const store = new FailingStore((key) => key.startsWith(CASHOUT_RESULT_PREFIX));
    h = createHarness(store);
    await h.cheques.receiveCheque(cheque(100n));
    mine(h, receipt([chequeCashedLog(VAULT, { totalPayout: 40n, cumulativePayout: 100n })]));

    await expect(h.service.cashCheque(VAULT, RECIPIENT)).resolves.toBe(TX_HASH);
    await h.service.supervisor.drain();

    expect(await h.service.cashoutResults()).toEqual([]);
    expect((await h.service.cashoutStats()).totalReceivedCashed).toBe(40n);
  });
});

/** In-memory store that refuses writes to selected keys. */
class FailingStore extends InMemoryRecordStore {
  constructor(private readonly refuses: (key: string) => boolean) {
    super();
  }

  override async put(key: string, value: string): Promise<void> {
    if (this.refuses(key)) {
      throw new Error(`write refused: ${key}`);
    }
    await super.put(key, value);
  }
}

// =============================================================================
// History
// =============================================================================

describe("CashoutService.cashoutResults", () => {
  it("is empty before any finalization", async () => {
    const h = createHarness();
    expect(await h.service.cashoutResults()).toEqual([]);
  });

  it("lists one result per vault and is repeatable", async () => {
    const h = createHarness();
    await h.cheques.receiveCheque(cheque(100n));
    await h.cheques.receiveCheque(cheque(200n, { vault: OTHER_VAULT }));
    h.transactions.waitForReceipt.mockResolvedValue(receipt([], "reverted"));
    h.transactions.call.mockResolvedValue(paidOutReturns(0n));

    await h.service.cashCheque(VAULT, RECIPIENT);
    await h.service.cashCheque(OTHER_VAULT, RECIPIENT);
    await h.service.supervisor.drain();

    const first = await h.service.cashoutResults();
    const second = await h.service.cashoutResults();
    expect(first.map((r) => r.vault)).toEqual([VAULT, OTHER_VAULT]);
    expect(second).toEqual(first);
  });
});

describe("CashoutService.cashoutStats", () => {
  it("reads absent counters as zero", async () => {
    const h = createHarness();
    expect(await h.service.cashoutStats()).toEqual({
      totalReceivedCashed: 0n,
      todayReceivedCashed: 0n,
      totalReceivedCashedCount: 0,
    });
    expect(dailyReceivedCashedKey(NOW)).toBe("cashout:daily-received-cashed:2026-03-14");
  });
});
