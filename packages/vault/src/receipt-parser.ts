/**
 * Receipt decoding for `cashChequeBeneficiary` transactions.
 *
 * Strict: the settlement event must appear exactly once for the vault,
 * the bounce event at most once. Anything else throws; a partially
 * filled result is never returned.
 */

import {
  decodeEventLog,
  isAddressEqual,
  type Address,
  type Hash,
  type Hex,
} from "viem";
import type { ReceiptLog, TransactionReceipt } from "@cashout/chain";
import {
  VAULT_ABI,
  CHEQUE_BOUNCED_SELECTOR,
  CHEQUE_CASHED_SELECTOR,
} from "./vault-abi.js";
import { ReceiptDecodeError } from "./types.js";
import type { CashChequeResult } from "./types.js";

/**
 * Logs emitted by `emitter` whose first topic is `selector`.
 */
export function findEventLogs(
  receipt: TransactionReceipt,
  emitter: Address,
  selector: Hex,
): readonly ReceiptLog[] {
  return receipt.logs.filter(
    (log) => log.topics[0] === selector && isAddressEqual(log.address, emitter),
  );
}

/**
 * Exactly one matching log, or a ReceiptDecodeError.
 */
export function findSingleEvent(
  receipt: TransactionReceipt,
  emitter: Address,
  selector: Hex,
  eventName: string,
): ReceiptLog {
  const logs = findEventLogs(receipt, emitter, selector);
  const [log] = logs;

  if (log === undefined) {
    throw new ReceiptDecodeError(
      "EVENT_NOT_FOUND",
      `${eventName} event not found in receipt`,
      receipt.transactionHash,
    );
  }
  if (logs.length > 1) {
    throw new ReceiptDecodeError(
      "EVENT_AMBIGUOUS",
      `expected one ${eventName} event, found ${logs.length}`,
      receipt.transactionHash,
    );
  }
  return log;
}

/**
 * Decode the outcome of a `cashChequeBeneficiary` transaction sent to
 * `vault`.
 *
 * @throws ReceiptDecodeError TRANSACTION_REVERTED, EVENT_NOT_FOUND or EVENT_AMBIGUOUS
 */
export function parseCashChequeBeneficiaryReceipt(
  vault: Address,
  receipt: TransactionReceipt,
): CashChequeResult {
  if (receipt.status !== "success") {
    throw new ReceiptDecodeError(
      "TRANSACTION_REVERTED",
      "cannot decode a reverted transaction",
      receipt.transactionHash,
    );
  }

  const cashedLog = findSingleEvent(
    receipt,
    vault,
    CHEQUE_CASHED_SELECTOR,
    "ChequeCashed",
  );
  const cashed = decodeCashedLog(cashedLog, receipt.transactionHash);

  const bouncedLogs = findEventLogs(receipt, vault, CHEQUE_BOUNCED_SELECTOR);
  if (bouncedLogs.length > 1) {
    throw new ReceiptDecodeError(
      "EVENT_AMBIGUOUS",
      `expected at most one ChequeBounced event, found ${bouncedLogs.length}`,
      receipt.transactionHash,
    );
  }

  return {
    beneficiary: cashed.args.beneficiary,
    recipient: cashed.args.recipient,
    caller: cashed.args.caller,
    totalPayout: cashed.args.totalPayout,
    cumulativePayout: cashed.args.cumulativePayout,
    callerPayout: cashed.args.callerPayout,
    bounced: bouncedLogs.length === 1,
  };
}

/**
 * A log carrying the ChequeCashed selector whose topics or data do not fit
 * the event is reported like any other unusable receipt.
 */
function decodeCashedLog(log: ReceiptLog, txHash: Hash) {
  try {
    return decodeEventLog({
      abi: VAULT_ABI,
      eventName: "ChequeCashed",
      topics: [CHEQUE_CASHED_SELECTOR, ...log.topics.slice(1)],
      data: log.data,
    });
  } catch (err: unknown) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ReceiptDecodeError(
      "EVENT_AMBIGUOUS",
      `ChequeCashed event could not be decoded: ${reason}`,
      txHash,
    );
  }
}

/**
 * Value equality for settlement results: addresses compare
 * case-insensitively, amounts numerically.
 */
export function cashChequeResultEquals(
  a: CashChequeResult,
  b: CashChequeResult,
): boolean {
  return (
    isAddressEqual(a.beneficiary, b.beneficiary) &&
    isAddressEqual(a.recipient, b.recipient) &&
    isAddressEqual(a.caller, b.caller) &&
    a.totalPayout === b.totalPayout &&
    a.cumulativePayout === b.cumulativePayout &&
    a.callerPayout === b.callerPayout &&
    a.bounced === b.bounced
  );
}
