/**
 * @cashout/vault domain types.
 *
 * Rules:
 * - All amounts are bigint (cumulative payouts outgrow 64-bit integers)
 * - All types are readonly
 * - "Not found" is undefined; faults are coded Error subclasses
 */

import type { Address, Hash, Hex } from "viem";

// =============================================================================
// Cheques
// =============================================================================

/**
 * An off-chain signed promise of the cumulative amount a beneficiary may
 * redeem from a vault.
 *
 * For a fixed (vault, beneficiary) the cumulative payout never decreases.
 */
export interface SignedCheque {
  readonly vault: Address;
  readonly beneficiary: Address;
  readonly cumulativePayout: bigint;
  readonly signature: Hex;
}

/**
 * Supplies the most recent cheque received for a vault.
 */
export interface ChequeSource {
  /**
   * @returns undefined when no cheque was ever received for `vault`
   */
  latestCheque(vault: Address): Promise<SignedCheque | undefined>;
}

// =============================================================================
// Cashout records
// =============================================================================

/**
 * The last settlement transaction submitted for a vault.
 *
 * At most one per vault; each submission overwrites the previous one.
 */
export interface CashoutAction {
  readonly txHash: Hash;

  /** Cheque used at submission time; may be older than the latest cheque */
  readonly cheque: SignedCheque;
}

/**
 * Decoded outcome of a `cashChequeBeneficiary` transaction.
 */
export interface CashChequeResult {
  /** Beneficiary of the cheque */
  readonly beneficiary: Address;

  /** Address that received the funds */
  readonly recipient: Address;

  /** Sender of the cashing transaction */
  readonly caller: Address;

  /** Amount paid out by this transaction */
  readonly totalPayout: bigint;

  /** Cumulative payout of the cashed cheque */
  readonly cumulativePayout: bigint;

  /** Amount paid to the caller */
  readonly callerPayout: bigint;

  /** Whether part of the cheque bounced (vault could not pay in full) */
  readonly bounced: boolean;
}

export interface LastCashout {
  readonly txHash: Hash;
  readonly cheque: SignedCheque;

  /** Present only once the transaction is confirmed */
  readonly result: CashChequeResult | undefined;
  readonly reverted: boolean;
}

/**
 * Point-in-time view of a vault's settlement. Derived, never persisted.
 */
export interface CashoutStatus {
  /** undefined when nothing was ever submitted for the vault */
  readonly last: LastCashout | undefined;

  /** Amount promised by the latest cheque that has not settled */
  readonly uncashedAmount: bigint;
}

export type CashOutResultStatus = "fail" | "success";

/**
 * Persisted outcome of the most recent finalized cashout for a vault.
 */
export interface CashOutResult {
  readonly txHash: Hash;
  readonly vault: Address;
  readonly amount: bigint;

  /** Unix time (seconds) at which finalization started */
  readonly cashTime: number;
  readonly status: CashOutResultStatus;
}

/**
 * Aggregate received-cashed statistics.
 */
export interface CashoutStats {
  readonly totalReceivedCashed: bigint;
  readonly todayReceivedCashed: bigint;
  readonly totalReceivedCashedCount: number;
}

// =============================================================================
// Errors
// =============================================================================

export type CashoutErrorCode =
  | "NO_PRIOR_CHEQUE"
  | "CHEQUE_NOT_INCREASING"
  | "CHEQUE_BENEFICIARY_MISMATCH";

/**
 * Error thrown by cashout and cheque-source operations.
 */
export class CashoutError extends Error {
  constructor(
    public readonly code: CashoutErrorCode,
    message: string,
    public readonly vault?: Address,
  ) {
    super(message);
    this.name = "CashoutError";
  }
}

export type ReceiptDecodeErrorCode =
  | "EVENT_NOT_FOUND"
  | "EVENT_AMBIGUOUS"
  | "TRANSACTION_REVERTED";

/**
 * Error thrown when a receipt does not carry exactly the expected events.
 */
export class ReceiptDecodeError extends Error {
  constructor(
    public readonly code: ReceiptDecodeErrorCode,
    message: string,
    public readonly txHash?: Hash,
  ) {
    super(message);
    this.name = "ReceiptDecodeError";
  }
}
