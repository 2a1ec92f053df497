/**
 * Shared fixtures: addresses, cheques and receipt builders.
 */

import {
  encodeAbiParameters,
  pad,
  parseAbiParameters,
  type Address,
  type Hash,
} from "viem";
import type { ReceiptLog, TransactionReceipt } from "@cashout/chain";
import { CHEQUE_BOUNCED_SELECTOR, CHEQUE_CASHED_SELECTOR } from "../src/vault-abi.js";
import type { SignedCheque } from "../src/types.js";

// Digit-only addresses are their own checksummed form.
export const VAULT = "0x1000000000000000000000000000000000000001" as const;
export const OTHER_VAULT = "0x1000000000000000000000000000000000000002" as const;
export const BENEFICIARY = "0x2000000000000000000000000000000000000002" as const;
export const RECIPIENT = "0x3000000000000000000000000000000000000003" as const;
export const CALLER = "0x4000000000000000000000000000000000000004" as const;
export const STRANGER = "0x5000000000000000000000000000000000000005" as const;

export const TX_HASH = `0x${"cd".repeat(32)}` as const;
export const SIGNATURE = `0x${"ab".repeat(65)}` as const;

export function cheque(
  cumulativePayout: bigint,
  overrides: Partial<SignedCheque> = {},
): SignedCheque {
  return {
    vault: VAULT,
    beneficiary: BENEFICIARY,
    cumulativePayout,
    signature: SIGNATURE,
    ...overrides,
  };
}

export interface CashedEventFields {
  readonly totalPayout: bigint;
  readonly cumulativePayout: bigint;
  readonly callerPayout?: bigint;
  readonly beneficiary?: Address;
  readonly recipient?: Address;
  readonly caller?: Address;
}

export function chequeCashedLog(
  emitter: Address,
  fields: CashedEventFields,
): ReceiptLog {
  return {
    address: emitter,
    topics: [
      CHEQUE_CASHED_SELECTOR,
      pad(fields.beneficiary ?? BENEFICIARY),
      pad(fields.recipient ?? RECIPIENT),
      pad(fields.caller ?? CALLER),
    ],
    data: encodeAbiParameters(parseAbiParameters("uint256, uint256, uint256"), [
      fields.totalPayout,
      fields.cumulativePayout,
      fields.callerPayout ?? 0n,
    ]),
  };
}

export function chequeBouncedLog(emitter: Address): ReceiptLog {
  return { address: emitter, topics: [CHEQUE_BOUNCED_SELECTOR], data: "0x" };
}

export function receipt(
  logs: readonly ReceiptLog[],
  status: TransactionReceipt["status"] = "success",
  transactionHash: Hash = TX_HASH,
): TransactionReceipt {
  return { transactionHash, status, blockNumber: 100n, logs };
}
