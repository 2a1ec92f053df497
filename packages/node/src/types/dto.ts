/**
 * Request/response DTOs.
 *
 * Request bodies and path parameters are validated with Zod. Responses
 * carry amounts as decimal strings since JSON has no bigint.
 */

import { z } from "zod";
import { AddressSchema } from "@cashout/vault";
import type {
  CashChequeResult,
  CashOutResult,
  CashoutStats,
  CashoutStatus,
  SignedCheque,
} from "@cashout/vault";

// =============================================================================
// Requests
// =============================================================================

export const VaultParamSchema = AddressSchema;

export const CashoutRequestSchema = z.object({
  recipient: AddressSchema,
});

export type CashoutRequestDto = z.infer<typeof CashoutRequestSchema>;

// =============================================================================
// Responses
// =============================================================================

export interface SignedChequeDto {
  readonly vault: string;
  readonly beneficiary: string;
  readonly cumulativePayout: string;
  readonly signature: string;
}

export interface CashChequeResultDto {
  readonly beneficiary: string;
  readonly recipient: string;
  readonly caller: string;
  readonly totalPayout: string;
  readonly cumulativePayout: string;
  readonly callerPayout: string;
  readonly bounced: boolean;
}

export interface CashoutStatusDto {
  readonly last: {
    readonly txHash: string;
    readonly cheque: SignedChequeDto;
    readonly result: CashChequeResultDto | null;
    readonly reverted: boolean;
  } | null;
  readonly uncashedAmount: string;
}

export interface CashOutResultDto {
  readonly txHash: string;
  readonly vault: string;
  readonly amount: string;
  readonly cashTime: number;
  readonly status: CashOutResult["status"];
}

export interface CashoutStatsDto {
  readonly totalReceivedCashed: string;
  readonly todayReceivedCashed: string;
  readonly totalReceivedCashedCount: number;
}

// =============================================================================
// Mappers
// =============================================================================

function toSignedChequeDto(cheque: SignedCheque): SignedChequeDto {
  return {
    vault: cheque.vault,
    beneficiary: cheque.beneficiary,
    cumulativePayout: cheque.cumulativePayout.toString(),
    signature: cheque.signature,
  };
}

function toCashChequeResultDto(result: CashChequeResult): CashChequeResultDto {
  return {
    beneficiary: result.beneficiary,
    recipient: result.recipient,
    caller: result.caller,
    totalPayout: result.totalPayout.toString(),
    cumulativePayout: result.cumulativePayout.toString(),
    callerPayout: result.callerPayout.toString(),
    bounced: result.bounced,
  };
}

export function toCashoutStatusDto(status: CashoutStatus): CashoutStatusDto {
  const { last } = status;
  return {
    last:
      last === undefined
        ? null
        : {
            txHash: last.txHash,
            cheque: toSignedChequeDto(last.cheque),
            result: last.result === undefined ? null : toCashChequeResultDto(last.result),
            reverted: last.reverted,
          },
    uncashedAmount: status.uncashedAmount.toString(),
  };
}

export function toCashOutResultDto(result: CashOutResult): CashOutResultDto {
  return {
    txHash: result.txHash,
    vault: result.vault,
    amount: result.amount.toString(),
    cashTime: result.cashTime,
    status: result.status,
  };
}

export function toCashoutStatsDto(stats: CashoutStats): CashoutStatsDto {
  return {
    totalReceivedCashed: stats.totalReceivedCashed.toString(),
    todayReceivedCashed: stats.todayReceivedCashed.toString(),
    totalReceivedCashedCount: stats.totalReceivedCashedCount,
  };
}
