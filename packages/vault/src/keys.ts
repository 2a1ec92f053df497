/**
 * Record store key layout.
 *
 * Vault addresses are lower-cased so checksummed and plain spellings of the
 * same address share a key.
 */

import type { Address } from "viem";

export const CASHOUT_ACTION_PREFIX = "cashout:action:";
export const CASHOUT_RESULT_PREFIX = "cashout:result:";
export const TOTAL_RECEIVED_CASHED_KEY = "cashout:total-received-cashed";
export const DAILY_RECEIVED_CASHED_PREFIX = "cashout:daily-received-cashed:";
export const TOTAL_RECEIVED_CASHED_COUNT_KEY = "cashout:total-received-cashed-count";
export const UNCASHED_RECORDS_COUNT_PREFIX = "cashout:uncashed-records-count:";
export const LAST_RECEIVED_CHEQUE_PREFIX = "cheque:last-received:";

function vaultPart(vault: Address): string {
  return vault.toLowerCase();
}

export function cashoutActionKey(vault: Address): string {
  return CASHOUT_ACTION_PREFIX + vaultPart(vault);
}

export function cashoutResultKey(vault: Address): string {
  return CASHOUT_RESULT_PREFIX + vaultPart(vault);
}

/**
 * Bucket key for the UTC calendar day containing `at`.
 */
export function dailyReceivedCashedKey(at: Date): string {
  return DAILY_RECEIVED_CASHED_PREFIX + at.toISOString().slice(0, 10);
}

export function uncashedRecordsCountKey(vault: Address): string {
  return UNCASHED_RECORDS_COUNT_PREFIX + vaultPart(vault);
}

export function lastReceivedChequeKey(vault: Address): string {
  return LAST_RECEIVED_CHEQUE_PREFIX + vaultPart(vault);
}
