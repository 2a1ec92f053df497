/**
 * ChequeSource backed by the record store.
 *
 * Holds the latest received cheque per vault and counts how many cheques
 * arrived since the vault was last cashed. Signatures are verified by the
 * caller before `receiveCheque`.
 */

import { isAddressEqual, type Address } from "viem";
import type { RecordStore } from "@cashout/state-store";
import {
  CountSchema,
  SignedChequeSchema,
  decodeRecord,
  encodeRecord,
} from "./codec.js";
import { lastReceivedChequeKey, uncashedRecordsCountKey } from "./keys.js";
import { CashoutError } from "./types.js";
import type { ChequeSource, SignedCheque } from "./types.js";

export class StoredChequeSource implements ChequeSource {
  constructor(private readonly store: RecordStore) {}

  async latestCheque(vault: Address): Promise<SignedCheque | undefined> {
    const raw = await this.store.get(lastReceivedChequeKey(vault));
    if (raw === undefined) {
      return undefined;
    }
    return decodeRecord(SignedChequeSchema, raw);
  }

  /**
   * Record a verified cheque as the latest for its vault.
   *
   * @throws CashoutError CHEQUE_BENEFICIARY_MISMATCH if the vault's previous
   *   cheque named a different beneficiary
   * @throws CashoutError CHEQUE_NOT_INCREASING if the cumulative payout
   *   is below the previous cheque's
   */
  async receiveCheque(cheque: SignedCheque): Promise<void> {
    const previous = await this.latestCheque(cheque.vault);

    if (previous !== undefined) {
      if (!isAddressEqual(previous.beneficiary, cheque.beneficiary)) {
        throw new CashoutError(
          "CHEQUE_BENEFICIARY_MISMATCH",
          `cheque beneficiary ${cheque.beneficiary} does not match ${previous.beneficiary}`,
          cheque.vault,
        );
      }
      if (cheque.cumulativePayout < previous.cumulativePayout) {
        throw new CashoutError(
          "CHEQUE_NOT_INCREASING",
          `cumulative payout ${cheque.cumulativePayout} is below the previous ${previous.cumulativePayout}`,
          cheque.vault,
        );
      }
    }

    await this.store.put(lastReceivedChequeKey(cheque.vault), encodeRecord(cheque));

    const countKey = uncashedRecordsCountKey(cheque.vault);
    const raw = await this.store.get(countKey);
    const count = raw === undefined ? 0 : decodeRecord(CountSchema, raw);
    await this.store.put(countKey, encodeRecord(count + 1));
  }

  /**
   * Cheques received for `vault` that no finalized cashout has counted yet.
   */
  async uncashedRecordsCount(vault: Address): Promise<number> {
    const raw = await this.store.get(uncashedRecordsCountKey(vault));
    return raw === undefined ? 0 : decodeRecord(CountSchema, raw);
  }
}
