/**
 * @cashout/vault: Cheque cashout for vaults.
 *
 * Submits the latest signed cheque of a vault for settlement, reconciles
 * local bookkeeping with the ledger and records finalized outcomes.
 *
 * @packageDocumentation
 */

export type {
  SignedCheque,
  ChequeSource,
  CashoutAction,
  CashChequeResult,
  LastCashout,
  CashoutStatus,
  CashOutResult,
  CashOutResultStatus,
  CashoutStats,
  CashoutErrorCode,
  ReceiptDecodeErrorCode,
} from "./types.js";
export { CashoutError, ReceiptDecodeError } from "./types.js";

export { CashoutService } from "./cashout-service.js";
export type { CashoutServiceDeps } from "./cashout-service.js";

export { StoredChequeSource } from "./cheque-store.js";
export { TaskSupervisor } from "./supervisor.js";

export {
  parseCashChequeBeneficiaryReceipt,
  cashChequeResultEquals,
  findEventLogs,
  findSingleEvent,
} from "./receipt-parser.js";

export { VAULT_ABI, CHEQUE_CASHED_SELECTOR, CHEQUE_BOUNCED_SELECTOR } from "./vault-abi.js";

export {
  AddressSchema,
  HashSchema,
  HexSchema,
  AmountSchema,
  SignedChequeSchema,
  encodeRecord,
  decodeRecord,
} from "./codec.js";

export * from "./keys.js";
