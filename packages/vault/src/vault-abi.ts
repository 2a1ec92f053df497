/**
 * Vault contract ABI fragments used for cashing cheques.
 */

import { parseAbi, toEventSelector } from "viem";

export const VAULT_ABI = parseAbi([
  "function paidOut(address beneficiary) view returns (uint256)",
  "function cashChequeBeneficiary(address recipient, uint256 cumulativePayout, bytes beneficiarySig)",
  "event ChequeCashed(address indexed beneficiary, address indexed recipient, address indexed caller, uint256 totalPayout, uint256 cumulativePayout, uint256 callerPayout)",
  "event ChequeBounced()",
]);

// keccak256 of the canonical event signatures
export const CHEQUE_CASHED_SELECTOR = toEventSelector(
  "ChequeCashed(address,address,address,uint256,uint256,uint256)",
);
export const CHEQUE_BOUNCED_SELECTOR = toEventSelector("ChequeBounced()");
