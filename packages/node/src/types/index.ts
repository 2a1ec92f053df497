/**
 * Type barrel: re-exports all public types from @cashout/node.
 */

// DTOs
export {
  VaultParamSchema,
  CashoutRequestSchema,
  toCashoutStatusDto,
  toCashOutResultDto,
  toCashoutStatsDto,
} from "./dto.js";
export type {
  CashoutRequestDto,
  SignedChequeDto,
  CashChequeResultDto,
  CashoutStatusDto,
  CashOutResultDto,
  CashoutStatsDto,
} from "./dto.js";

// Error
export { createErrorEnvelope } from "./error.js";
export type { ApiErrorCode, ErrorDetail, ErrorEnvelope } from "./error.js";

// App env
export type { AppEnv } from "./api-contract.js";
