/**
 * Error codes for the EVM adapters.
 */
export type ChainErrorCode =
  | "NOT_CONNECTED"
  | "UNSUPPORTED_CHAIN"
  | "EMPTY_CALL_RESULT";

/**
 * Error thrown by the EVM adapters.
 *
 * Transport errors raised by viem are not wrapped; they propagate as-is.
 */
export class ChainError extends Error {
  constructor(
    public readonly code: ChainErrorCode,
    message: string,
  ) {
    super(message);
    this.name = "ChainError";
  }
}
