/**
 * Error envelope types for API responses.
 *
 * All error responses follow the shape:
 * { error: { code: string, message: string, details?: Record<string, unknown> } }
 */

// =============================================================================
// Error Codes
// =============================================================================

/**
 * API error codes that do not come from a domain error.
 */
export type ApiErrorCode = "VALIDATION_ERROR" | "INTERNAL_ERROR";

// =============================================================================
// Error Response
// =============================================================================

export interface ErrorDetail {
  readonly code: ApiErrorCode | string;
  readonly message: string;
  readonly details?: Record<string, unknown>;
}

export interface ErrorEnvelope {
  readonly error: ErrorDetail;
}

// =============================================================================
// Factory
// =============================================================================

export function createErrorEnvelope(
  code: ApiErrorCode | string,
  message: string,
  details?: Record<string, unknown>,
): ErrorEnvelope {
  const error: ErrorDetail = { code, message };
  if (details !== undefined) {
    return { error: { ...error, details } };
  }
  return { error };
}
