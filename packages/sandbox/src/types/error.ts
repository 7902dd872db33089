/**
 * Error envelope for API responses.
 *
 * All error responses follow the shape:
 * { error: { code: string, message: string, details?: Record<string, unknown> } }
 */

// =============================================================================
// Error Codes
// =============================================================================

export type ApiErrorCode =
  | "VALIDATION_ERROR"
  | "UNAUTHORIZED"
  | "FORBIDDEN"
  | "NOT_FOUND"
  | "LISTING_NOT_FOUND"
  | "LISTING_UNAVAILABLE"
  | "RESERVATION_NOT_FOUND"
  | "RESERVATION_EXPIRED"
  | "RESERVATION_CANCELLED"
  | "RESERVATION_CONFIRMED"
  | "DEPOSIT_NOT_FOUND"
  | "IDEMPOTENCY_KEY_REUSED"
  | "INTERNAL_ERROR";

/** Status codes the sandbox answers errors with. */
export type ErrorStatus = 400 | 401 | 403 | 404 | 409 | 410 | 422 | 500;

// =============================================================================
// Error Response
// =============================================================================

export interface ErrorDetail {
  readonly code: ApiErrorCode;
  readonly message: string;
  readonly details?: Record<string, unknown>;
}

export interface ErrorEnvelope {
  readonly error: ErrorDetail;
}

/**
 * A refusal raised by the market; the error handler renders it with
 * its own status.
 */
export class MarketError extends Error {
  constructor(
    public readonly code: ApiErrorCode,
    message: string,
    public readonly status: ErrorStatus,
  ) {
    super(message);
    this.name = "MarketError";
  }
}

// =============================================================================
// Factory
// =============================================================================

export function createErrorEnvelope(
  code: ApiErrorCode,
  message: string,
  details?: Record<string, unknown>,
): ErrorEnvelope {
  const error: ErrorDetail = { code, message };
  if (details !== undefined) {
    return { error: { ...error, details } };
  }
  return { error };
}
