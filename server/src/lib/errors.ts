export type ErrorCode =
  | "AUTH_MISSING"
  | "AUTH_INVALID"
  | "PROVIDER_UNAVAILABLE"
  | "PAYLOAD_INVALID"
  | "INCOMPLETE_GENERATION"
  | "UPSTREAM_PROVIDER_ERROR"
  | "PERSISTENCE_FAILURE"
  | "NOT_FOUND"

const STATUS_BY_CODE: Record<ErrorCode, number> = {
  AUTH_MISSING: 401,
  AUTH_INVALID: 401,
  PROVIDER_UNAVAILABLE: 503,
  PAYLOAD_INVALID: 422,
  INCOMPLETE_GENERATION: 422,
  UPSTREAM_PROVIDER_ERROR: 500,
  PERSISTENCE_FAILURE: 500,
  NOT_FOUND: 404,
}

export type ErrorDetails = Record<string, string | number | boolean | null>

export interface ErrorBody {
  error: {
    code: ErrorCode
    message: string
    timestamp: string
    details?: ErrorDetails
  }
}

export class ServiceError extends Error {
  readonly code: ErrorCode
  readonly status: number
  readonly details?: ErrorDetails

  constructor(code: ErrorCode, message: string, details?: ErrorDetails) {
    super(message)
    this.name = "ServiceError"
    this.code = code
    this.status = STATUS_BY_CODE[code]
    this.details = details
  }
}

export function statusForCode(code: ErrorCode) {
  return STATUS_BY_CODE[code]
}

/**
 * Boundary translator: anything that is not already a ServiceError becomes a
 * generic upstream failure. The original message is not carried over.
 */
export function toServiceError(error: unknown, fallbackMessage = "Upstream provider request failed"): ServiceError {
  if (error instanceof ServiceError) return error
  return new ServiceError("UPSTREAM_PROVIDER_ERROR", fallbackMessage)
}

export function errorBody(error: ServiceError, now: Date = new Date()): ErrorBody {
  return {
    error: {
      code: error.code,
      message: error.message,
      timestamp: now.toISOString(),
      ...(error.details ? { details: error.details } : {}),
    },
  }
}
