/**
 * Gateway error taxonomy
 *
 * Every failure a request can end in is one of these classes. Each carries the
 * HTTP status and the OpenAI-style `type`/`code` pair it is reported with, so the
 * routes only ever translate, never classify.
 */

export const GATEWAY_CONSTANTS = {
  // HTTP Status Codes
  HTTP_BAD_REQUEST: 400,
  HTTP_CLIENT_CLOSED_REQUEST: 499,
  HTTP_INTERNAL_ERROR: 500,
  HTTP_BAD_GATEWAY: 502,
  HTTP_SERVICE_UNAVAILABLE: 503,
  HTTP_GATEWAY_TIMEOUT: 504,

  // Seconds suggested to clients that timed out in the queue
  QUEUE_TIMEOUT_RETRY_AFTER: 5,

  // Error Codes
  ERROR_CODES: {
    INVALID_REQUEST: 'invalid_request',
    QUEUE_TIMEOUT: 'queue_timeout',
    BACKEND_TIMEOUT: 'backend_timeout',
    BACKEND_UNAVAILABLE: 'backend_unavailable',
    BACKEND_ERROR: 'backend_error',
    CLIENT_CANCELLED: 'client_cancelled',
    INTERNAL_INVARIANT: 'internal_invariant',
    INTERNAL_ERROR: 'internal_error',
  },

  // Error Types
  ERROR_TYPES: {
    INVALID_REQUEST: 'invalid_request_error',
    TIMEOUT_ERROR: 'timeout_error',
    BACKEND_ERROR: 'backend_error',
    CLIENT_CLOSED: 'client_closed_request',
    INTERNAL_ERROR: 'internal_error',
  },
} as const

export type GatewayErrorCode =
  (typeof GATEWAY_CONSTANTS.ERROR_CODES)[keyof typeof GATEWAY_CONSTANTS.ERROR_CODES]
export type GatewayErrorType =
  (typeof GATEWAY_CONSTANTS.ERROR_TYPES)[keyof typeof GATEWAY_CONSTANTS.ERROR_TYPES]

/**
 * Where a request was when its deadline or disconnect hit
 */
export type RequestPhase = 'queued' | 'calling'

interface GatewayErrorOptions {
  status: number
  type: GatewayErrorType
  code: GatewayErrorCode
  cause?: unknown
}

export class GatewayError extends Error {
  readonly status: number
  readonly type: GatewayErrorType
  readonly code: GatewayErrorCode

  constructor(message: string, options: GatewayErrorOptions) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause })
    this.name = 'GatewayError'
    this.status = options.status
    this.type = options.type
    this.code = options.code
  }

  /**
   * Extra fields merged into the `error` object of the response body
   */
  details(): Record<string, unknown> {
    return {}
  }
}

/**
 * Malformed inbound payload, rejected before it is queued
 */
export class ValidationError extends GatewayError {
  constructor(message: string, readonly issues: string[] = []) {
    super(message, {
      status: GATEWAY_CONSTANTS.HTTP_BAD_REQUEST,
      type: GATEWAY_CONSTANTS.ERROR_TYPES.INVALID_REQUEST,
      code: GATEWAY_CONSTANTS.ERROR_CODES.INVALID_REQUEST,
    })
    this.name = 'ValidationError'
  }

  override details(): Record<string, unknown> {
    return this.issues.length > 0 ? { issues: this.issues } : {}
  }
}

/**
 * The deadline passed before a slot was granted (capacity exhaustion)
 */
export class QueueTimeoutError extends GatewayError {
  constructor(readonly waitedMs: number) {
    super(`Request timed out after waiting ${waitedMs}ms in the queue for a backend slot`, {
      status: GATEWAY_CONSTANTS.HTTP_SERVICE_UNAVAILABLE,
      type: GATEWAY_CONSTANTS.ERROR_TYPES.TIMEOUT_ERROR,
      code: GATEWAY_CONSTANTS.ERROR_CODES.QUEUE_TIMEOUT,
    })
    this.name = 'QueueTimeoutError'
  }
}

/**
 * The deadline passed while the backend was working on the request (backend hang)
 */
export class BackendTimeoutError extends GatewayError {
  constructor(readonly timeoutMs: number) {
    super(`Backend did not finish within the remaining ${timeoutMs}ms of the request budget`, {
      status: GATEWAY_CONSTANTS.HTTP_GATEWAY_TIMEOUT,
      type: GATEWAY_CONSTANTS.ERROR_TYPES.TIMEOUT_ERROR,
      code: GATEWAY_CONSTANTS.ERROR_CODES.BACKEND_TIMEOUT,
    })
    this.name = 'BackendTimeoutError'
  }
}

/**
 * Connection refused, reset, or the stream broke off
 */
export class BackendUnavailableError extends GatewayError {
  constructor(message: string, cause?: unknown) {
    super(message, {
      status: GATEWAY_CONSTANTS.HTTP_BAD_GATEWAY,
      type: GATEWAY_CONSTANTS.ERROR_TYPES.BACKEND_ERROR,
      code: GATEWAY_CONSTANTS.ERROR_CODES.BACKEND_UNAVAILABLE,
      cause,
    })
    this.name = 'BackendUnavailableError'
  }
}

/**
 * The backend answered with a non-2xx status. Its status and body are kept for the caller.
 */
export class BackendError extends GatewayError {
  constructor(readonly backendStatus: number, readonly backendBody: unknown) {
    super(`Backend responded with status ${backendStatus}`, {
      // Only error statuses can be forwarded as-is
      status: backendStatus >= 400 && backendStatus <= 599 ? backendStatus : GATEWAY_CONSTANTS.HTTP_BAD_GATEWAY,
      type: GATEWAY_CONSTANTS.ERROR_TYPES.BACKEND_ERROR,
      code: GATEWAY_CONSTANTS.ERROR_CODES.BACKEND_ERROR,
    })
    this.name = 'BackendError'
  }

  override details(): Record<string, unknown> {
    return { backend_status: this.backendStatus, backend_response: this.backendBody }
  }
}

export class CancelledByClientError extends GatewayError {
  constructor(readonly phase: RequestPhase) {
    super(`Client disconnected while the request was ${phase}`, {
      status: GATEWAY_CONSTANTS.HTTP_CLIENT_CLOSED_REQUEST,
      type: GATEWAY_CONSTANTS.ERROR_TYPES.CLIENT_CLOSED,
      code: GATEWAY_CONSTANTS.ERROR_CODES.CLIENT_CANCELLED,
    })
    this.name = 'CancelledByClientError'
  }
}

/**
 * Internal-consistency failure in the gate or queue (negative count, duplicate grant).
 * Never caught and absorbed; it is reported as a 500.
 */
export class InvariantViolationError extends GatewayError {
  constructor(message: string) {
    super(message, {
      status: GATEWAY_CONSTANTS.HTTP_INTERNAL_ERROR,
      type: GATEWAY_CONSTANTS.ERROR_TYPES.INTERNAL_ERROR,
      code: GATEWAY_CONSTANTS.ERROR_CODES.INTERNAL_INVARIANT,
    })
    this.name = 'InvariantViolationError'
  }
}

/**
 * Anything that is not already part of the taxonomy is reported as a 500
 */
export function toGatewayError(error: unknown): GatewayError {
  if (error instanceof GatewayError) {
    return error
  }
  return new GatewayError(error instanceof Error ? error.message : String(error), {
    status: GATEWAY_CONSTANTS.HTTP_INTERNAL_ERROR,
    type: GATEWAY_CONSTANTS.ERROR_TYPES.INTERNAL_ERROR,
    code: GATEWAY_CONSTANTS.ERROR_CODES.INTERNAL_ERROR,
    cause: error,
  })
}
