/**
 * Helper functions for turning gateway errors into HTTP responses
 */

import { GATEWAY_CONSTANTS, GatewayError } from '../services/errors.js'

export const GATEWAY_ERROR_HEADER = 'X-Gateway-Error'

/**
 * Body shared by JSON error responses and in-stream SSE error events
 */
export function createErrorBody(
  message: string,
  type: string,
  code: string,
  extra: Record<string, unknown> = {}
): { error: Record<string, unknown> } {
  return {
    error: {
      message,
      type,
      code,
      ...extra,
    },
  }
}

/**
 * Create a standardized error response
 */
export function createErrorResponse(
  message: string,
  type: string,
  code: string,
  status: number,
  extra: Record<string, unknown> = {}
): Response {
  return new Response(JSON.stringify(createErrorBody(message, type, code, extra)), {
    status,
    headers: {
      'Content-Type': 'application/json',
      [GATEWAY_ERROR_HEADER]: code,
    },
  })
}

export function toErrorResponse(error: GatewayError): Response {
  const response = createErrorResponse(error.message, error.type, error.code, error.status, error.details())
  if (error.code === GATEWAY_CONSTANTS.ERROR_CODES.QUEUE_TIMEOUT) {
    response.headers.set('Retry-After', String(GATEWAY_CONSTANTS.QUEUE_TIMEOUT_RETRY_AFTER))
  }
  return response
}

/**
 * Final SSE event sent when a stream fails after its headers went out
 */
export function formatSseError(error: GatewayError): string {
  const body = createErrorBody(error.message, error.type, error.code, error.details())
  return `data: ${JSON.stringify(body)}\n\n`
}
