import { type ErrorCode, isAppError } from "@featurekit/errors"
import type { StatusCode } from "../http/status-codes"

export type ErrorMapping = {
  status: StatusCode

  /** Client-facing message; must not leak internals. */
  message?: string

  /** Include the error's `context` as `details`. */
  exposeContext?: boolean
}

export type FallbackMapping = {
  code: ErrorCode
  status: StatusCode
  message: string
}

export interface ErrorMappingsConfig {
  /**
   * Keyed by error code. Unmapped app errors keep their code and take the
   * fallback status and message.
   */
  mappings: Partial<Record<ErrorCode, ErrorMapping>>
  fallback?: FallbackMapping
}

export type ErrorResponseBody = {
  status: StatusCode
  code: ErrorCode
  message: string
  requestId: string
  details?: Record<string, unknown>
}

export type ErrorResponse = { error: ErrorResponseBody }

export type ErrorFormatter = (error: unknown, requestId: string) => ErrorResponse

const DEFAULT_FALLBACK: FallbackMapping = {
  code: "internal_error",
  status: 500,
  message: "An unexpected error occurred",
}

export function createErrorFormatter(config: ErrorMappingsConfig): ErrorFormatter {
  const fallback = config.fallback ?? DEFAULT_FALLBACK

  return (error, requestId) => {
    if (!isAppError(error)) {
      return {
        error: {
          status: fallback.status,
          code: fallback.code,
          message: fallback.message,
          requestId,
        },
      }
    }

    const mapping = config.mappings[error.code]

    if (!mapping) {
      return {
        error: {
          status: fallback.status,
          code: error.code,
          message: fallback.message,
          requestId,
        },
      }
    }

    return {
      error: {
        status: mapping.status,
        code: error.code,
        message: mapping.message ?? error.message,
        requestId,
        ...(mapping.exposeContext && { details: { ...error.context } }),
      },
    }
  }
}

