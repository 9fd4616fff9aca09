import { ApiErrorCode, getApiErrorDefinition } from "@shared/types"
import { ApiError } from "@/api/base-client"
import { toast } from "@/components/toast"
import { logger } from "@/services/logging/FrontendLogger"

export interface NormalizedApiError {
  code: ApiErrorCode | string
  message: string
  status?: number
  details?: Record<string, unknown>
  raw: unknown
}

/**
 * Check if an error is a validation error (HTTP 400)
 */
export const isValidationError = (error: unknown): boolean => {
  const normalized = normalizeApiError(error)
  return (
    normalized.code === ApiErrorCode.INVALID_REQUEST ||
    normalized.code === ApiErrorCode.MISSING_FIELD ||
    normalized.code === ApiErrorCode.VALIDATION_FAILED ||
    normalized.status === 400
  )
}

export const normalizeApiError = (error: unknown, fallbackMessage?: string): NormalizedApiError => {
  if (error instanceof ApiError) {
    return {
      code: error.code,
      message: error.message || getApiErrorDefinition(error.code).defaultMessage,
      status: error.statusCode,
      details: error.details,
      raw: error,
    }
  }

  if (error instanceof Error) {
    return {
      code: ApiErrorCode.INTERNAL_ERROR,
      message: error.message || fallbackMessage || getApiErrorDefinition(ApiErrorCode.INTERNAL_ERROR).defaultMessage,
      raw: error,
    }
  }

  return {
    code: ApiErrorCode.INTERNAL_ERROR,
    message: fallbackMessage || getApiErrorDefinition(ApiErrorCode.INTERNAL_ERROR).defaultMessage,
    raw: error,
  }
}

/**
 * Message to show the user for a failed request. Client errors carry the
 * backend's own wording; anything else falls back to the code's user copy.
 */
export const getUserMessage = (error: unknown, fallbackMessage?: string): string => {
  const normalized = normalizeApiError(error, fallbackMessage)
  if (normalized.status !== undefined && normalized.status >= 400 && normalized.status < 500) {
    return normalized.message
  }
  return getApiErrorDefinition(normalized.code).userMessage ?? normalized.message
}

export const handleApiError = (
  error: unknown,
  options?: {
    context?: string
    silent?: boolean
    fallbackMessage?: string
    toastTitle?: string
  }
): NormalizedApiError => {
  const normalized = normalizeApiError(error, options?.fallbackMessage)
  const definition = getApiErrorDefinition(normalized.code)

  logger.error("client", "api_error", normalized.message, {
    error: error instanceof Error ? { type: error.name, message: error.message, stack: error.stack } : undefined,
    details: {
      context: options?.context,
      code: normalized.code,
      status: normalized.status,
      retryable: definition.retryable ?? false,
    },
  })

  if (!options?.silent) {
    toast.error({
      title: options?.toastTitle ?? definition.userMessage ?? normalized.message,
      description: options?.toastTitle ? normalized.message : undefined,
    })
  }

  return normalized
}
