import type { Request, Response, NextFunction } from 'express'
import { ApiErrorCode, getApiErrorDefinition } from '@shared/types'
import { logger } from '../logger'
import { failure } from '../utils/api-response'
import { AuthError, DuplicateUserError, ValidationError } from '../modules/errors'

export class ApiHttpError extends Error {
  code: ApiErrorCode | string
  status: number
  details?: Record<string, unknown>

  constructor(
    code: ApiErrorCode | string,
    message?: string,
    options?: {
      status?: number
      details?: Record<string, unknown>
      cause?: unknown
    }
  ) {
    const definition = getApiErrorDefinition(code)
    super(message ?? definition.defaultMessage, options?.cause ? { cause: options.cause } : undefined)
    this.name = 'ApiHttpError'
    this.code = code
    this.status = options?.status ?? definition.httpStatus
    this.details = options?.details
  }
}

/**
 * Translate a domain error into its HTTP form. Anything unrecognised is
 * returned untouched for the error handler to normalise.
 */
export function toApiHttpError(err: unknown): unknown {
  if (err instanceof ValidationError) {
    return new ApiHttpError(ApiErrorCode.VALIDATION_FAILED, err.message, {
      details: err.fields.length ? { fields: err.fields } : undefined,
      cause: err
    })
  }
  if (err instanceof DuplicateUserError) {
    return new ApiHttpError(ApiErrorCode.ALREADY_EXISTS, err.message, { cause: err })
  }
  if (err instanceof AuthError) {
    return new ApiHttpError(ApiErrorCode.UNAUTHORIZED, err.message, { cause: err })
  }
  return err
}

interface NormalizedError {
  code: ApiErrorCode | string
  message: string
  status: number
  details?: Record<string, unknown>
}

const normalizeError = (err: unknown): NormalizedError => {
  const mapped = toApiHttpError(err)
  if (mapped instanceof ApiHttpError) {
    return {
      code: mapped.code,
      message: mapped.message,
      status: mapped.status,
      details: mapped.details
    }
  }

  // Body-parser and similar middleware attach an HTTP status to their errors
  if (mapped instanceof Error && 'status' in mapped && typeof mapped.status === 'number' && mapped.status < 500) {
    const definition = getApiErrorDefinition(ApiErrorCode.INVALID_REQUEST)
    return {
      code: ApiErrorCode.INVALID_REQUEST,
      message: mapped.message || definition.defaultMessage,
      status: mapped.status
    }
  }

  const definition = getApiErrorDefinition(ApiErrorCode.INTERNAL_ERROR)
  return {
    code: ApiErrorCode.INTERNAL_ERROR,
    message: definition.defaultMessage,
    status: definition.httpStatus
  }
}

export const apiErrorHandler = (err: unknown, req: Request, res: Response, _next: NextFunction) => {
  const normalized = normalizeError(err)

  const response = failure(normalized.code, normalized.message, {
    ...(normalized.details ?? {}),
    path: req.path
  })

  if (process.env.NODE_ENV !== 'production' && err instanceof Error && err.stack) {
    response.error.stack = err.stack
  }

  const logLevel = normalized.status >= 500 ? 'error' : 'warn'
  logger[logLevel]({ err, code: normalized.code, status: normalized.status, path: req.path }, 'API error response')

  if (res.headersSent) return
  res.status(normalized.status).json(response)
}
