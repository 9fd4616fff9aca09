/**
 * API Types
 *
 * Envelope and error-code definitions shared by the portfolio-maker API
 * server and the frontend client.
 */

/**
 * API Error Codes
 * Standardized error codes for consistent error handling across all API endpoints
 */
export enum ApiErrorCode {
  // Authentication errors
  UNAUTHORIZED = "UNAUTHORIZED",

  // Validation errors
  INVALID_REQUEST = "INVALID_REQUEST",
  MISSING_FIELD = "MISSING_FIELD",
  VALIDATION_FAILED = "VALIDATION_FAILED",

  // Resource errors
  NOT_FOUND = "NOT_FOUND",
  ALREADY_EXISTS = "ALREADY_EXISTS",

  // Rate limiting
  RATE_LIMIT_EXCEEDED = "RATE_LIMIT_EXCEEDED",

  // System errors
  INTERNAL_ERROR = "INTERNAL_ERROR",
}

/**
 * Metadata describing an API error code.
 *
 * httpStatus: the HTTP status the backend returns for this code
 * defaultMessage: developer-facing default message
 * userMessage: safe user-facing copy for the UI (optional)
 * retryable: whether the frontend may retry automatically
 */
export interface ApiErrorDefinition {
  code: ApiErrorCode
  httpStatus: number
  defaultMessage: string
  userMessage?: string
  retryable?: boolean
}

export const API_ERROR_DEFINITIONS: Record<ApiErrorCode, ApiErrorDefinition> = {
  [ApiErrorCode.UNAUTHORIZED]: {
    code: ApiErrorCode.UNAUTHORIZED,
    httpStatus: 401,
    defaultMessage: "Authentication required",
    userMessage: "Please sign in to continue.",
    retryable: false
  },
  [ApiErrorCode.INVALID_REQUEST]: {
    code: ApiErrorCode.INVALID_REQUEST,
    httpStatus: 400,
    defaultMessage: "Request payload is invalid",
    userMessage: "Please double-check the information you entered.",
    retryable: false
  },
  [ApiErrorCode.MISSING_FIELD]: {
    code: ApiErrorCode.MISSING_FIELD,
    httpStatus: 400,
    defaultMessage: "Required field is missing",
    userMessage: "Please fill in all required fields (marked with *)",
    retryable: false
  },
  [ApiErrorCode.VALIDATION_FAILED]: {
    code: ApiErrorCode.VALIDATION_FAILED,
    httpStatus: 400,
    defaultMessage: "Request failed validation",
    userMessage: "Please fix the highlighted issues and try again.",
    retryable: false
  },
  [ApiErrorCode.NOT_FOUND]: {
    code: ApiErrorCode.NOT_FOUND,
    httpStatus: 404,
    defaultMessage: "Resource not found",
    userMessage: "We couldn't find what you were looking for.",
    retryable: false
  },
  [ApiErrorCode.ALREADY_EXISTS]: {
    code: ApiErrorCode.ALREADY_EXISTS,
    httpStatus: 409,
    defaultMessage: "Resource already exists",
    userMessage: "This already exists.",
    retryable: false
  },
  [ApiErrorCode.RATE_LIMIT_EXCEEDED]: {
    code: ApiErrorCode.RATE_LIMIT_EXCEEDED,
    httpStatus: 429,
    defaultMessage: "Rate limit exceeded",
    userMessage: "You're doing that too often. Please slow down.",
    retryable: true
  },
  [ApiErrorCode.INTERNAL_ERROR]: {
    code: ApiErrorCode.INTERNAL_ERROR,
    httpStatus: 500,
    defaultMessage: "Unexpected internal error",
    userMessage: "Something went wrong on our side. Please try again.",
    retryable: true
  }
}

export const DEFAULT_API_ERROR_DEFINITION: ApiErrorDefinition = API_ERROR_DEFINITIONS[ApiErrorCode.INTERNAL_ERROR]

const isApiErrorCode = (code: string): code is ApiErrorCode =>
  Object.prototype.hasOwnProperty.call(API_ERROR_DEFINITIONS, code)

export const getApiErrorDefinition = (code?: ApiErrorCode | string | null): ApiErrorDefinition => {
  if (!code) return DEFAULT_API_ERROR_DEFINITION
  if (isApiErrorCode(code)) {
    return API_ERROR_DEFINITIONS[code]
  }
  return DEFAULT_API_ERROR_DEFINITION
}

/**
 * Generic API success response wrapper
 * Discriminated union type with success: true
 */
export interface ApiSuccessResponse<T> {
  success: true
  data: T
  message?: string
}

/**
 * Generic API error response
 * Discriminated union type with success: false
 */
export interface ApiErrorResponse {
  success: false
  error: {
    code: ApiErrorCode | string
    message: string
    details?: Record<string, unknown>
    stack?: string // Only in development
  }
}

export type ApiResponse<T> = ApiSuccessResponse<T> | ApiErrorResponse
