/**
 * Base API Client
 *
 * Provides common HTTP methods with:
 * - Cookie-based authentication (credentials: include)
 * - Retry with exponential backoff for network and 5xx failures
 * - Error normalization into ApiError
 */

import { ApiErrorCode, type ApiErrorResponse } from '@shared/types'
import { handleApiError } from '@/lib/api-error-handler'

export interface RequestOptions {
  method?: 'GET' | 'POST' | 'PUT' | 'DELETE'
  headers?: Record<string, string>
  body?: unknown
  timeout?: number
  retryAttempts?: number
  retryDelay?: number
}

export function isApiErrorResponse(value: unknown): value is ApiErrorResponse {
  if (typeof value !== 'object' || value === null) return false
  if (!('success' in value) || value.success !== false) return false
  if (!('error' in value) || typeof value.error !== 'object' || value.error === null) return false
  return 'code' in value.error && 'message' in value.error
}

export class ApiError extends Error {
  statusCode?: number
  response?: ApiErrorResponse
  code: ApiErrorCode | string
  details?: Record<string, unknown>

  constructor(
    message: string,
    statusCode?: number,
    response?: ApiErrorResponse,
    code: ApiErrorCode | string = ApiErrorCode.INTERNAL_ERROR
  ) {
    super(message)
    this.name = 'ApiError'
    this.statusCode = statusCode
    this.response = response
    this.code = code
    this.details = response?.error.details
  }

  get isClientError(): boolean {
    return this.statusCode !== undefined && this.statusCode >= 400 && this.statusCode < 500
  }
}

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms))

export class BaseApiClient {
  private baseUrlResolver: () => string
  defaultTimeout: number
  defaultRetryAttempts: number
  defaultRetryDelay: number

  constructor(
    baseUrl: string | (() => string),
    options?: {
      timeout?: number
      retryAttempts?: number
      retryDelay?: number
    }
  ) {
    this.baseUrlResolver = typeof baseUrl === 'function' ? baseUrl : () => baseUrl
    this.defaultTimeout = options?.timeout ?? 30000
    this.defaultRetryAttempts = options?.retryAttempts ?? 3
    this.defaultRetryDelay = options?.retryDelay ?? 1000
  }

  get baseUrl(): string {
    return this.baseUrlResolver()
  }

  /**
   * Make an HTTP request. 4xx responses are thrown immediately; network
   * errors and 5xx responses are retried up to `retryAttempts` times.
   */
  async request<T>(endpoint: string, options: RequestOptions = {}): Promise<T> {
    const {
      method = 'GET',
      headers = {},
      body,
      timeout = this.defaultTimeout,
      retryAttempts = this.defaultRetryAttempts,
      retryDelay = this.defaultRetryDelay,
    } = options

    const url = `${this.baseUrl}${endpoint}`
    const context = `${method} ${endpoint}`

    const fetchOptions: RequestInit = {
      method,
      headers: {
        'Content-Type': 'application/json',
        'Cache-Control': 'no-cache',
        Pragma: 'no-cache',
        ...headers,
      },
      cache: 'no-store',
      credentials: 'include',
    }

    if (body !== undefined && method !== 'GET') {
      fetchOptions.body = JSON.stringify(body)
    }

    let lastError: unknown = null

    for (let attempt = 0; attempt < retryAttempts; attempt++) {
      try {
        const response = await fetch(url, { ...fetchOptions, signal: AbortSignal.timeout(timeout) })

        if (!response.ok) {
          const errorData: unknown = await response.json().catch(() => undefined)
          const payload = isApiErrorResponse(errorData) ? errorData : undefined
          throw new ApiError(
            payload?.error.message || `HTTP ${response.status}: ${response.statusText}`,
            response.status,
            payload,
            payload?.error.code ?? ApiErrorCode.INTERNAL_ERROR
          )
        }

        const data: T = await response.json()
        return data
      } catch (error) {
        lastError = error

        // Client errors are for the caller to present
        if (error instanceof ApiError && error.isClientError) {
          handleApiError(error, { context, silent: true })
          throw error
        }

        if (attempt < retryAttempts - 1) {
          await sleep(retryDelay * Math.pow(2, attempt))
        }
      }
    }

    const finalError =
      lastError instanceof ApiError
        ? lastError
        : new ApiError(
            lastError instanceof Error ? lastError.message : 'Request failed after all retry attempts',
            undefined,
            undefined,
            ApiErrorCode.INTERNAL_ERROR
          )
    handleApiError(finalError, { context })
    throw finalError
  }

  async get<T>(endpoint: string, options?: RequestOptions): Promise<T> {
    return this.request<T>(endpoint, { ...options, method: 'GET' })
  }

  async post<T>(endpoint: string, body?: unknown, options?: RequestOptions): Promise<T> {
    return this.request<T>(endpoint, { ...options, method: 'POST', body })
  }

  async put<T>(endpoint: string, body?: unknown, options?: RequestOptions): Promise<T> {
    return this.request<T>(endpoint, { ...options, method: 'PUT', body })
  }
}
