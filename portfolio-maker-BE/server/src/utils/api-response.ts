import type { Response } from 'express'
import type { ApiErrorCode, ApiErrorResponse, ApiSuccessResponse } from '@shared/types'

export const success = <T>(data: T, message?: string): ApiSuccessResponse<T> => ({
  success: true,
  data,
  ...(message ? { message } : {})
})

export const failure = (
  code: ApiErrorCode | string,
  message: string,
  details?: Record<string, unknown>
): ApiErrorResponse => ({
  success: false,
  error: {
    code,
    message,
    ...(details ? { details } : {})
  }
})

/** Write a success envelope with an explicit status (201 for creates). */
export function sendSuccess<T>(res: Response, data: T, options: { status?: number; message?: string } = {}): void {
  res.status(options.status ?? 200).json(success(data, options.message))
}
