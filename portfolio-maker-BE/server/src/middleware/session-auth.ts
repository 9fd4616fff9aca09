import type { NextFunction, Request, Response } from 'express'
import { ApiErrorCode } from '@shared/types'
import { getAuthService, type AuthenticatedAccount } from '../modules/auth/auth.service'
import { AuthError } from '../modules/errors'
import { clearSessionCookie, readSessionToken } from '../utils/cookie'
import { ApiHttpError } from './api-error'

declare global {
  // eslint-disable-next-line @typescript-eslint/no-namespace
  namespace Express {
    interface Request {
      account?: AuthenticatedAccount
    }
  }
}

/**
 * Require a valid session cookie and attach the account to `req.account`.
 */
export function requireSession(req: Request, res: Response, next: NextFunction) {
  const token = readSessionToken(req)
  if (!token) {
    return next(new ApiHttpError(ApiErrorCode.UNAUTHORIZED, 'Authentication required', { status: 401 }))
  }

  try {
    req.account = getAuthService().restoreSession(token)
    return next()
  } catch (err) {
    if (err instanceof AuthError) {
      clearSessionCookie(res)
      return next(new ApiHttpError(ApiErrorCode.UNAUTHORIZED, err.message, { status: 401 }))
    }
    return next(err)
  }
}

/**
 * Read the account attached by requireSession. Throws when the route was
 * mounted without it.
 */
export function getSessionAccount(req: Request): AuthenticatedAccount {
  if (!req.account) {
    throw new ApiHttpError(ApiErrorCode.UNAUTHORIZED, 'Authentication required', { status: 401 })
  }
  return req.account
}
