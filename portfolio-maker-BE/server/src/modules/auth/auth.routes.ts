import { Router, type RequestHandler } from 'express'
import {
  ApiErrorCode,
  loginRequestSchema,
  registerRequestSchema,
  type LoginResponseData,
  type LogoutResponseData,
  type RegisterResponseData,
  type SessionResponseData,
} from '@shared/types'
import { env } from '../../config/env'
import { ApiHttpError, toApiHttpError } from '../../middleware/api-error'
import { rateLimit } from '../../middleware/rate-limit'
import { asyncHandler } from '../../utils/async-handler'
import { sendSuccess, success } from '../../utils/api-response'
import { clearSessionCookie, readSessionToken, setSessionCookie } from '../../utils/cookie'
import { AuthError } from '../errors'
import { getAuthService } from './auth.service'

export function buildAuthRouter() {
  const router = Router()
  const credentialRateLimiter = rateLimit({ windowMs: 60_000, max: 20 })
  const credentialGuard: RequestHandler =
    env.NODE_ENV === 'production' ? credentialRateLimiter : (_req, _res, next) => next()

  /**
   * POST /auth/register
   * Create an account. Duplicate usernames are rejected by the store's key constraint.
   */
  router.post(
    '/register',
    credentialGuard,
    asyncHandler(async (req, res) => {
      const parsed = registerRequestSchema.safeParse(req.body)
      if (!parsed.success) {
        throw new ApiHttpError(ApiErrorCode.INVALID_REQUEST, 'Invalid request body', {
          status: 400,
          details: parsed.error.flatten(),
        })
      }

      const { username, password, confirm } = parsed.data
      const account = await getAuthService().register(username, password, confirm)

      const data: RegisterResponseData = { username: account.username }
      sendSuccess(res, data, { status: 201, message: 'Registration successful! Please login.' })
    })
  )

  /**
   * POST /auth/login
   * Verify credentials and issue a session cookie.
   */
  router.post(
    '/login',
    credentialGuard,
    asyncHandler(async (req, res) => {
      const parsed = loginRequestSchema.safeParse(req.body)
      if (!parsed.success) {
        throw new ApiHttpError(ApiErrorCode.INVALID_REQUEST, 'Invalid request body', {
          status: 400,
          details: parsed.error.flatten(),
        })
      }

      const result = await getAuthService().login(parsed.data.username, parsed.data.password)
      setSessionCookie(res, result.session.token)

      const data: LoginResponseData = {
        user: { username: result.username },
        portfolio: result.portfolio,
      }
      res.json(success(data))
    })
  )

  /**
   * GET /auth/session
   * Restore the signed-in account from the session cookie.
   */
  router.get('/session', (req, res, next) => {
    const token = readSessionToken(req)
    if (!token) {
      return next(new ApiHttpError(ApiErrorCode.UNAUTHORIZED, 'No session cookie', { status: 401 }))
    }

    try {
      const account = getAuthService().restoreSession(token)
      const data: SessionResponseData = {
        user: { username: account.username },
        portfolio: account.portfolio,
      }
      return res.json(success(data))
    } catch (err) {
      if (err instanceof AuthError) {
        clearSessionCookie(res)
      }
      return next(toApiHttpError(err))
    }
  })

  /**
   * POST /auth/logout
   * Drop the server-side session and clear the cookie. Always succeeds.
   */
  router.post('/logout', (req, res) => {
    const token = readSessionToken(req)
    if (token) {
      getAuthService().logout(token)
    }
    clearSessionCookie(res)

    const data: LogoutResponseData = { loggedOut: true }
    res.json(success(data))
  })

  return router
}
