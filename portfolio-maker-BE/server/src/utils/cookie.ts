import type { Request, Response } from 'express'
import { parse as parseCookie } from 'cookie'
import { env } from '../config/env'

export const SESSION_COOKIE = 'pm_session'

const DAY_MS = 24 * 60 * 60 * 1000
const IS_DEV_OR_TEST = env.NODE_ENV === 'development' || env.NODE_ENV === 'test'

function baseCookieOptions() {
  return {
    httpOnly: true,
    secure: !IS_DEV_OR_TEST,
    sameSite: IS_DEV_OR_TEST ? ('lax' as const) : ('none' as const),
    domain: IS_DEV_OR_TEST ? undefined : env.COOKIE_DOMAIN,
    path: '/',
  }
}

export function readSessionToken(req: Request): string | undefined {
  const cookies = req.headers.cookie ? parseCookie(req.headers.cookie) : {}
  return cookies[SESSION_COOKIE] || undefined
}

export function setSessionCookie(res: Response, token: string) {
  res.cookie(SESSION_COOKIE, token, {
    ...baseCookieOptions(),
    maxAge: env.SESSION_TTL_DAYS * DAY_MS,
  })
}

export function clearSessionCookie(res: Response) {
  res.clearCookie(SESSION_COOKIE, baseCookieOptions())
}
