import type { NextFunction, Request, Response } from 'express'
import { ApiErrorCode } from '@shared/types'
import { ApiHttpError } from './api-error'

type RateLimitOptions = {
  windowMs: number
  max: number
  keyGenerator?: (req: Request) => string | null | undefined
}

type Bucket = {
  expiresAt: number
  count: number
}

/**
 * In-memory fixed-window limiter keyed by client IP. Single-instance only.
 */
export function rateLimit(options: RateLimitOptions) {
  const buckets = new Map<string, Bucket>()
  const keyFor = options.keyGenerator ?? ((req: Request) => req.ip ?? null)

  return function rateLimitMiddleware(req: Request, _res: Response, next: NextFunction) {
    const key = keyFor(req)
    if (!key) return next()

    const now = Date.now()
    const bucket = buckets.get(key)

    if (bucket && bucket.expiresAt > now) {
      if (bucket.count >= options.max) {
        return next(
          new ApiHttpError(ApiErrorCode.RATE_LIMIT_EXCEEDED, 'Too many requests, please slow down', {
            details: { retryAfterMs: bucket.expiresAt - now }
          })
        )
      }
      bucket.count += 1
    } else {
      buckets.set(key, { count: 1, expiresAt: now + options.windowMs })
    }

    // Prune a handful of expired buckets per request
    let pruned = 0
    for (const [k, b] of buckets) {
      if (b.expiresAt > now) continue
      buckets.delete(k)
      if (++pruned >= 5) break
    }

    return next()
  }
}
