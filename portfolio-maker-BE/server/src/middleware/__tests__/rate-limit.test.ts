import express from 'express'
import request from 'supertest'
import { describe, expect, it } from 'vitest'
import { ApiErrorCode } from '@shared/types'
import { apiErrorHandler } from '../api-error'
import { rateLimit } from '../rate-limit'

const buildTestApp = (options: Parameters<typeof rateLimit>[0]) => {
  const app = express()
  app.get('/limited', rateLimit(options), (_req, res) => {
    res.json({ ok: true })
  })
  app.use(apiErrorHandler)
  return app
}

describe('rateLimit middleware', () => {
  it('allows under limit and blocks when exceeding', async () => {
    const app = buildTestApp({ windowMs: 60_000, max: 2 })

    await request(app).get('/limited').expect(200)
    await request(app).get('/limited').expect(200)

    const res = await request(app).get('/limited')
    expect(res.status).toBe(429)
    expect(res.body.error.code).toBe(ApiErrorCode.RATE_LIMIT_EXCEEDED)
    expect(res.body.error.details.retryAfterMs).toBeGreaterThan(0)
  })

  it('tracks keys independently', async () => {
    let caller = 'a'
    const app = buildTestApp({ windowMs: 60_000, max: 1, keyGenerator: () => caller })

    await request(app).get('/limited').expect(200)
    caller = 'b'
    await request(app).get('/limited').expect(200)
    caller = 'a'
    await request(app).get('/limited').expect(429)
  })

  it('skips when no key is available', async () => {
    const app = buildTestApp({ windowMs: 60_000, max: 1, keyGenerator: () => null })

    await request(app).get('/limited').expect(200)
    await request(app).get('/limited').expect(200)
  })
})
