import express from 'express'
import request from 'supertest'
import { describe, expect, it } from 'vitest'
import { apiErrorHandler, ApiHttpError, toApiHttpError } from '../api-error'
import { ApiErrorCode } from '@shared/types'
import { AuthError, DuplicateUserError, ValidationError } from '../../modules/errors'

const buildTestApp = () => {
  const app = express()
  app.use(express.json())

  app.get('/bad-request', () => {
    throw new ApiHttpError(ApiErrorCode.INVALID_REQUEST, 'Invalid payload', {
      details: { field: 'email' }
    })
  })

  app.get('/duplicate', () => {
    throw new DuplicateUserError('jane')
  })

  app.post('/echo', (req, res) => {
    res.json(req.body)
  })

  app.get('/unexpected', () => {
    throw new Error('Unexpected boom')
  })

  app.use(apiErrorHandler)
  return app
}

describe('apiErrorHandler middleware', () => {
  it('returns standardized response for ApiHttpError', async () => {
    const res = await request(buildTestApp()).get('/bad-request')

    expect(res.status).toBe(400)
    expect(res.body).toEqual({
      success: false,
      error: {
        code: ApiErrorCode.INVALID_REQUEST,
        message: 'Invalid payload',
        details: { field: 'email', path: '/bad-request' },
        stack: expect.any(String)
      }
    })
  })

  it('maps domain errors through toApiHttpError', async () => {
    const res = await request(buildTestApp()).get('/duplicate')

    expect(res.status).toBe(409)
    expect(res.body.error.code).toBe(ApiErrorCode.ALREADY_EXISTS)
    expect(res.body.error.message).toBe('Username already exists')
  })

  it('reports malformed JSON as INVALID_REQUEST', async () => {
    const res = await request(buildTestApp())
      .post('/echo')
      .set('Content-Type', 'application/json')
      .send('{"broken":')

    expect(res.status).toBe(400)
    expect(res.body.error.code).toBe(ApiErrorCode.INVALID_REQUEST)
  })

  it('normalizes unknown errors to INTERNAL_ERROR', async () => {
    const res = await request(buildTestApp()).get('/unexpected')

    expect(res.status).toBe(500)
    expect(res.body.success).toBe(false)
    expect(res.body.error.code).toBe(ApiErrorCode.INTERNAL_ERROR)
    expect(res.body.error.message).not.toBe('Unexpected boom')
  })
})

describe('toApiHttpError', () => {
  it.each([
    [new ValidationError('Passwords do not match', ['confirm']), ApiErrorCode.VALIDATION_FAILED, 400],
    [new DuplicateUserError('jane'), ApiErrorCode.ALREADY_EXISTS, 409],
    [new AuthError(), ApiErrorCode.UNAUTHORIZED, 401]
  ])('maps %s', (error, code, status) => {
    const mapped = toApiHttpError(error)

    expect(mapped).toBeInstanceOf(ApiHttpError)
    expect(mapped).toMatchObject({ code, status, message: error.message })
  })

  it('returns unrelated errors untouched', () => {
    const error = new Error('other')
    expect(toApiHttpError(error)).toBe(error)
  })
})
