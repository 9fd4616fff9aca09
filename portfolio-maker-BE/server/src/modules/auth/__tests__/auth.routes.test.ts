import request from 'supertest'
import { beforeEach, describe, expect, it } from 'vitest'
import { buildApp } from '../../../app'
import { AccountRepository } from '../../accounts/account.repository'
import { resetStore, sampleProfile, TEST_CREDENTIALS as credentials } from '../../../../tests/helpers/session'

const app = buildApp()

async function register(agent = request(app)) {
  return agent.post('/api/auth/register').send({ ...credentials, confirm: credentials.password })
}

beforeEach(resetStore)

describe('POST /api/auth/register', () => {
  it('creates the account', async () => {
    const res = await register()

    expect(res.status).toBe(201)
    expect(res.body).toEqual({
      success: true,
      data: { username: 'jane' },
      message: 'Registration successful! Please login.',
    })
  })

  it('returns 409 ALREADY_EXISTS for a taken username', async () => {
    await register()
    const res = await register()

    expect(res.status).toBe(409)
    expect(res.body.error.code).toBe('ALREADY_EXISTS')
    expect(res.body.error.message).toBe('Username already exists')
  })

  it('returns 400 VALIDATION_FAILED when passwords differ', async () => {
    const res = await request(app)
      .post('/api/auth/register')
      .send({ username: 'jane', password: 'a', confirm: 'b' })

    expect(res.status).toBe(400)
    expect(res.body.error).toMatchObject({ code: 'VALIDATION_FAILED', message: 'Passwords do not match' })
  })

  it('returns 400 INVALID_REQUEST for a malformed body', async () => {
    const res = await request(app).post('/api/auth/register').send({ username: 42 })

    expect(res.status).toBe(400)
    expect(res.body.error.code).toBe('INVALID_REQUEST')
  })
})

describe('login, session and logout', () => {
  it('sets an http-only session cookie on login', async () => {
    await register()
    const res = await request(app).post('/api/auth/login').send(credentials)

    expect(res.status).toBe(200)
    expect(res.body.data).toEqual({ user: { username: 'jane' }, portfolio: null })
    const cookie = String(res.headers['set-cookie'])
    expect(cookie).toMatch(/^pm_session=[0-9a-f-]{36};/)
    expect(cookie).toContain('HttpOnly')
  })

  it('returns 401 UNAUTHORIZED for bad credentials', async () => {
    await register()
    const res = await request(app).post('/api/auth/login').send({ ...credentials, password: 'nope' })

    expect(res.status).toBe(401)
    expect(res.body.error).toMatchObject({ code: 'UNAUTHORIZED', message: 'Invalid username or password' })
  })

  it('returns 401 UNAUTHORIZED when the stored hash is corrupt', async () => {
    await register()
    new AccountRepository().updatePasswordHash(credentials.username, 'scrypt$3$8$1$AAAA$AAAA')
    const res = await request(app).post('/api/auth/login').send(credentials)

    expect(res.status).toBe(401)
    expect(res.body.error).toMatchObject({ code: 'UNAUTHORIZED', message: 'Invalid username or password' })
  })

  it('restores and then ends the session', async () => {
    const agent = request.agent(app)
    await register(agent)
    await agent.post('/api/auth/login').send(credentials).expect(200)

    const session = await agent.get('/api/auth/session')
    expect(session.status).toBe(200)
    expect(session.body.data.user).toEqual({ username: 'jane' })

    await agent.post('/api/auth/logout').expect(200)

    const after = await agent.get('/api/auth/session')
    expect(after.status).toBe(401)
  })

  it('rejects a request without a session cookie', async () => {
    const res = await request(app).get('/api/auth/session')
    expect(res.status).toBe(401)
    expect(res.body.error.message).toBe('No session cookie')
  })
})

describe('/api/portfolio', () => {
  it('requires a session', async () => {
    const res = await request(app).get('/api/portfolio')
    expect(res.status).toBe(401)
  })

  it('saves the portfolio and returns it on the next login', async () => {
    const profile = sampleProfile()

    const agent = request.agent(app)
    await register(agent)
    await agent.post('/api/auth/login').send(credentials).expect(200)

    const saved = await agent.put('/api/portfolio').send({ portfolio: profile })
    expect(saved.status).toBe(200)
    expect(saved.body.message).toBe('Portfolio data saved successfully!')

    const loaded = await agent.get('/api/portfolio')
    expect(loaded.body.data.portfolio).toEqual(profile)

    const relogin = await request(app).post('/api/auth/login').send(credentials)
    expect(relogin.body.data.portfolio).toEqual(profile)
  })

  it('rejects an invalid portfolio', async () => {
    const agent = request.agent(app)
    await register(agent)
    await agent.post('/api/auth/login').send(credentials).expect(200)

    const res = await agent.put('/api/portfolio').send({ portfolio: { personal_info: {} } })

    expect(res.status).toBe(400)
    expect(res.body.error.code).toBe('VALIDATION_FAILED')
  })
})

describe('unknown routes', () => {
  it('returns 404 NOT_FOUND outside /api', async () => {
    const res = await request(app).get('/nowhere')

    expect(res.status).toBe(404)
    expect(res.body.error.code).toBe('NOT_FOUND')
  })
})
