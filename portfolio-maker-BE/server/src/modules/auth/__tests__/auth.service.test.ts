import { beforeEach, describe, expect, it } from 'vitest'
import { buildProfileRecord } from '@shared/types'
import { getDb } from '../../../db/sqlite'
import { AccountRepository } from '../../accounts/account.repository'
import { legacySha256 } from '../../accounts/password'
import { SessionRepository } from '../../accounts/session.repository'
import { AuthError, DuplicateUserError, ValidationError } from '../../errors'
import { AuthService } from '../auth.service'

const accounts = new AccountRepository('users')
const service = new AuthService(accounts, new SessionRepository(), 30)

beforeEach(() => {
  const db = getDb()
  db.prepare('DELETE FROM documents').run()
  db.prepare('DELETE FROM sessions').run()
})

describe('AuthService.register', () => {
  it('rejects empty fields', async () => {
    await expect(service.register('  ', 'pw', 'pw')).rejects.toThrow(ValidationError)
    await expect(service.register('jane', '', '')).rejects.toThrow('Please fill all fields')
  })

  it('rejects mismatched confirmation', async () => {
    await expect(service.register('jane', 'pw-1', 'pw-2')).rejects.toThrow('Passwords do not match')
    expect(accounts.findByUsername('jane')).toBeNull()
  })

  it('stores a salted hash, never the password', async () => {
    await service.register('jane', 'test-password', 'test-password')

    const stored = accounts.findByUsername('jane')
    expect(stored?.passwordHash.startsWith('scrypt$')).toBe(true)
    expect(stored?.passwordHash).not.toContain('test-password')
  })

  it('rejects a second registration of the same username', async () => {
    await service.register('jane', 'first-password', 'first-password')
    const before = accounts.findByUsername('jane')

    await expect(service.register('jane', 'other-password', 'other-password')).rejects.toThrow(DuplicateUserError)
    expect(accounts.findByUsername('jane')).toEqual(before)
  })
})

describe('AuthService.login', () => {
  beforeEach(async () => {
    await service.register('jane', 'test-password', 'test-password')
  })

  it('succeeds with the right password and opens a session', async () => {
    const result = await service.login('jane', 'test-password')

    expect(result.username).toBe('jane')
    expect(result.portfolio).toBeNull()
    expect(service.restoreSession(result.session.token)).toEqual({ username: 'jane', portfolio: null })
  })

  it.each([
    ['jane', 'wrong-password'],
    ['nobody', 'test-password'],
  ])('fails with AuthError for %s / %s', async (username, password) => {
    await expect(service.login(username, password)).rejects.toThrow(AuthError)
  })

  it('asks for both fields before looking anything up', async () => {
    await expect(service.login('jane', '')).rejects.toThrow('Please enter username and password')
  })

  it('upgrades a legacy SHA-256 hash after a successful login', async () => {
    accounts.insert('legacy', legacySha256('old-password'))

    await service.login('legacy', 'old-password')

    const upgraded = accounts.findByUsername('legacy')?.passwordHash ?? ''
    expect(upgraded.startsWith('scrypt$')).toBe(true)
    await expect(service.login('legacy', 'old-password')).resolves.toMatchObject({ username: 'legacy' })
  })
})

describe('AuthService sessions and portfolio', () => {
  it('expires sessions and removes them', async () => {
    await service.register('jane', 'test-password', 'test-password')
    const { session } = await service.login('jane', 'test-password')

    const later = new Date(Date.parse(session.expiresAt) + 1)
    expect(() => service.restoreSession(session.token, later)).toThrow('Session expired')
    expect(() => service.restoreSession(session.token)).toThrow('Invalid session')
  })

  it('logout invalidates the session without touching the account', async () => {
    await service.register('jane', 'test-password', 'test-password')
    const { session } = await service.login('jane', 'test-password')

    service.logout(session.token)

    expect(() => service.restoreSession(session.token)).toThrow(AuthError)
    expect(accounts.findByUsername('jane')).not.toBeNull()
  })

  it('saves and loads the portfolio', async () => {
    await service.register('jane', 'test-password', 'test-password')
    const intake = buildProfileRecord({
      full_name: 'Jane Doe',
      email: 'jane@example.com',
      target_position: 'Engineer',
      institution: 'State University',
      degree: 'BSc',
    })
    if (!intake.ok) throw new Error('fixture profile is incomplete')

    service.savePortfolio('jane', intake.profile)

    expect(service.loadPortfolio('jane')).toEqual(intake.profile)
    await expect(service.login('jane', 'test-password')).resolves.toMatchObject({ portfolio: intake.profile })
  })
})
