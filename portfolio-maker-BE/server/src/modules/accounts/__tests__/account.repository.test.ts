import { beforeEach, describe, expect, it } from 'vitest'
import { buildProfileRecord, type ProfileRecord } from '@shared/types'
import { getDb } from '../../../db/sqlite'
import { DuplicateUserError } from '../../errors'
import { AccountRepository } from '../account.repository'
import { SessionRepository } from '../session.repository'

const repo = new AccountRepository('users')
const sessions = new SessionRepository()

function sampleProfile(): ProfileRecord {
  const result = buildProfileRecord({
    full_name: 'Jane Doe',
    email: 'jane@example.com',
    target_position: 'Engineer',
    institution: 'State University',
    degree: 'BSc',
    technical_skills: 'TypeScript, SQL',
  })
  if (!result.ok) throw new Error('fixture profile is incomplete')
  return result.profile
}

beforeEach(() => {
  const db = getDb()
  db.prepare('DELETE FROM documents').run()
  db.prepare('DELETE FROM sessions').run()
})

describe('AccountRepository', () => {
  it('stores the account document with an empty portfolio', () => {
    repo.insert('jane', 'hash-1', new Date('2025-01-02T03:04:05.000Z'))

    const row = getDb()
      .prepare<[], { body: string }>("SELECT body FROM documents WHERE collection = 'users' AND id = 'jane'")
      .get()
    expect(row && JSON.parse(row.body)).toEqual({
      _id: 'jane',
      password: 'hash-1',
      portfolio_data: {},
      created_at: '2025-01-02T03:04:05.000Z',
    })
    expect(repo.findByUsername('jane')).toEqual({
      username: 'jane',
      passwordHash: 'hash-1',
      portfolio: null,
      createdAt: '2025-01-02T03:04:05.000Z',
    })
  })

  it('raises DuplicateUserError and leaves the first record untouched', () => {
    repo.insert('jane', 'hash-1')

    expect(() => repo.insert('jane', 'hash-2')).toThrow(DuplicateUserError)
    expect(repo.findByUsername('jane')?.passwordHash).toBe('hash-1')
  })

  it('keeps collections separate', () => {
    const other = new AccountRepository('other_users')
    repo.insert('jane', 'hash-1')
    other.insert('jane', 'hash-2')

    expect(other.findByUsername('jane')?.passwordHash).toBe('hash-2')
    expect(repo.findByUsername('jane')?.passwordHash).toBe('hash-1')
  })

  it('replaces the portfolio wholesale', () => {
    repo.insert('jane', 'hash-1')
    const profile = sampleProfile()

    expect(repo.replacePortfolio('jane', profile)).toBe(true)
    expect(repo.findByUsername('jane')?.portfolio).toEqual(profile)

    const updated = { ...profile, certifications: ['Scrum Master'] }
    repo.replacePortfolio('jane', updated)
    expect(repo.findByUsername('jane')?.portfolio?.certifications).toEqual(['Scrum Master'])
  })

  it('reports missing accounts on update', () => {
    expect(repo.replacePortfolio('ghost', sampleProfile())).toBe(false)
    expect(repo.updatePasswordHash('ghost', 'x')).toBe(false)
    expect(repo.findByUsername('ghost')).toBeNull()
  })
})

describe('SessionRepository', () => {
  it('creates sessions that expire after the TTL', () => {
    const now = new Date('2025-01-01T00:00:00.000Z')
    const session = sessions.create('jane', 2, now)

    expect(session.expiresAt).toBe('2025-01-03T00:00:00.000Z')
    expect(sessions.find(session.token)).toEqual(session)
  })

  it('purges only expired sessions', () => {
    const old = sessions.create('jane', 1, new Date('2025-01-01T00:00:00.000Z'))
    const fresh = sessions.create('jane', 30, new Date('2025-01-01T00:00:00.000Z'))

    expect(sessions.purgeExpired(new Date('2025-01-05T00:00:00.000Z'))).toBe(1)
    expect(sessions.find(old.token)).toBeNull()
    expect(sessions.find(fresh.token)).not.toBeNull()
  })
})
