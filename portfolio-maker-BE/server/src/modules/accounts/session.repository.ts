import type Database from 'better-sqlite3'
import { randomUUID } from 'node:crypto'
import { getDb } from '../../db/sqlite'

const DAY_MS = 24 * 60 * 60 * 1000

export interface SessionRecord {
  token: string
  username: string
  createdAt: string
  expiresAt: string
}

type SessionRow = {
  token: string
  username: string
  created_at: string
  expires_at: string
}

function mapRow(row: SessionRow): SessionRecord {
  return {
    token: row.token,
    username: row.username,
    createdAt: row.created_at,
    expiresAt: row.expires_at,
  }
}

export class SessionRepository {
  private db: Database.Database

  constructor() {
    this.db = getDb()
  }

  create(username: string, ttlDays: number, now: Date = new Date()): SessionRecord {
    const record: SessionRecord = {
      token: randomUUID(),
      username,
      createdAt: now.toISOString(),
      expiresAt: new Date(now.getTime() + ttlDays * DAY_MS).toISOString(),
    }

    this.db
      .prepare<[string, string, string, string]>(
        'INSERT INTO sessions (token, username, created_at, expires_at) VALUES (?, ?, ?, ?)'
      )
      .run(record.token, record.username, record.createdAt, record.expiresAt)

    return record
  }

  find(token: string): SessionRecord | null {
    const row = this.db
      .prepare<[string], SessionRow>('SELECT token, username, created_at, expires_at FROM sessions WHERE token = ?')
      .get(token)
    return row ? mapRow(row) : null
  }

  delete(token: string): void {
    this.db.prepare<[string]>('DELETE FROM sessions WHERE token = ?').run(token)
  }

  purgeExpired(now: Date = new Date()): number {
    return this.db.prepare<[string]>('DELETE FROM sessions WHERE expires_at <= ?').run(now.toISOString()).changes
  }
}
