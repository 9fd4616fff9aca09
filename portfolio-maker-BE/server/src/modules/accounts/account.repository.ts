import type Database from 'better-sqlite3'
import { z } from 'zod'
import { parseStoredPortfolio, type ProfileRecord } from '@shared/types'
import { env } from '../../config/env'
import { getDb } from '../../db/sqlite'
import { DuplicateUserError } from '../errors'

/**
 * Persisted account document. The username doubles as the document id.
 */
export interface AccountDocument {
  _id: string
  password: string
  portfolio_data: ProfileRecord | Record<string, never>
  created_at: string
}

export interface UserAccount {
  username: string
  passwordHash: string
  portfolio: ProfileRecord | null
  createdAt: string
}

const AccountDocumentSchema = z.object({
  _id: z.string(),
  password: z.string(),
  portfolio_data: z.unknown(),
  created_at: z.string(),
})

type DocumentRow = { body: string }

function isPrimaryKeyViolation(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'SQLITE_CONSTRAINT_PRIMARYKEY'
}

function mapDocument(body: string): UserAccount {
  const doc = AccountDocumentSchema.parse(JSON.parse(body))
  return {
    username: doc._id,
    passwordHash: doc.password,
    portfolio: parseStoredPortfolio(doc.portfolio_data),
    createdAt: doc.created_at,
  }
}

/**
 * Credential store over one document collection. Uniqueness of usernames is
 * enforced by the (collection, id) primary key, not by a read before insert.
 */
export class AccountRepository {
  private db: Database.Database

  constructor(private readonly collection: string = env.ACCOUNTS_COLLECTION) {
    this.db = getDb()
  }

  insert(username: string, passwordHash: string, createdAt: Date = new Date()): UserAccount {
    const timestamp = createdAt.toISOString()
    const doc: AccountDocument = {
      _id: username,
      password: passwordHash,
      portfolio_data: {},
      created_at: timestamp,
    }

    try {
      this.db
        .prepare<[string, string, string, string, string]>(
          'INSERT INTO documents (collection, id, body, created_at, updated_at) VALUES (?, ?, ?, ?, ?)'
        )
        .run(this.collection, username, JSON.stringify(doc), timestamp, timestamp)
    } catch (err) {
      if (isPrimaryKeyViolation(err)) {
        throw new DuplicateUserError(username)
      }
      throw err
    }

    return { username, passwordHash, portfolio: null, createdAt: timestamp }
  }

  findByUsername(username: string): UserAccount | null {
    const row = this.db
      .prepare<[string, string], DocumentRow>('SELECT body FROM documents WHERE collection = ? AND id = ?')
      .get(this.collection, username)

    return row ? mapDocument(row.body) : null
  }

  /** Full replace of the stored portfolio. Returns false when the account does not exist. */
  replacePortfolio(username: string, portfolio: ProfileRecord): boolean {
    const result = this.db
      .prepare<[string, string, string, string]>(
        [
          'UPDATE documents',
          "SET body = json_set(body, '$.portfolio_data', json(?)), updated_at = ?",
          'WHERE collection = ? AND id = ?',
        ].join(' ')
      )
      .run(JSON.stringify(portfolio), new Date().toISOString(), this.collection, username)

    return result.changes > 0
  }

  updatePasswordHash(username: string, passwordHash: string): boolean {
    const result = this.db
      .prepare<[string, string, string, string]>(
        "UPDATE documents SET body = json_set(body, '$.password', ?), updated_at = ? WHERE collection = ? AND id = ?"
      )
      .run(passwordHash, new Date().toISOString(), this.collection, username)

    return result.changes > 0
  }
}
