import fs from 'node:fs'
import path from 'node:path'
import { fileURLToPath } from 'node:url'
import type Database from 'better-sqlite3'
import { env } from '../config/env'
import { logger } from '../logger'

const __dirname = path.dirname(fileURLToPath(import.meta.url))

const defaultMigrationsDir = env.SQLITE_MIGRATIONS_DIR
  ? path.resolve(env.SQLITE_MIGRATIONS_DIR)
  : path.resolve(__dirname, '../../../../infra/sqlite/migrations')

function ensureSchemaTable(db: Database.Database) {
  db.exec(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      name TEXT NOT NULL UNIQUE,
      applied_at TEXT NOT NULL DEFAULT CURRENT_TIMESTAMP
    )
  `)
}

function loadApplied(db: Database.Database): Set<string> {
  const rows = db
    .prepare<[], { name: string }>('SELECT name FROM schema_migrations ORDER BY name')
    .all()
  return new Set(rows.map((row) => row.name))
}

/**
 * Apply every .sql file in the migrations directory that is not yet recorded
 * in schema_migrations. Each file runs in its own transaction.
 */
export function runMigrations(db: Database.Database, migrationsDir: string = defaultMigrationsDir): string[] {
  logger.debug({ migrationsDir }, '[migrations] checking for pending migrations')

  if (!fs.existsSync(migrationsDir)) {
    throw new Error(`[migrations] directory not found at ${migrationsDir}`)
  }

  const files = fs
    .readdirSync(migrationsDir)
    .filter((file) => file.endsWith('.sql'))
    .sort((a, b) => a.localeCompare(b))

  ensureSchemaTable(db)
  const applied = loadApplied(db)
  const pending = files.filter((file) => !applied.has(file))

  if (!pending.length) {
    logger.debug({ appliedCount: applied.size }, '[migrations] database is up to date')
    return []
  }

  const record = db.prepare<[string]>('INSERT INTO schema_migrations (name) VALUES (?)')
  const apply = db.transaction((file: string, sql: string) => {
    db.exec(sql)
    record.run(file)
  })

  for (const file of pending) {
    apply(file, fs.readFileSync(path.join(migrationsDir, file), 'utf8'))
    logger.info({ migration: file }, '[migrations] applied migration')
  }

  return pending
}
