import Database from 'better-sqlite3'
import fs from 'node:fs'
import path from 'node:path'
import { env } from '../config/env'
import { logger } from '../logger'
import { runMigrations } from './migrations'

const IN_MEMORY = ':memory:'

let db: Database.Database | null = null

export function getDb(): Database.Database {
  if (db) {
    return db
  }

  const isMemory = env.DATABASE_PATH === IN_MEMORY
  const dbPath = isMemory ? IN_MEMORY : path.resolve(env.DATABASE_PATH)

  if (!isMemory && !fs.existsSync(path.dirname(dbPath))) {
    fs.mkdirSync(path.dirname(dbPath), { recursive: true })
  }

  logger.info({ dbPath }, 'Opening SQLite database')

  const connection = new Database(dbPath)
  if (!isMemory) {
    connection.pragma('journal_mode = WAL')
  }
  connection.pragma('foreign_keys = ON')
  connection.pragma('busy_timeout = 15000')
  connection.pragma('synchronous = NORMAL')

  runMigrations(connection)

  db = connection
  return db
}

export function closeDb(): void {
  if (!db) return
  logger.info('Closing SQLite database')
  db.close()
  db = null
}
