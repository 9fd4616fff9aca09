import type { Request, Response } from 'express'
import { getDb } from '../db/sqlite'
import { logger } from '../logger'

export function healthHandler(_req: Request, res: Response): void {
  let database: 'ok' | 'unavailable' = 'ok'
  try {
    getDb().prepare('SELECT 1').get()
  } catch (err) {
    logger.error({ err }, 'Health check could not reach the database')
    database = 'unavailable'
  }

  const body = {
    status: database === 'ok' ? 'ok' : 'degraded',
    service: 'portfolio-maker-api',
    database,
    timestamp: new Date().toISOString()
  }

  res.status(database === 'ok' ? 200 : 503).json(body)
}
