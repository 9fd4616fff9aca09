import { env } from './config/env'
import { buildApp } from './app'
import { logger } from './logger'
import { closeDb, getDb } from './db/sqlite'
import { getAuthService } from './modules/auth/auth.service'

const SESSION_PURGE_INTERVAL_MS = 60 * 60 * 1000

async function main() {
  // Touch DB early to surface migration issues fast
  getDb()

  const purgeExpiredSessions = () => {
    const removed = getAuthService().purgeExpiredSessions()
    if (removed) logger.info({ removed }, 'Purged expired sessions')
  }
  purgeExpiredSessions()
  const purgeTimer = setInterval(purgeExpiredSessions, SESSION_PURGE_INTERVAL_MS)
  purgeTimer.unref()

  const app = buildApp()
  const server = app.listen(env.PORT, () => {
    logger.info({ port: env.PORT }, 'Portfolio Maker API listening')
  })

  const shutdown = (reason: string) => {
    logger.info({ reason }, 'Shutting down Portfolio Maker API')
    clearInterval(purgeTimer)
    server.close((err) => {
      if (err) logger.error({ err }, 'Error while closing HTTP server')
      closeDb()
      process.exit(err ? 1 : 0)
    })
  }

  process.on('SIGTERM', () => shutdown('SIGTERM'))
  process.on('SIGINT', () => shutdown('SIGINT'))
}

main().catch((error) => {
  logger.error({ error }, 'Failed to start Portfolio Maker API')
  process.exit(1)
})
