import express from 'express'
import cors from 'cors'
import helmet from 'helmet'
import { ApiErrorCode } from '@shared/types'
import { env } from './config/env'
import { httpLogger, logger } from './logger'
import { healthHandler } from './routes/health'
import { ApiHttpError, apiErrorHandler } from './middleware/api-error'
import { requireSession } from './middleware/session-auth'
import { buildAuthRouter } from './modules/auth/auth.routes'
import { buildPortfolioRouter } from './modules/portfolio/portfolio.routes'
import { buildProfileRouter } from './modules/profile/profile.routes'
import { buildGeneratorRouter } from './modules/generator/generator.routes'

const DEFAULT_ALLOWED_ORIGINS = ['http://localhost:5173', 'http://127.0.0.1:5173']

export function buildApp() {
  const app = express()

  // Responses are per-user and change on every save; never let intermediaries cache them
  app.set('etag', false)
  app.use((_, res, next) => {
    res.set('Cache-Control', 'no-store, no-cache, must-revalidate')
    res.set('Pragma', 'no-cache')
    res.set('Expires', '0')
    next()
  })

  app.use(helmet())

  const allowedOrigins = env.CORS_ALLOWED_ORIGINS
    ? env.CORS_ALLOWED_ORIGINS.split(',').map((origin) => origin.trim()).filter(Boolean)
    : DEFAULT_ALLOWED_ORIGINS

  app.use(
    cors({
      origin: (origin, callback) => {
        // Same-origin and non-browser requests carry no Origin header
        if (!origin || allowedOrigins.includes(origin)) {
          return callback(null, true)
        }
        logger.warn({ origin, allowedOrigins }, 'CORS request from disallowed origin')
        callback(null, false)
      },
      credentials: true,
      methods: ['GET', 'POST', 'PUT', 'OPTIONS'],
      allowedHeaders: ['Content-Type', 'Cache-Control', 'Pragma'],
      optionsSuccessStatus: 204
    })
  )
  app.use(httpLogger)
  app.use(express.json({ limit: '1mb' }))

  app.get('/healthz', healthHandler)

  app.use('/api/auth', buildAuthRouter())

  // Everything below requires a signed-in account
  app.use('/api', requireSession)
  app.use('/api/portfolio', buildPortfolioRouter())
  app.use('/api/profile', buildProfileRouter())
  app.use('/api/generator', buildGeneratorRouter())

  app.use((req, _res, next) => {
    next(new ApiHttpError(ApiErrorCode.NOT_FOUND, 'Resource not found', { status: 404, details: { path: req.path } }))
  })

  app.use(apiErrorHandler)

  return app
}
