import express from 'express'
import type { Express } from 'express'
import cors from 'cors'
import helmet from 'helmet'
import compression from 'compression'
import morgan from 'morgan'
import { env } from './config/env'
import { logger } from './config/logger'
import { errorHandler } from './middlewares/error.middleware'
import { registerRoutes, type RouteDependencies } from './routes'

/**
 * Express app setup
 * Configures middleware and routes
 */
export function createApp(deps: RouteDependencies): Express {
  const app = express()

  app.use(compression())

  // Security middleware
  app.use(helmet())

  app.use(
    cors({
      origin: env.corsOrigin,
    })
  )

  // Logging middleware
  if (env.nodeEnv === 'development') {
    app.use(morgan('dev'))
  } else if (env.nodeEnv !== 'test') {
    app.use(morgan('combined', { stream: { write: (message) => logger.info(message.trim()) } }))
  }

  app.get('/health', (_req, res) => {
    res.status(200).json({
      status: 'ok',
      timestamp: new Date().toISOString(),
    })
  })

  // Register all API routes
  app.use(env.apiPrefix, registerRoutes(deps))

  // 404 handler
  app.use((_req, res) => {
    res.status(404).json({ error: 'Route not found' })
  })

  // Error handling middleware (must be last)
  app.use(errorHandler)

  return app
}
