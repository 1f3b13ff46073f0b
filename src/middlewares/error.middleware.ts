import type { Request, Response, NextFunction } from 'express'
import { logger } from '../config/logger'

/**
 * Custom error class for operational errors
 * Carries the HTTP status code used when it reaches the error middleware
 */
export class AppError extends Error {
  statusCode: number
  isOperational: boolean

  constructor(message: string, statusCode: number = 500) {
    super(message)
    this.name = new.target.name
    this.statusCode = statusCode
    this.isOperational = true
    Error.captureStackTrace(this, this.constructor)
  }
}

/**
 * Error handling middleware
 * Must be the last middleware in the chain
 *
 * Handles:
 * - AppError instances (operational errors)
 * - Body parser errors carrying a status
 * - Unknown errors
 */
export function errorHandler(
  err: Error | AppError,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  logger.error(
    {
      error: err.message,
      stack: err.stack,
      path: req.path,
      method: req.method,
    },
    'Error occurred'
  )

  if (err instanceof AppError) {
    res.status(err.statusCode).json({
      error: err.message,
      ...(process.env.NODE_ENV === 'development' && { stack: err.stack }),
    })
    return
  }

  // express.json() and friends attach a client status to malformed requests
  if ('status' in err && typeof err.status === 'number' && err.status >= 400 && err.status < 500) {
    res.status(err.status).json({ error: err.message })
    return
  }

  res.status(500).json({
    error: 'Internal server error',
    ...(process.env.NODE_ENV === 'development' && { message: err.message, stack: err.stack }),
  })
}
