import type { Request, Response, NextFunction } from 'express'
import { validationResult } from 'express-validator'
import { AppError } from './error.middleware'

/**
 * Express-validator validation middleware
 * Checks validation results from express-validator chains
 * Must be used after express-validator validation chains
 */
export const validateRequest = (req: Request, _res: Response, next: NextFunction): void => {
  const errors = validationResult(req)
  if (!errors.isEmpty()) {
    const errorMessages = errors.array().map((err) => String(err.msg)).join(', ')
    next(new AppError(errorMessages, 400))
    return
  }
  next()
}
