import { query } from 'express-validator'

export const validateInventoryStatsQuery = [
  query('key')
    .optional()
    .isString()
    .withMessage('key must be a string'),
]
