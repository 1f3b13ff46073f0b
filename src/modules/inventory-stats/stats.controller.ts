import type { Request, Response, NextFunction, RequestHandler } from 'express'
import * as statsService from './stats.service'
import type { InventoryStatsErrorResponse, InventoryStatsResponse } from '../../types/inventory-stats.types'

/**
 * GET /inventory_stats?key=<sku>
 * An absent or empty key means no filtering
 */
export function createInventoryStatsController(loader: statsService.InventoryTableLoader): RequestHandler {
  return async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const key = typeof req.query.key === 'string' && req.query.key !== '' ? req.query.key : undefined

      const outcome = await statsService.getInventoryStats(loader, key)
      if (outcome.status === 'failed') {
        const failure: InventoryStatsErrorResponse = { error: outcome.error }
        res.status(500).json(failure)
        return
      }

      const body: InventoryStatsResponse = outcome.body
      res.status(200).json(body)
    } catch (error) {
      next(error)
    }
  }
}
