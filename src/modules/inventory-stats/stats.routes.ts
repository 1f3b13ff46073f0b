import { Router } from 'express'
import { validateRequest } from '../../middlewares/validation.middleware'
import { createInventoryStatsController } from './stats.controller'
import type { InventoryTableLoader } from './stats.service'
import { validateInventoryStatsQuery } from './stats.validation'

/**
 * Inventory stats routes
 * Read-only and anonymous, like the function endpoint the agent calls
 */
export function createInventoryStatsRouter(loader: InventoryTableLoader): Router {
  const router = Router()

  router.get('/', ...validateInventoryStatsQuery, validateRequest, createInventoryStatsController(loader))

  return router
}
