import { Router } from 'express'
import { createInventoryStatsRouter } from './modules/inventory-stats/stats.routes'
import type { InventoryTableLoader } from './modules/inventory-stats/stats.service'

export interface RouteDependencies {
  inventoryLoader: InventoryTableLoader
}

/**
 * Central route registration
 * Registers all module routes
 */
export function registerRoutes(deps: RouteDependencies): Router {
  const router = Router()

  // Inventory KPI routes
  router.use('/inventory_stats', createInventoryStatsRouter(deps.inventoryLoader))

  return router
}
