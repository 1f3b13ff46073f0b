import { createApp } from './app'
import { env } from './config/env'
import { logger } from './config/logger'
import { runStartupValidations } from './config/startup-validation'
import { AzureBlobSource } from './modules/inventory-stats/blob.source'
import { InventoryLoader } from './modules/inventory-stats/inventory.loader'

/**
 * Server entry point
 * Validates configuration and starts the Express server
 */
function startServer(): void {
  try {
    const sourceConfig = runStartupValidations()

    const inventoryLoader = new InventoryLoader(
      new AzureBlobSource({
        connectionString: sourceConfig.sourceEndpoint,
        timeoutMs: env.blobTimeoutMs,
      }),
      sourceConfig
    )

    const app = createApp({ inventoryLoader })

    const server = app.listen(env.port, () => {
      logger.info(`Server running on port ${env.port}`)
      logger.info(`Environment: ${env.nodeEnv}`)
      logger.info(`Inventory stats: http://localhost:${env.port}${env.apiPrefix}/inventory_stats`)
    })

    const shutdown = () => {
      logger.info('Shutting down server...')
      server.close(() => {
        process.exit(0)
      })
    }

    process.on('SIGTERM', shutdown)
    process.on('SIGINT', shutdown)
  } catch (error) {
    logger.error({ err: error }, 'Failed to start server')
    process.exit(1)
  }
}

startServer()
