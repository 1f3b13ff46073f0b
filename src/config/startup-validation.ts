/**
 * Startup Validation
 *
 * Validates the configuration the service cannot run without.
 * Implements fail-fast strategy to prevent silent misconfigurations.
 */

import { env } from './env'
import { logger } from './logger'
import { assertSourceConfig } from '../modules/inventory-stats/inventory.loader'
import type { SourceConfig } from '../types/inventory-stats.types'

/**
 * Build the blob source configuration from the environment
 */
export function sourceConfigFromEnv(): SourceConfig {
  return {
    sourceEndpoint: env.blobConnectionString,
    containerName: env.blobContainer,
    blobName: env.blobName,
  }
}

/**
 * Validate blob source configuration
 *
 * CRITICAL: every request reads the CSV from this blob.
 */
export function validateSourceConfiguration(): SourceConfig {
  const config = sourceConfigFromEnv()
  assertSourceConfig(config)
  logger.info({ container: config.containerName, blob: config.blobName }, 'Blob source configuration validated')
  return config
}

/**
 * Run all startup validations
 *
 * Must be called before starting the server.
 * If any validation fails, the application will not start.
 */
export function runStartupValidations(): SourceConfig {
  logger.info('Running startup validations...')

  try {
    const config = validateSourceConfiguration()
    logger.info('All startup validations passed')
    return config
  } catch (error) {
    logger.error({ error: error instanceof Error ? error.message : String(error) }, 'Startup validation failed')
    throw error
  }
}
