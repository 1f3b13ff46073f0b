import dotenv from 'dotenv'

dotenv.config()

/**
 * Environment configuration
 * Reads and exports all environment variables used by the service and the agent console
 *
 * Blob source settings are optional here and checked by startup validation,
 * so the agent console can run without them.
 */

interface EnvConfig {
  nodeEnv: string
  port: number
  apiPrefix: string
  corsOrigin: string
  logLevel: string
  // Blob source holding the inventory CSV
  blobConnectionString: string
  blobContainer: string
  blobName: string
  blobTimeoutMs: number
  // Agent console
  inventoryStatsUrl: string
  toolTimeoutMs: number
  anthropicApiKey: string
  agentModel: string
  agentMaxTurns: number
}

/**
 * Get optional environment variable (returns empty string if not set)
 */
function getOptionalEnvVar(key: string, defaultValue: string = ''): string {
  return process.env[key] || defaultValue
}

function getEnvVar(key: string, defaultValue?: string): string {
  const value = process.env[key] || defaultValue
  if (!value) {
    throw new Error(`Missing required environment variable: ${key}`)
  }
  return value
}

function getIntEnvVar(key: string, defaultValue: number): number {
  const raw = getEnvVar(key, String(defaultValue))
  const value = parseInt(raw, 10)
  if (Number.isNaN(value)) {
    throw new Error(`Environment variable ${key} must be an integer, got "${raw}"`)
  }
  return value
}

export const env: EnvConfig = {
  nodeEnv: getEnvVar('NODE_ENV', 'development'),
  port: getIntEnvVar('PORT', 7071),
  apiPrefix: getEnvVar('API_PREFIX', '/api'),
  corsOrigin: getEnvVar('CORS_ORIGIN', '*'),
  logLevel: getEnvVar('LOG_LEVEL', 'info'),
  blobConnectionString: getOptionalEnvVar('BLOB_CONNECTION_STRING'),
  blobContainer: getOptionalEnvVar('BLOB_CONTAINER', 'datasets'),
  blobName: getOptionalEnvVar('BLOB_NAME', 'gestion_demanda.csv'),
  blobTimeoutMs: getIntEnvVar('BLOB_TIMEOUT_MS', 10000),
  inventoryStatsUrl: getEnvVar('INVENTORY_STATS_URL', 'http://localhost:7071/api/inventory_stats'),
  toolTimeoutMs: getIntEnvVar('TOOL_TIMEOUT_MS', 10000),
  anthropicApiKey: getOptionalEnvVar('ANTHROPIC_API_KEY'),
  agentModel: getEnvVar('AGENT_MODEL', 'claude-sonnet-4-5-20250929'),
  agentMaxTurns: getIntEnvVar('AGENT_MAX_TURNS', 10),
}
