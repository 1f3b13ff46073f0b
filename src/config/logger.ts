import pino from 'pino'
import type { Logger } from 'pino'
import { env } from './env'

/**
 * Application logger
 * Pretty output in development, JSON lines everywhere else, silent under test
 */

const isDev = env.nodeEnv === 'development'

function resolveLevel(): string {
  if (env.nodeEnv === 'test') return 'silent'
  return env.logLevel
}

export const logger: Logger = isDev
  ? pino({
      level: resolveLevel(),
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
        },
      },
    })
  : pino({
      level: resolveLevel(),
      formatters: {
        level: (label: string) => ({ level: label }),
      },
    })

export const inventoryStatsLogger: Logger = logger.child({ module: 'inventory-stats' })
export const agentLogger: Logger = logger.child({ module: 'agent' })
