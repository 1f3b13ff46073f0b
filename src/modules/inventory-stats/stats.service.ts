import { inventoryStatsLogger as logger } from '../../config/logger'
import type { HandlerState, InventoryStatsOutcome, InventoryTable } from '../../types/inventory-stats.types'
import { computeKpis } from './kpis.service'

export const NO_DATA_MESSAGE = 'No data found for given filters'

/**
 * Anything that can produce the inventory table for one request
 */
export interface InventoryTableLoader {
  load(): Promise<InventoryTable>
}

/**
 * Load the table, aggregate it and build the response outcome
 *
 * idle -> loading -> aggregating -> responding, or failed from loading/aggregating.
 * Failures become a failed outcome carrying the error text; nothing is retried.
 */
export async function getInventoryStats(
  loader: InventoryTableLoader,
  key?: string
): Promise<InventoryStatsOutcome> {
  let state: HandlerState = 'idle'
  const enter = (next: HandlerState) => {
    logger.debug({ key, from: state, to: next }, 'inventory_stats state change')
    state = next
  }

  try {
    enter('loading')
    const table = await loader.load()

    enter('aggregating')
    const items = computeKpis(table, key)

    enter('responding')
    if (items.length === 0) {
      return { status: 'success', body: { items: [], message: NO_DATA_MESSAGE } }
    }
    return { status: 'success', body: { items } }
  } catch (error) {
    const failedIn = state
    enter('failed')
    const message = error instanceof Error ? error.message : String(error)
    logger.error({ key, failedIn, err: error }, 'Error processing inventory_stats request')
    return { status: 'failed', error: message }
  }
}
