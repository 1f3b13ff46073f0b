import { Command } from 'commander'
import chalk from 'chalk'
import { env } from '../../config/env'
import { heading, table, warn, type TableOptions, type TableRow } from '../format'
import { fetchInventoryKpis, inventoryStatsResponseSchema, type InventoryStatsPayload } from '../inventory.tool'

type KpiItem = InventoryStatsPayload['items'][number]

function colorDaysBelow(item: KpiItem, cell: string): string {
  if (item.days_below_100 === 0) return chalk.green(cell)
  if (item.days_below_100 === item.time_series.length) return chalk.red(cell)
  return chalk.yellow(cell)
}

/**
 * One table row per item, numbers rounded for display
 */
export function toKpiRow(item: KpiItem): TableRow {
  return {
    Key: item.key,
    Name: item.key_name,
    Month: item.current_month,
    'Total sales': item.total_sales,
    'Avg daily': Number(item.avg_daily_sales.toFixed(2)),
    'Min inv': item.min_inventory,
    'Max inv': item.max_inventory,
    'Days < 100': item.days_below_100,
  }
}

/**
 * Green when no day dipped below 100, red when every day did
 */
export function kpiTableColors(items: KpiItem[]): NonNullable<TableOptions['colors']> {
  return {
    'Days < 100': (cell, rowIndex) => colorDaysBelow(items[rowIndex], cell),
  }
}

export function registerKpisCommand(program: Command): void {
  program
    .command('kpis [key]')
    .description('Print inventory KPIs straight from the stats endpoint, without the model')
    .option('-u, --url <url>', 'Inventory stats endpoint', env.inventoryStatsUrl)
    .action(async (key: string | undefined, opts: { url: string }) => {
      const body = await fetchInventoryKpis(key, { url: opts.url, timeoutMs: env.toolTimeoutMs })
      const payload = inventoryStatsResponseSchema.parse(JSON.parse(body))

      heading(key ? `Inventory KPIs: ${key}` : `Inventory KPIs (${payload.items.length} items)`)
      if (payload.message) {
        warn(payload.message)
      }
      table(payload.items.map(toKpiRow), { colors: kpiTableColors(payload.items) })
      console.log()
    })
}
