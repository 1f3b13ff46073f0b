import type { InventoryRecord, InventoryTable, KpiSummary, TimeSeriesPoint } from '../../types/inventory-stats.types'
import { formatIsoDate } from '../../utils/date'

const LOW_INVENTORY_THRESHOLD = 100

/**
 * Group records by key, keeping groups in the order each key first appears
 */
export function groupByKey(table: InventoryTable): Map<string, InventoryRecord[]> {
  const groups = new Map<string, InventoryRecord[]>()
  for (const record of table) {
    const group = groups.get(record.key)
    if (group) {
      group.push(record)
    } else {
      groups.set(record.key, [record])
    }
  }
  return groups
}

/**
 * Stable ascending sort by status date (Array.prototype.sort is stable)
 */
function sortByStatusDate(records: InventoryRecord[]): InventoryRecord[] {
  return [...records].sort((a, b) => a.statusDate.getTime() - b.statusDate.getTime())
}

function toTimeSeriesPoint(record: InventoryRecord): TimeSeriesPoint {
  return {
    status_date: formatIsoDate(record.statusDate),
    current_status_inventory: record.currentStatusInventory,
    sales: record.sales,
  }
}

/**
 * Summarise one non-empty group
 * key_name and current_month come from the earliest-dated record
 */
export function summarizeGroup(key: string, records: InventoryRecord[]): KpiSummary {
  const sorted = sortByStatusDate(records)
  const first = sorted[0]

  let totalSales = 0
  let minInventory = Infinity
  let maxInventory = -Infinity
  let daysBelow = 0

  for (const record of sorted) {
    totalSales += record.sales
    minInventory = Math.min(minInventory, record.currentStatusInventory)
    maxInventory = Math.max(maxInventory, record.currentStatusInventory)
    if (record.currentStatusInventory < LOW_INVENTORY_THRESHOLD) daysBelow++
  }

  return {
    key,
    key_name: first.keyName,
    current_month: first.currentMonth,
    total_sales: totalSales,
    avg_daily_sales: totalSales / sorted.length,
    min_inventory: minInventory,
    max_inventory: maxInventory,
    days_below_100: daysBelow,
    time_series: sorted.map(toTimeSeriesPoint),
  }
}

/**
 * Compute KPI summaries, optionally restricted to one key (exact, case-sensitive)
 * An empty table or a key with no rows yields an empty list
 */
export function computeKpis(table: InventoryTable, key?: string): KpiSummary[] {
  const rows = key === undefined ? table : table.filter((record) => record.key === key)

  const summaries: KpiSummary[] = []
  for (const [groupKey, records] of groupByKey(rows)) {
    summaries.push(summarizeGroup(groupKey, records))
  }
  return summaries
}
