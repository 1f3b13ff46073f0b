/**
 * One row of the inventory CSV
 * statusDate is a UTC midnight Date for the row's calendar day
 */
export interface InventoryRecord {
  key: string
  keyName: string
  currentMonth: number
  beginInventory: number
  lastInventory: number
  statusDate: Date
  currentStatusInventory: number
  sales: number
}

/** Records in file order */
export type InventoryTable = InventoryRecord[]

export interface TimeSeriesPoint {
  status_date: string
  current_status_inventory: number
  sales: number
}

export interface KpiSummary {
  key: string
  key_name: string
  current_month: number
  total_sales: number
  avg_daily_sales: number
  min_inventory: number
  max_inventory: number
  days_below_100: number
  time_series: TimeSeriesPoint[]
}

export interface InventoryStatsResponse {
  items: KpiSummary[]
  message?: string
}

export interface InventoryStatsErrorResponse {
  error: string
}

export type InventoryStatsOutcome =
  | { status: 'success'; body: InventoryStatsResponse }
  | { status: 'failed'; error: string }

export type HandlerState = 'idle' | 'loading' | 'aggregating' | 'responding' | 'failed'

/**
 * Where the inventory CSV lives
 * sourceEndpoint is the storage account connection string
 */
export interface SourceConfig {
  sourceEndpoint: string
  containerName: string
  blobName: string
}
