import { parse } from 'csv-parse/sync'
import { inventoryStatsLogger as logger } from '../../config/logger'
import type { InventoryRecord, InventoryTable, SourceConfig } from '../../types/inventory-stats.types'
import { parseMonthDayYear } from '../../utils/date'
import type { BlobSource } from './blob.source'
import { ConfigurationError, DataFormatError, ParseError } from './stats.errors'

// ============================================
// CSV PARSING
// ============================================

export const REQUIRED_COLUMNS = [
  'key',
  'key_name',
  'current_month',
  'montly_begin_inventory',
  'last_inventory',
  'status_date',
  'current_status_inventory',
  'sales',
] as const

type Column = (typeof REQUIRED_COLUMNS)[number]

function isStringMatrix(value: unknown): value is string[][] {
  return (
    Array.isArray(value) &&
    value.every((row) => Array.isArray(row) && row.every((cell) => typeof cell === 'string'))
  )
}

function readRows(text: string): string[][] {
  let rows: unknown
  try {
    rows = parse(text, {
      bom: true,
      skip_empty_lines: true,
      trim: true,
    })
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error)
    throw new DataFormatError(`Malformed CSV: ${reason}`)
  }

  if (!isStringMatrix(rows)) {
    throw new DataFormatError('Malformed CSV: unexpected parser output')
  }
  return rows
}

function checkHeader(header: string[]): void {
  const missing = REQUIRED_COLUMNS.filter((column) => !header.includes(column))
  if (missing.length > 0) {
    throw new DataFormatError(`Missing required column(s): ${missing.join(', ')}`)
  }
}

class RowReader {
  constructor(
    private readonly cells: string[],
    private readonly header: string[],
    private readonly rowNumber: number
  ) {}

  text(column: Column): string {
    return this.cells[this.header.indexOf(column)]
  }

  identifier(column: Column): string {
    const raw = this.text(column)
    if (raw === '') {
      throw new ParseError(this.rowNumber, column, raw, 'a non-empty value')
    }
    return raw
  }

  number(column: Column): number {
    const raw = this.text(column)
    const value = Number(raw)
    if (raw === '' || !Number.isFinite(value)) {
      throw new ParseError(this.rowNumber, column, raw, 'a number')
    }
    return value
  }

  integer(column: Column): number {
    const raw = this.text(column)
    const value = Number(raw)
    if (raw === '' || !Number.isInteger(value)) {
      throw new ParseError(this.rowNumber, column, raw, 'an integer')
    }
    return value
  }

  date(column: Column): Date {
    const raw = this.text(column)
    const value = parseMonthDayYear(raw)
    if (!value) {
      throw new ParseError(this.rowNumber, column, raw, 'a date in MM-DD-YYYY format')
    }
    return value
  }
}

/**
 * Parse inventory CSV text into typed records
 *
 * The header must name every required column; extra columns are ignored.
 * Any malformed cell fails the whole table.
 */
export function parseInventoryCsv(text: string): InventoryTable {
  const rows = readRows(text)
  if (rows.length === 0) {
    throw new DataFormatError('CSV is empty: header row is missing')
  }

  const [header, ...body] = rows
  checkHeader(header)

  return body.map((cells, i): InventoryRecord => {
    const row = new RowReader(cells, header, i + 1)
    return {
      key: row.identifier('key'),
      keyName: row.text('key_name'),
      currentMonth: row.integer('current_month'),
      beginInventory: row.number('montly_begin_inventory'),
      lastInventory: row.number('last_inventory'),
      statusDate: row.date('status_date'),
      currentStatusInventory: row.number('current_status_inventory'),
      sales: row.number('sales'),
    }
  })
}

// ============================================
// LOADER
// ============================================

export function assertSourceConfig(config: SourceConfig): void {
  const fields: Array<keyof SourceConfig> = ['sourceEndpoint', 'containerName', 'blobName']
  for (const field of fields) {
    if (!config[field] || config[field].trim() === '') {
      throw new ConfigurationError(`Missing required source configuration: ${field}`)
    }
  }
}

/**
 * Fetches the configured blob and parses it
 * Nothing is cached: every call downloads and parses again
 */
export class InventoryLoader {
  constructor(
    private readonly source: BlobSource,
    private readonly config: SourceConfig
  ) {
    assertSourceConfig(config)
  }

  async load(): Promise<InventoryTable> {
    const { containerName, blobName } = this.config
    const bytes = await this.source.fetch(containerName, blobName)
    const table = parseInventoryCsv(bytes.toString('utf-8'))
    logger.debug({ containerName, blobName, rows: table.length }, 'Inventory table loaded')
    return table
  }
}
