import type { InventoryRecord } from '../../../types/inventory-stats.types'
import type { BlobSource } from '../blob.source'
import { SourceUnavailableError } from '../stats.errors'

export const HEADER =
  'key,key_name,current_month,montly_begin_inventory,last_inventory,status_date,current_status_inventory,sales'

// Two items, four days each, deliberately out of date order and interleaved
export const SAMPLE_CSV = [
  HEADER,
  'y1sp001,Tinta XYZ,11,120,100,11-02-2025,91,300',
  'y1sp002,Tinta DEF,11,250,210,11-01-2025,201,49',
  'y1sp001,Tinta XYZ,11,120,100,11-01-2025,94,600',
  'y1sp001,Tinta XYZ,11,120,100,11-04-2025,78,300',
  'y1sp002,Tinta DEF,11,250,210,11-02-2025,101,100',
  'y1sp002,Tinta DEF,11,250,210,11-03-2025,92,9',
  'y1sp001,Tinta XYZ,11,120,100,11-03-2025,81,1000',
  'y1sp002,Tinta DEF,11,250,210,11-04-2025,91,1',
].join('\n')

export const SOURCE_CONFIG = {
  sourceEndpoint: 'UseDevelopmentStorage=true',
  containerName: 'datasets',
  blobName: 'inventory.csv',
}

/**
 * In-process stand-in for the blob store
 */
export class MemoryBlobSource implements BlobSource {
  fetchCount = 0

  constructor(private readonly blobs: Record<string, string>) {}

  async fetch(container: string, name: string): Promise<Buffer> {
    this.fetchCount++
    const text = this.blobs[`${container}/${name}`]
    if (text === undefined) {
      throw new SourceUnavailableError(`Blob ${container}/${name} not found`)
    }
    return Buffer.from(text, 'utf-8')
  }
}

export function record(overrides: Partial<InventoryRecord> & { key: string; day: number }): InventoryRecord {
  const { day, ...rest } = overrides
  return {
    keyName: `Item ${overrides.key}`,
    currentMonth: 11,
    beginInventory: 100,
    lastInventory: 100,
    statusDate: new Date(Date.UTC(2025, 10, day)),
    currentStatusInventory: 100,
    sales: 0,
    ...rest,
  }
}
