import { describe, expect, it } from 'vitest'
import { AzureBlobSource } from '../blob.source'
import { SourceUnavailableError } from '../stats.errors'

describe('AzureBlobSource', () => {
  it('reports an unusable connection string as an unavailable source', async () => {
    const source = new AzureBlobSource({ connectionString: 'not-a-connection-string', timeoutMs: 100 })

    const attempt = source.fetch('datasets', 'inventory.csv')

    await expect(attempt).rejects.toBeInstanceOf(SourceUnavailableError)
    await expect(attempt).rejects.toThrow(/^Failed to download blob datasets\/inventory\.csv: /)
  })
})
