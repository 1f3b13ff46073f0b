import { BlobServiceClient } from '@azure/storage-blob'
import { SourceUnavailableError } from './stats.errors'

/**
 * Read access to a blob store
 */
export interface BlobSource {
  fetch(container: string, name: string): Promise<Buffer>
}

export interface AzureBlobSourceOptions {
  connectionString: string
  timeoutMs: number
}

/**
 * Azure Blob Storage reader
 * Every SDK failure, including the download timeout, surfaces as SourceUnavailableError
 */
export class AzureBlobSource implements BlobSource {
  private readonly connectionString: string
  private readonly timeoutMs: number

  constructor(options: AzureBlobSourceOptions) {
    this.connectionString = options.connectionString
    this.timeoutMs = options.timeoutMs
  }

  async fetch(container: string, name: string): Promise<Buffer> {
    try {
      const service = BlobServiceClient.fromConnectionString(this.connectionString)
      const blob = service.getContainerClient(container).getBlobClient(name)
      return await blob.downloadToBuffer(0, undefined, {
        abortSignal: AbortSignal.timeout(this.timeoutMs),
      })
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error)
      throw new SourceUnavailableError(`Failed to download blob ${container}/${name}: ${reason}`, {
        cause: error,
      })
    }
  }
}
