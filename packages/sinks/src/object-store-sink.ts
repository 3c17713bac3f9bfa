import { Storage } from '@google-cloud/storage'
import {
  SinkDeleteError,
  SinkDeliveryError,
  type Logger,
} from '@datafaucet/common'
import type { BatchFileType, GoogleCloudStorageConnection } from '@datafaucet/pipeline-common'
import { encodeArtifact } from './encode'
import type { BatchDelivery, BatchSink } from './types'

/**
 * The slice of an object store client the sink needs.
 */
export interface ObjectStoreClient {
  readonly bucketName: string
  put(key: string, body: string, contentType: string): Promise<void>
  /** Succeeds when the object is already gone. */
  remove(key: string): Promise<void>
}

export const createGcsClient = (connection: GoogleCloudStorageConnection): ObjectStoreClient => {
  const storage = new Storage({
    projectId: connection.projectId,
    keyFilename: connection.credentialsPath,
  })
  const bucket = storage.bucket(connection.bucketName)

  return {
    bucketName: connection.bucketName,
    put: async (key, body, contentType) => {
      await bucket.file(key).save(body, { contentType, resumable: false })
    },
    remove: async (key) => {
      await bucket.file(key).delete({ ignoreNotFound: true })
    },
  }
}

export interface ObjectStoreSinkOptions {
  client: ObjectStoreClient
  folderPath: string
  filetype: BatchFileType
  logger: Logger
}

export class ObjectStoreSink implements BatchSink {
  readonly kind = 'batch'
  private readonly client: ObjectStoreClient
  private readonly prefix: string
  private readonly filetype: BatchFileType
  private readonly logger: Logger

  constructor(options: ObjectStoreSinkOptions) {
    this.client = options.client
    this.prefix = options.folderPath.replace(/^\/+|\/+$/g, '')
    this.filetype = options.filetype
    this.logger = options.logger
  }

  async open(): Promise<void> {
    // Client connects lazily.
  }

  async deliver({ pipelineName, artifactId, records }: BatchDelivery): Promise<string> {
    const artifact = encodeArtifact(this.filetype, records)
    const fileName = `${artifactId}.${artifact.extension}`
    const key = this.prefix ? `${this.prefix}/${fileName}` : fileName
    try {
      await this.client.put(key, artifact.body, artifact.contentType)
    } catch (error) {
      throw new SinkDeliveryError(pipelineName, `Failed to upload artifact ${key}`, { cause: error })
    }
    const location = `gs://${this.client.bucketName}/${key}`
    this.logger.debug('Uploaded artifact', { pipeline: pipelineName, location, count: records.length })
    return location
  }

  async delete(location: string): Promise<void> {
    const bucketPrefix = `gs://${this.client.bucketName}/`
    if (!location.startsWith(bucketPrefix)) {
      throw new SinkDeleteError(location, `Location is outside bucket ${this.client.bucketName}`)
    }
    try {
      await this.client.remove(location.slice(bucketPrefix.length))
    } catch (error) {
      throw new SinkDeleteError(location, `Failed to delete ${location}`, { cause: error })
    }
  }

  async close(): Promise<void> {
    // Storage holds no open connections.
  }
}
