import { mkdir, rename, rm, writeFile } from 'node:fs/promises'
import { join, resolve } from 'node:path'
import {
  SinkDeleteError,
  SinkDeliveryError,
  describeError,
  type Logger,
} from '@datafaucet/common'
import type { BatchFileType } from '@datafaucet/pipeline-common'
import { startArtifactServer, type ArtifactServerHandle } from './artifact-server'
import { encodeArtifact } from './encode'
import type { BatchDelivery, BatchSink } from './types'

export interface LocalDiskSinkOptions {
  folderPath: string
  filetype: BatchFileType
  /** Serves the folder over HTTP when set; 0 picks a free port. */
  port?: number
  host?: string
  logger: Logger
}

/**
 * Writes artifacts into a local folder. Each file appears atomically via rename.
 */
export class LocalDiskSink implements BatchSink {
  readonly kind = 'batch'
  private readonly folderPath: string
  private readonly filetype: BatchFileType
  private readonly port?: number
  private readonly host?: string
  private readonly logger: Logger
  private server: ArtifactServerHandle | null = null

  constructor(options: LocalDiskSinkOptions) {
    this.folderPath = resolve(options.folderPath)
    this.filetype = options.filetype
    this.port = options.port
    this.host = options.host
    this.logger = options.logger
  }

  /** Port of the artifact server, once started. */
  get serverPort(): number | null {
    return this.server?.port ?? null
  }

  async open(): Promise<void> {
    await mkdir(this.folderPath, { recursive: true })
    if (this.port != null && this.server == null) {
      this.server = await startArtifactServer({
        folderPath: this.folderPath,
        port: this.port,
        host: this.host,
        logger: this.logger,
      })
    }
  }

  async deliver({ pipelineName, artifactId, records }: BatchDelivery): Promise<string> {
    const artifact = encodeArtifact(this.filetype, records)
    const fileName = `${artifactId}.${artifact.extension}`
    const target = join(this.folderPath, fileName)
    const temp = join(this.folderPath, `.${fileName}.tmp`)

    try {
      await writeFile(temp, artifact.body, 'utf8')
      await rename(temp, target)
    } catch (error) {
      await rm(temp, { force: true }).catch((cleanupError: unknown) => {
        this.logger.warn('Failed to remove partial artifact', {
          path: temp,
          error: describeError(cleanupError),
        })
      })
      throw new SinkDeliveryError(pipelineName, `Failed to write artifact ${target}`, {
        cause: error,
      })
    }

    this.logger.debug('Wrote artifact', { pipeline: pipelineName, location: target, count: records.length })
    return target
  }

  async delete(location: string): Promise<void> {
    try {
      await rm(location, { force: true })
    } catch (error) {
      throw new SinkDeleteError(location, `Failed to delete ${location}`, { cause: error })
    }
  }

  async close(): Promise<void> {
    const server = this.server
    this.server = null
    if (server != null) {
      await server.stop()
    }
  }
}
