import type { DataRecord } from '@datafaucet/pipeline-common'

interface SinkLifecycle {
  /** Connects, creates folders or starts servers. Called once before the first delivery. */
  open(): Promise<void>
  /** Releases clients and servers. Called once after the last delivery. */
  close(): Promise<void>
}

/**
 * Message bus destination for streaming pipelines. One call publishes the whole batch.
 */
export interface StreamSink extends SinkLifecycle {
  readonly kind: 'stream'
  /**
   * @throws SinkDeliveryError when the batch was not accepted.
   */
  deliver(pipelineName: string, records: readonly DataRecord[]): Promise<void>
}

export interface BatchDelivery {
  pipelineName: string
  artifactId: string
  records: readonly DataRecord[]
}

/**
 * Artifact destination for batch pipelines.
 */
export interface BatchSink extends SinkLifecycle {
  readonly kind: 'batch'
  /**
   * Writes one artifact holding the whole batch.
   * @returns The artifact location, later handed back to `delete`.
   * @throws SinkDeliveryError when nothing usable was written.
   */
  deliver(delivery: BatchDelivery): Promise<string>
  /**
   * Removes an artifact. Deleting an absent artifact succeeds.
   * @throws SinkDeleteError when the artifact may still exist.
   */
  delete(location: string): Promise<void>
}

export type Sink = StreamSink | BatchSink
