import type { Logger } from '@datafaucet/common'
import type { BatchPipelineConfig, StreamingPipelineConfig } from '@datafaucet/pipeline-common'
import { LocalDiskSink } from './local-disk-sink'
import { MessageBusSink, createPubSubPublisher } from './message-bus-sink'
import { ObjectStoreSink, createGcsClient } from './object-store-sink'
import type { BatchSink, StreamSink } from './types'

/**
 * Builds the sink for each pipeline. The coordinator takes one of these so tests can pass fakes.
 */
export interface SinkFactory {
  createStreamSink(pipeline: StreamingPipelineConfig): StreamSink
  createBatchSink(pipeline: BatchPipelineConfig): BatchSink
}

/**
 * Picks the sink variant from each pipeline's `connection.service`.
 * @param logger Parent logger; every sink logs under `sink:<pipeline>`.
 */
export const createSinkFactory = (logger: Logger): SinkFactory => ({
  createStreamSink: (pipeline) => {
    const sinkLogger = logger.child(`sink:${pipeline.name}`)
    return new MessageBusSink(createPubSubPublisher(pipeline.connection), sinkLogger)
  },
  createBatchSink: (pipeline) => {
    const sinkLogger = logger.child(`sink:${pipeline.name}`)
    const connection = pipeline.connection
    switch (connection.service) {
      case 'local':
        return new LocalDiskSink({
          folderPath: connection.folderPath,
          filetype: pipeline.filetype,
          port: connection.port,
          logger: sinkLogger,
        })
      case 'google_cloud_storage':
        return new ObjectStoreSink({
          client: createGcsClient(connection),
          folderPath: connection.folderPath,
          filetype: pipeline.filetype,
          logger: sinkLogger,
        })
    }
  },
})
