import { PubSub } from '@google-cloud/pubsub'
import { SinkDeliveryError, describeError, type Logger } from '@datafaucet/common'
import type { DataRecord, PubSubConnection } from '@datafaucet/pipeline-common'
import type { StreamSink } from './types'

/**
 * The slice of a message bus client the sink needs.
 */
export interface MessagePublisher {
  publish(data: Buffer, attributes: Record<string, string>): Promise<string>
  close(): Promise<void>
}

/**
 * Publishes to a Google Cloud Pub/Sub topic. Nothing connects until the first publish.
 */
export const createPubSubPublisher = (connection: PubSubConnection): MessagePublisher => {
  const pubsub = new PubSub({
    projectId: connection.projectId,
    keyFilename: connection.credentialsPath,
  })
  const topic = pubsub.topic(connection.topicId)

  return {
    publish: (data, attributes) => topic.publishMessage({ data, attributes }),
    close: () => pubsub.close(),
  }
}

export class MessageBusSink implements StreamSink {
  readonly kind = 'stream'
  private readonly publisher: MessagePublisher
  private readonly logger: Logger

  constructor(publisher: MessagePublisher, logger: Logger) {
    this.publisher = publisher
    this.logger = logger
  }

  async open(): Promise<void> {
    // Publisher connects lazily.
  }

  async deliver(pipelineName: string, records: readonly DataRecord[]): Promise<void> {
    const data = Buffer.from(JSON.stringify(records))
    const attributes = { pipeline: pipelineName, count: String(records.length) }
    let messageId: string
    try {
      messageId = await this.publisher.publish(data, attributes)
    } catch (error) {
      throw new SinkDeliveryError(
        pipelineName,
        `Failed to publish ${records.length} records`,
        { cause: error }
      )
    }
    this.logger.debug('Published batch', { pipeline: pipelineName, count: records.length, messageId })
  }

  async close(): Promise<void> {
    try {
      await this.publisher.close()
    } catch (error) {
      this.logger.warn('Failed to close publisher', { error: describeError(error) })
    }
  }
}
