import { createLogger, type Clock, type LogLevel, type Logger } from '@datafaucet/common'
import {
  DEFAULT_LIMITS,
  type BatchPipelineConfig,
  type DataRecord,
  type GeneratorConfig,
  type Schema,
  type StreamingPipelineConfig,
} from '@datafaucet/pipeline-common'
import type { BatchDelivery, BatchSink, SinkFactory, StreamSink } from '@datafaucet/sinks'

/**
 * Hook run inside every fake sink call; throw to fail it, await to slow it down.
 * @param call Zero-based call number.
 */
export type SinkBehaviour = (call: number) => Promise<void> | void

export interface RecordedDelivery {
  pipelineName: string
  records: readonly DataRecord[]
  startedAt: number
}

abstract class FakeSinkBase {
  readonly deliveries: RecordedDelivery[] = []
  deliverBehaviour: SinkBehaviour = () => undefined
  closeBehaviour: SinkBehaviour = () => undefined
  opened = false
  closed = false
  maxInFlight = 0
  private inFlight = 0
  private calls = 0
  protected readonly clock: Clock

  constructor(clock: Clock) {
    this.clock = clock
  }

  async open(): Promise<void> {
    this.opened = true
  }

  async close(): Promise<void> {
    this.closed = true
    await this.closeBehaviour(0)
  }

  protected async record(pipelineName: string, records: readonly DataRecord[]): Promise<void> {
    const startedAt = this.clock.now()
    const call = this.calls
    this.calls += 1
    this.inFlight += 1
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight)
    try {
      await this.deliverBehaviour(call)
      this.deliveries.push({ pipelineName, records, startedAt })
    } finally {
      this.inFlight -= 1
    }
  }
}

export class FakeStreamSink extends FakeSinkBase implements StreamSink {
  readonly kind = 'stream'

  async deliver(pipelineName: string, records: readonly DataRecord[]): Promise<void> {
    await this.record(pipelineName, records)
  }
}

export class FakeBatchSink extends FakeSinkBase implements BatchSink {
  readonly kind = 'batch'
  readonly stored = new Set<string>()
  readonly deleteAttempts: string[] = []
  deleteBehaviour: SinkBehaviour = () => undefined
  private deleteCalls = 0

  async deliver({ pipelineName, artifactId, records }: BatchDelivery): Promise<string> {
    await this.record(pipelineName, records)
    const location = `memory://${artifactId}`
    this.stored.add(location)
    return location
  }

  async delete(location: string): Promise<void> {
    const call = this.deleteCalls
    this.deleteCalls += 1
    this.deleteAttempts.push(location)
    await this.deleteBehaviour(call)
    this.stored.delete(location)
  }
}

export interface FakeSinks {
  factory: SinkFactory
  streams: Map<string, FakeStreamSink>
  batches: Map<string, FakeBatchSink>
}

export const createFakeSinks = (clock: Clock): FakeSinks => {
  const streams = new Map<string, FakeStreamSink>()
  const batches = new Map<string, FakeBatchSink>()
  return {
    streams,
    batches,
    factory: {
      createStreamSink: (pipeline) => {
        const sink = new FakeStreamSink(clock)
        streams.set(pipeline.name, sink)
        return sink
      },
      createBatchSink: (pipeline) => {
        const sink = new FakeBatchSink(clock)
        batches.set(pipeline.name, sink)
        return sink
      },
    },
  }
}

export const testSchema: Schema = [
  { name: 'sensor', dataType: 'category', allowableValues: ['a', 'b'], proportionNulls: 0 },
  { name: 'reading', dataType: 'integer', allowableValues: [0, 9], proportionNulls: 0 },
]

export const streamingPipeline = (
  name: string,
  interval: number,
  size = 1
): StreamingPipelineConfig => ({
  kind: 'streaming',
  name,
  interval,
  size,
  randomise: false,
  seed: 1,
  schema: testSchema,
  connection: { service: 'pubsub', projectId: 'test-project', topicId: `${name}-topic` },
})

export const batchPipeline = (
  name: string,
  interval: number,
  cleanupAfter: number,
  size = 1
): BatchPipelineConfig => ({
  kind: 'batch',
  name,
  interval,
  size,
  randomise: false,
  seed: 1,
  schema: testSchema,
  filetype: 'json',
  cleanupAfter,
  connection: { service: 'local', folderPath: './public' },
})

export const generatorConfig = (overrides: Partial<GeneratorConfig> = {}): GeneratorConfig => ({
  version: '2.0',
  limits: DEFAULT_LIMITS,
  shutdownTimeout: 10,
  streaming: [],
  batch: [],
  ...overrides,
})

export interface CapturedLogger {
  logger: Logger
  lines: string[]
}

/**
 * Logger writing uncolored lines into an array, stamped with the test clock.
 */
export const captureLogger = (clock: Clock, level: LogLevel = 'info'): CapturedLogger => {
  const lines: string[] = []
  const logger = createLogger('test', {
    level,
    colors: false,
    now: () => clock.now(),
    writer: (line) => {
      lines.push(line)
    },
  })
  return { logger, lines }
}
