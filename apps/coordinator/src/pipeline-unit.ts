import {
  describeError,
  sleepUnlessAborted,
  type Clock,
  type Logger,
} from '@datafaucet/common'
import {
  MetricsCollector,
  formatArtifactStamp,
  formatTimestamp,
  type BatchPipelineConfig,
  type DataRecord,
  type PipelineMetrics,
  type StreamingPipelineConfig,
} from '@datafaucet/pipeline-common'
import { createRng, generateRecords, type Rng } from '@datafaucet/record-synth'
import type { BatchSink, StreamSink } from '@datafaucet/sinks'
import type { ArtifactRegistrar } from './artifact-tracker'

export enum PipelineState {
  Idle = 'idle',
  Ticking = 'ticking',
  Delivering = 'delivering',
  Failed = 'failed',
  Stopped = 'stopped',
}

/**
 * A pipeline paired with the sink variant its kind delivers to.
 */
export type PipelineBinding =
  | { kind: 'streaming'; pipeline: StreamingPipelineConfig; sink: StreamSink }
  | { kind: 'batch'; pipeline: BatchPipelineConfig; sink: BatchSink }

export interface PipelineUnitOptions {
  binding: PipelineBinding
  registrar: ArtifactRegistrar
  clock: Clock
  logger: Logger
  /** Defaults to a generator seeded from the pipeline's `seed`. */
  rng?: Rng
}

/**
 * Runs one pipeline: generate a batch, hand it to the sink, wait for the next slot.
 *
 * Ticks are scheduled at fixed absolute times (`previous start + interval`), so
 * slow or failed deliveries never shift later ticks. A tick that runs past its
 * successor's slot is followed immediately by the next one and counted as an
 * overrun. Only one tick is ever in flight.
 */
export class PipelineUnit {
  readonly name: string
  readonly kind: 'streaming' | 'batch'
  private readonly binding: PipelineBinding
  private readonly registrar: ArtifactRegistrar
  private readonly clock: Clock
  private readonly logger: Logger
  private readonly rng: Rng
  private readonly metrics: MetricsCollector
  private readonly intervalMs: number
  private currentState = PipelineState.Idle
  private lastErrorMessage: string | null = null

  constructor(options: PipelineUnitOptions) {
    const { pipeline } = options.binding
    this.name = pipeline.name
    this.kind = options.binding.kind
    this.binding = options.binding
    this.registrar = options.registrar
    this.clock = options.clock
    this.logger = options.logger
    this.rng = options.rng ?? createRng(pipeline.seed)
    this.metrics = new MetricsCollector(pipeline.name, () => this.clock.now())
    this.intervalMs = pipeline.interval * 1000
  }

  get state(): PipelineState {
    return this.currentState
  }

  get lastError(): string | null {
    return this.lastErrorMessage
  }

  getMetrics(): PipelineMetrics {
    return this.metrics.getMetrics()
  }

  /**
   * Ticks until `signal` fires, then settles in `Stopped`.
   * A delivery already handed to the sink is allowed to finish first.
   */
  async run(signal: AbortSignal): Promise<void> {
    let scheduledAt = this.clock.now()

    while (!signal.aborted && !this.isStopped()) {
      await this.tick(scheduledAt)
      if (signal.aborted || this.isStopped()) {
        break
      }

      let next = scheduledAt + this.intervalMs
      const now = this.clock.now()
      if (now > next) {
        this.metrics.recordOverrun()
        this.logger.warn('Tick overran its interval; next tick starts now', {
          pipeline: this.name,
          tick: formatTimestamp(scheduledAt),
          lateMs: now - next,
        })
        next = now
      }

      if (!(await sleepUnlessAborted(this.clock, next - now, signal))) {
        break
      }
      scheduledAt = next
    }

    this.transition(PipelineState.Stopped)
  }

  /**
   * Marks the unit stopped without waiting for it, e.g. after a shutdown timeout.
   */
  forceStop(): void {
    this.transition(PipelineState.Stopped)
  }

  private async tick(scheduledAt: number): Promise<void> {
    const { pipeline } = this.binding
    const startedAt = this.clock.now()
    this.metrics.recordTick()
    this.transition(PipelineState.Ticking)

    let records: DataRecord[]
    try {
      records = generateRecords(pipeline.schema, pipeline.size, {
        rng: this.rng,
        now: () => this.clock.now(),
      })
    } catch (error) {
      this.lastErrorMessage = describeError(error)
      this.logger.error('Record synthesis failed; stopping pipeline', {
        pipeline: this.name,
        tick: formatTimestamp(scheduledAt),
        error: this.lastErrorMessage,
      })
      this.transition(PipelineState.Stopped)
      return
    }

    this.transition(PipelineState.Delivering)
    try {
      await this.deliver(records, startedAt)
      this.lastErrorMessage = null
    } catch (error) {
      this.transition(PipelineState.Failed)
      this.lastErrorMessage = describeError(error)
      this.logger.error('Tick failed', {
        pipeline: this.name,
        tick: formatTimestamp(scheduledAt),
        error: this.lastErrorMessage,
      })
    }
    this.transition(PipelineState.Idle)
  }

  private async deliver(records: DataRecord[], startedAt: number): Promise<void> {
    const binding = this.binding
    switch (binding.kind) {
      case 'streaming': {
        await this.metrics.recordDelivery(records.length, () =>
          binding.sink.deliver(this.name, records)
        )
        return
      }
      case 'batch': {
        const artifactId = `${this.name}_${formatArtifactStamp(startedAt)}`
        const location = await this.metrics.recordDelivery(records.length, () =>
          binding.sink.deliver({ pipelineName: this.name, artifactId, records })
        )
        this.registrar.register({
          id: artifactId,
          pipelineName: this.name,
          location,
          createdAt: this.clock.now(),
        })
        this.logger.debug('Registered artifact', { pipeline: this.name, location })
      }
    }
  }

  private isStopped(): boolean {
    return this.currentState === PipelineState.Stopped
  }

  private transition(next: PipelineState): void {
    if (this.isStopped()) {
      return
    }
    this.currentState = next
  }
}
