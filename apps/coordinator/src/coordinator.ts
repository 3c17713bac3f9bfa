import {
  ConfigError,
  ShutdownTimeoutError,
  describeError,
  silentLogger,
  sleepUnlessAborted,
  systemClock,
  type Clock,
  type Logger,
} from '@datafaucet/common'
import {
  findPipelineSetViolations,
  findPortConflicts,
  findSweepIntervalViolations,
  type GeneratorConfig,
  type PipelineConfig,
  type PipelineMetrics,
} from '@datafaucet/pipeline-common'
import type { Rng } from '@datafaucet/record-synth'
import { createSinkFactory, type Sink, type SinkFactory } from '@datafaucet/sinks'
import { ArtifactTracker, type TrackedArtifact } from './artifact-tracker'
import { PipelineState, PipelineUnit, type PipelineBinding } from './pipeline-unit'
import { RetentionSweeper, type RetentionTarget } from './retention-sweeper'

export interface CoordinatorOptions {
  clock?: Clock
  logger?: Logger
  /** Defaults to the sinks chosen by each pipeline's connection. */
  sinkFactory?: SinkFactory
  /** Random source per pipeline; defaults to one seeded from the pipeline's `seed`. */
  createRng?: (pipeline: PipelineConfig) => Rng
}

export interface PipelineStatus {
  name: string
  kind: 'streaming' | 'batch'
  state: PipelineState
  metrics: PipelineMetrics
  /** Live artifacts; always 0 for streaming pipelines. */
  artifacts: number
  lastError: string | null
}

export interface CoordinatorHandle {
  /**
   * Stops every pipeline and the sweeper, then closes the sinks. Both steps
   * share one deadline of `timeoutMs` (default: the configured shutdown
   * timeout); whatever is still running at the deadline is abandoned.
   * Repeated calls share the first call's shutdown.
   */
  stop(timeoutMs?: number): Promise<void>
  status(): PipelineStatus[]
  artifacts(pipelineName: string): TrackedArtifact[]
  /** Resolves once every pipeline has stopped. */
  readonly done: Promise<void>
}

const bindPipelines = (config: GeneratorConfig, factory: SinkFactory): PipelineBinding[] => [
  ...config.streaming.map(
    (pipeline): PipelineBinding => ({
      kind: 'streaming',
      pipeline,
      sink: factory.createStreamSink(pipeline),
    })
  ),
  ...config.batch.map(
    (pipeline): PipelineBinding => ({
      kind: 'batch',
      pipeline,
      sink: factory.createBatchSink(pipeline),
    })
  ),
]

const closeSinks = async (
  sinks: Sink[],
  logger: Logger,
  onClosed: (sink: Sink) => void = () => undefined
): Promise<void> => {
  await Promise.all(
    sinks.map(async (sink) => {
      try {
        await sink.close()
      } catch (error) {
        logger.warn('Failed to close sink', { error: describeError(error) })
      } finally {
        onClosed(sink)
      }
    })
  )
}

const openSinks = async (bindings: PipelineBinding[], logger: Logger): Promise<void> => {
  const opened: Sink[] = []
  for (const { pipeline, sink } of bindings) {
    try {
      await sink.open()
    } catch (error) {
      await closeSinks(opened, logger)
      throw new ConfigError(`Unable to open sink for pipeline "${pipeline.name}"`, [], {
        cause: error,
      })
    }
    opened.push(sink)
  }
}

/**
 * Validates the pipeline set, opens every sink and starts one execution unit
 * per pipeline plus the retention sweeper.
 * @param config Validated configuration.
 * @param options Clock, logger and sink overrides.
 * @returns Handle controlling the running pipelines.
 * @throws ConfigError when the pipeline set breaks an invariant or a sink cannot open.
 */
export const startCoordinator = async (
  config: GeneratorConfig,
  options: CoordinatorOptions = {}
): Promise<CoordinatorHandle> => {
  const clock = options.clock ?? systemClock
  const logger = options.logger ?? silentLogger

  const violations = [
    ...findPipelineSetViolations(config.streaming, config.batch, config.limits),
    ...findPortConflicts(config.batch),
    ...findSweepIntervalViolations(config.sweepInterval, config.batch),
  ]
  if (violations.length > 0) {
    throw new ConfigError('Invalid pipeline set', violations)
  }

  const coordinatorLogger = logger.child('coordinator')
  const factory = options.sinkFactory ?? createSinkFactory(logger)
  const bindings = bindPipelines(config, factory)
  await openSinks(bindings, coordinatorLogger)

  const tracker = new ArtifactTracker()
  const units = bindings.map((binding) => {
    if (binding.pipeline.randomise) {
      coordinatorLogger.warn('randomise is not supported; records keep insertion order', {
        pipeline: binding.pipeline.name,
      })
    }
    return new PipelineUnit({
      binding,
      registrar: tracker,
      clock,
      logger: logger.child(`pipeline:${binding.pipeline.name}`),
      rng: options.createRng?.(binding.pipeline),
    })
  })

  const targets: RetentionTarget[] = config.batch.flatMap((pipeline) => {
    const binding = bindings.find((entry) => entry.pipeline.name === pipeline.name)
    if (binding?.kind !== 'batch' || pipeline.cleanupAfter <= 0) {
      return []
    }
    return [
      {
        pipelineName: pipeline.name,
        retentionMs: pipeline.cleanupAfter * 1000,
        sink: binding.sink,
      },
    ]
  })
  const sweeper = new RetentionSweeper({
    targets,
    ledger: tracker,
    clock,
    logger: logger.child('sweeper'),
    intervalMs: config.sweepInterval == null ? undefined : config.sweepInterval * 1000,
  })

  const controller = new AbortController()
  const pending = new Set<string>()
  const launch = (name: string, run: () => Promise<void>, onCrash: () => void): Promise<void> => {
    pending.add(name)
    return run()
      .catch((error: unknown) => {
        coordinatorLogger.error('Execution context crashed', {
          context: name,
          error: describeError(error),
        })
        onCrash()
      })
      .finally(() => {
        pending.delete(name)
      })
  }

  const unitRuns = units.map((unit) =>
    launch(unit.name, () => unit.run(controller.signal), () => unit.forceStop())
  )
  const sweeperRun = launch('sweeper', () => sweeper.run(controller.signal), () => undefined)
  const allFinished = Promise.all([...unitRuns, sweeperRun]).then(() => undefined)

  let markStopped: () => void = () => undefined
  const stopped = new Promise<void>((resolve) => {
    markStopped = resolve
  })
  const done = Promise.race([Promise.all(unitRuns).then(() => undefined), stopped])

  coordinatorLogger.info('Started pipelines', {
    streaming: config.streaming.length,
    batch: config.batch.length,
    sweepIntervalMs: targets.length > 0 ? sweeper.sweepIntervalMs : undefined,
  })

  const shutdown = async (timeoutMs: number): Promise<void> => {
    coordinatorLogger.info('Stopping pipelines', { timeoutMs })
    const deadline = clock.now() + timeoutMs
    controller.abort()

    const waitUntilDeadline = async (work: Promise<unknown>): Promise<boolean> => {
      const timer = new AbortController()
      const timedOut = await Promise.race([
        work.then(() => false),
        sleepUnlessAborted(clock, Math.max(0, deadline - clock.now()), timer.signal),
      ])
      timer.abort()
      return timedOut
    }

    if (await waitUntilDeadline(allFinished)) {
      const abandoned = [...pending]
      const error = new ShutdownTimeoutError(timeoutMs, abandoned)
      coordinatorLogger.warn(error.message, { pending: abandoned.join(',') })
      for (const unit of units) {
        unit.forceStop()
      }
    }

    const unclosed = new Map(
      bindings.map((binding): [Sink, string] => [binding.sink, binding.pipeline.name])
    )
    const closing = closeSinks([...unclosed.keys()], coordinatorLogger, (sink) => {
      unclosed.delete(sink)
    })
    if (await waitUntilDeadline(closing)) {
      const abandoned = [...unclosed.values()].map((name) => `sink:${name}`)
      const error = new ShutdownTimeoutError(timeoutMs, abandoned)
      coordinatorLogger.warn(error.message, { pending: abandoned.join(',') })
    }
    markStopped()
    coordinatorLogger.info('Stopped pipelines')
  }

  let stopping: Promise<void> | null = null

  return {
    stop: (timeoutMs = config.shutdownTimeout * 1000) => {
      if (stopping == null) {
        stopping = shutdown(timeoutMs)
      }
      return stopping
    },
    status: () =>
      units.map((unit) => ({
        name: unit.name,
        kind: unit.kind,
        state: unit.state,
        metrics: unit.getMetrics(),
        artifacts: tracker.count(unit.name),
        lastError: unit.lastError,
      })),
    artifacts: (pipelineName) => tracker.list(pipelineName),
    done,
  }
}
