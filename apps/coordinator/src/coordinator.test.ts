import { describe, expect, it } from 'vitest'
import { ConfigError, ManualClock } from '@datafaucet/common'
import type { BatchSink, SinkFactory } from '@datafaucet/sinks'
import { startCoordinator } from './coordinator'
import { PipelineState } from './pipeline-unit'
import {
  FakeStreamSink,
  batchPipeline,
  captureLogger,
  createFakeSinks,
  generatorConfig,
  streamingPipeline,
} from './testing'

describe('startCoordinator', () => {
  it('runs streaming and batch pipelines side by side with retention', async () => {
    const clock = new ManualClock()
    const sinks = createFakeSinks(clock)
    const config = generatorConfig({
      streaming: [streamingPipeline('streaming_1', 1), streamingPipeline('streaming_2', 10)],
      batch: [batchPipeline('batch_1', 60, 60), batchPipeline('batch_2', 30, 60)],
    })

    const handle = await startCoordinator(config, {
      clock,
      logger: captureLogger(clock).logger,
      sinkFactory: sinks.factory,
    })
    await clock.advanceTo(64_999)

    expect(sinks.streams.get('streaming_1')?.deliveries).toHaveLength(65)
    expect(sinks.streams.get('streaming_2')?.deliveries).toHaveLength(7)
    expect(handle.artifacts('batch_1').map((artifact) => artifact.createdAt)).toEqual([60_000])
    expect(handle.artifacts('batch_2').map((artifact) => artifact.createdAt)).toEqual([
      30_000, 60_000,
    ])
    expect(sinks.batches.get('batch_2')?.deleteAttempts).toEqual([
      'memory://batch_2_19700101T000000000Z',
    ])

    await handle.stop()

    expect(handle.status().map((status) => status.state)).toEqual([
      PipelineState.Stopped,
      PipelineState.Stopped,
      PipelineState.Stopped,
      PipelineState.Stopped,
    ])
    expect([...sinks.streams.values(), ...sinks.batches.values()].every((sink) => sink.closed)).toBe(
      true
    )
    await handle.done
    expect(clock.pendingTimers).toBe(0)
  })

  it('keeps failures inside the pipeline that raised them', async () => {
    const clock = new ManualClock()
    const sinks = createFakeSinks(clock)
    const config = generatorConfig({
      streaming: [streamingPipeline('flaky', 1), streamingPipeline('steady', 1)],
    })
    const handle = await startCoordinator(config, {
      clock,
      logger: captureLogger(clock).logger,
      sinkFactory: sinks.factory,
    })
    const flaky = sinks.streams.get('flaky')
    if (!flaky) {
      throw new Error('flaky sink was not created')
    }
    flaky.deliverBehaviour = () => {
      throw new Error('bus down')
    }

    await clock.advanceTo(2999)

    const [flakyStatus, steadyStatus] = handle.status()
    expect(flakyStatus.metrics).toMatchObject({ ticks: 3, failures: 2, deliveries: 1 })
    expect(flakyStatus.lastError).toBe('bus down')
    expect(steadyStatus.metrics).toMatchObject({ ticks: 3, failures: 0, deliveries: 3 })
    expect(steadyStatus.lastError).toBeNull()

    await handle.stop()
  })

  it('abandons a hung sink call once the shutdown timeout passes', async () => {
    const clock = new ManualClock()
    const sinks = createFakeSinks(clock)
    const { logger, lines } = captureLogger(clock)
    const config = generatorConfig({ streaming: [streamingPipeline('s1', 1)] })
    const hung = new FakeStreamSink(clock)
    hung.deliverBehaviour = () => new Promise<void>(() => undefined)
    const factory: SinkFactory = { ...sinks.factory, createStreamSink: () => hung }

    const handle = await startCoordinator(config, { clock, logger, sinkFactory: factory })
    await clock.advance(0)

    const stopping = handle.stop(2000)
    await clock.advance(2000)
    await stopping

    expect(handle.status()[0].state).toBe(PipelineState.Stopped)
    expect(lines).toContain(
      '[1970-01-01T00:00:02.000Z] WARN  [coordinator] Shutdown timed out after 2000ms; abandoning: s1 pending=s1'
    )
    expect(hung.closed).toBe(true)
    await handle.done
  })

  it('abandons a sink that never closes once the shutdown timeout passes', async () => {
    const clock = new ManualClock()
    const sinks = createFakeSinks(clock)
    const { logger, lines } = captureLogger(clock)
    const config = generatorConfig({ streaming: [streamingPipeline('s1', 1)] })
    const hung = new FakeStreamSink(clock)
    hung.deliverBehaviour = () => new Promise<void>(() => undefined)
    hung.closeBehaviour = () => new Promise<void>(() => undefined)
    const factory: SinkFactory = { ...sinks.factory, createStreamSink: () => hung }

    const handle = await startCoordinator(config, { clock, logger, sinkFactory: factory })
    await clock.advance(0)

    let settled = false
    const stopping = handle.stop(2000).then(() => {
      settled = true
    })
    await clock.advance(2000)

    expect(settled).toBe(true)
    expect(lines).toContain(
      '[1970-01-01T00:00:02.000Z] WARN  [coordinator] Shutdown timed out after 2000ms; abandoning: sink:s1 pending=sink:s1'
    )
    await stopping
    await handle.done
    expect(clock.pendingTimers).toBe(0)
  })

  it('shares one shutdown between repeated stop calls', async () => {
    const clock = new ManualClock()
    const sinks = createFakeSinks(clock)
    const handle = await startCoordinator(
      generatorConfig({ streaming: [streamingPipeline('s1', 1)] }),
      { clock, logger: captureLogger(clock).logger, sinkFactory: sinks.factory }
    )

    const first = handle.stop()
    const second = handle.stop(1)

    expect(second).toBe(first)
    await first
  })

  it('rejects a pipeline set over the configured ceiling before opening sinks', async () => {
    const clock = new ManualClock()
    const sinks = createFakeSinks(clock)
    const config = generatorConfig({
      limits: { maxStreaming: 5, maxBatch: 1 },
      batch: [batchPipeline('batch_1', 30, 0), batchPipeline('batch_2', 30, 0)],
    })

    const start = startCoordinator(config, { clock, sinkFactory: sinks.factory })

    await expect(start).rejects.toBeInstanceOf(ConfigError)
    await expect(start).rejects.toMatchObject({
      issues: ['batch: 2 pipelines configured, at most 1 allowed'],
    })
    expect(sinks.batches.size).toBe(0)
  })

  it('rejects a sweep interval that outlasts a retention window', async () => {
    const clock = new ManualClock()
    const sinks = createFakeSinks(clock)
    const config = generatorConfig({
      sweepInterval: 120,
      batch: [batchPipeline('batch_1', 30, 60)],
    })

    const start = startCoordinator(config, { clock, sinkFactory: sinks.factory })

    await expect(start).rejects.toMatchObject({
      issues: ['120s is longer than the smallest cleanup_after of 60s'],
    })
    expect(sinks.batches.size).toBe(0)
  })

  it('closes opened sinks when another sink cannot open', async () => {
    const clock = new ManualClock()
    const sinks = createFakeSinks(clock)
    const broken: BatchSink = {
      kind: 'batch',
      open: async () => {
        throw new Error('folder is read-only')
      },
      close: async () => undefined,
      deliver: async () => 'never',
      delete: async () => undefined,
    }
    const factory: SinkFactory = { ...sinks.factory, createBatchSink: () => broken }
    const config = generatorConfig({
      streaming: [streamingPipeline('s1', 1)],
      batch: [batchPipeline('batch_1', 30, 0)],
    })

    await expect(startCoordinator(config, { clock, sinkFactory: factory })).rejects.toThrow(
      'Unable to open sink for pipeline "batch_1"'
    )
    expect(sinks.streams.get('s1')?.closed).toBe(true)
  })

  it('warns that randomise is ignored', async () => {
    const clock = new ManualClock()
    const sinks = createFakeSinks(clock)
    const { logger, lines } = captureLogger(clock)
    const config = generatorConfig({
      streaming: [{ ...streamingPipeline('s1', 1), randomise: true }],
    })

    const handle = await startCoordinator(config, { clock, logger, sinkFactory: sinks.factory })
    await handle.stop()

    expect(lines).toContain(
      '[1970-01-01T00:00:00.000Z] WARN  [coordinator] randomise is not supported; records keep insertion order pipeline=s1'
    )
  })
})
