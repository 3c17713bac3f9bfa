import { describe, expect, it } from 'vitest'
import { ManualClock } from '@datafaucet/common'
import { ArtifactTracker } from './artifact-tracker'
import { RetentionSweeper, resolveSweepInterval } from './retention-sweeper'
import { FakeBatchSink, captureLogger } from './testing'

const track = (tracker: ArtifactTracker, pipelineName: string, location: string, createdAt: number) =>
  tracker.register({ id: location, pipelineName, location, createdAt })

describe('RetentionSweeper', () => {
  it('keeps an artifact until its age reaches the retention window', async () => {
    const clock = new ManualClock()
    const sink = new FakeBatchSink(clock)
    const tracker = new ArtifactTracker()
    track(tracker, 'batch_1', 'memory://a', 1000)
    const sweeper = new RetentionSweeper({
      targets: [{ pipelineName: 'batch_1', retentionMs: 3000, sink }],
      ledger: tracker,
      clock,
      logger: captureLogger(clock).logger,
    })

    await clock.advanceTo(3999)
    await sweeper.sweep()
    expect(tracker.count('batch_1')).toBe(1)

    await clock.advanceTo(4000)
    await sweeper.sweep()
    expect(tracker.count('batch_1')).toBe(0)
    expect(sink.deleteAttempts).toEqual(['memory://a'])
  })

  it('keeps tracking an artifact whose delete failed and retries it next sweep', async () => {
    const clock = new ManualClock(4000)
    const sink = new FakeBatchSink(clock)
    sink.deleteBehaviour = (call) => {
      if (call === 0) {
        throw new Error('permission denied')
      }
    }
    const tracker = new ArtifactTracker()
    track(tracker, 'batch_1', 'memory://a', 0)
    const { logger, lines } = captureLogger(clock)
    const sweeper = new RetentionSweeper({
      targets: [{ pipelineName: 'batch_1', retentionMs: 1000, sink }],
      ledger: tracker,
      clock,
      logger: logger.child('sweeper'),
    })

    await sweeper.sweep()
    expect(tracker.count('batch_1')).toBe(1)
    expect(lines[0]).toBe(
      '[1970-01-01T00:00:04.000Z] ERROR [sweeper] Failed to delete expired artifact; retrying next sweep pipeline=batch_1 sweep=1970-01-01T00:00:04.000+00:00 location=memory://a error="permission denied"'
    )

    await sweeper.sweep()
    expect(tracker.count('batch_1')).toBe(0)
    expect(sweeper.getStats()).toEqual({ sweeps: 2, deleted: 1, deleteFailures: 1 })
  })

  it('does not let a slow pipeline hold up the others', async () => {
    const clock = new ManualClock(5000)
    const slowSink = new FakeBatchSink(clock)
    slowSink.deleteBehaviour = () => clock.sleep(10_000)
    const fastSink = new FakeBatchSink(clock)
    const tracker = new ArtifactTracker()
    track(tracker, 'slow', 'memory://slow', 0)
    track(tracker, 'fast', 'memory://fast', 0)
    const sweeper = new RetentionSweeper({
      targets: [
        { pipelineName: 'slow', retentionMs: 1000, sink: slowSink },
        { pipelineName: 'fast', retentionMs: 1000, sink: fastSink },
      ],
      ledger: tracker,
      clock,
      logger: captureLogger(clock).logger,
    })

    const first = sweeper.sweep()
    await clock.advance(0)
    expect(tracker.count('fast')).toBe(0)
    expect(tracker.count('slow')).toBe(1)

    await sweeper.sweep()
    expect(slowSink.deleteAttempts).toEqual(['memory://slow'])

    await clock.advanceTo(15_000)
    await first
    expect(tracker.count('slow')).toBe(0)
  })

  it('sweeps on its own timer until cancelled', async () => {
    const clock = new ManualClock()
    const sink = new FakeBatchSink(clock)
    const tracker = new ArtifactTracker()
    track(tracker, 'batch_1', 'memory://a', 0)
    const sweeper = new RetentionSweeper({
      targets: [{ pipelineName: 'batch_1', retentionMs: 2000, sink }],
      ledger: tracker,
      clock,
      logger: captureLogger(clock).logger,
    })
    const controller = new AbortController()

    expect(sweeper.sweepIntervalMs).toBe(2000)
    const running = sweeper.run(controller.signal)

    await clock.advanceTo(1999)
    expect(tracker.count('batch_1')).toBe(1)
    await clock.advanceTo(2000)
    expect(tracker.count('batch_1')).toBe(0)

    controller.abort()
    await running
    expect(clock.pendingTimers).toBe(0)
  })

  it('ignores pipelines with cleanup disabled', async () => {
    const clock = new ManualClock(10_000)
    const sink = new FakeBatchSink(clock)
    const tracker = new ArtifactTracker()
    track(tracker, 'batch_1', 'memory://a', 0)
    const sweeper = new RetentionSweeper({
      targets: [{ pipelineName: 'batch_1', retentionMs: 0, sink }],
      ledger: tracker,
      clock,
      logger: captureLogger(clock).logger,
    })

    await sweeper.run(new AbortController().signal)
    await sweeper.sweep()

    expect(tracker.count('batch_1')).toBe(1)
    expect(sink.deleteAttempts).toEqual([])
  })
})

describe('resolveSweepInterval', () => {
  it('never exceeds the smallest retention window', () => {
    expect(resolveSweepInterval([60_000, 3000])).toBe(3000)
    expect(resolveSweepInterval([60_000])).toBe(5000)
    expect(resolveSweepInterval([0])).toBe(5000)
    expect(resolveSweepInterval([])).toBe(5000)
  })
})
