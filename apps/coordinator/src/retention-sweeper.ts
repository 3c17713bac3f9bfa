import {
  describeError,
  sleepUnlessAborted,
  type Clock,
  type Logger,
} from '@datafaucet/common'
import { formatTimestamp } from '@datafaucet/pipeline-common'
import type { BatchSink } from '@datafaucet/sinks'
import type { ArtifactLedger } from './artifact-tracker'

export const DEFAULT_SWEEP_INTERVAL_MS = 5000

/**
 * One batch pipeline whose artifacts expire.
 */
export interface RetentionTarget {
  pipelineName: string
  retentionMs: number
  sink: Pick<BatchSink, 'delete'>
}

export interface RetentionSweeperOptions {
  targets: RetentionTarget[]
  ledger: ArtifactLedger
  clock: Clock
  logger: Logger
  /** Defaults to the shorter of 5s and the smallest retention window. */
  intervalMs?: number
}

export interface SweeperStats {
  sweeps: number
  deleted: number
  deleteFailures: number
}

/**
 * Picks a sweep cadence no longer than any retention window.
 * @param retentionWindowsMs Retention windows of every target; non-positive entries are ignored.
 */
export const resolveSweepInterval = (retentionWindowsMs: number[]): number =>
  Math.min(DEFAULT_SWEEP_INTERVAL_MS, ...retentionWindowsMs.filter((windowMs) => windowMs > 0))

/**
 * Deletes expired batch artifacts on its own timer.
 *
 * Each pipeline is swept independently: a pipeline whose previous sweep is
 * still waiting on its sink is skipped instead of delaying the others. An
 * artifact leaves the ledger only after its sink confirmed the delete, so a
 * failed delete is retried on the next sweep.
 */
export class RetentionSweeper {
  private readonly targets: RetentionTarget[]
  private readonly ledger: ArtifactLedger
  private readonly clock: Clock
  private readonly logger: Logger
  private readonly intervalMs: number
  private readonly inFlight = new Map<string, Promise<void>>()
  private readonly stats: SweeperStats = { sweeps: 0, deleted: 0, deleteFailures: 0 }

  constructor(options: RetentionSweeperOptions) {
    this.targets = options.targets.filter((target) => target.retentionMs > 0)
    this.ledger = options.ledger
    this.clock = options.clock
    this.logger = options.logger
    this.intervalMs =
      options.intervalMs ?? resolveSweepInterval(this.targets.map((target) => target.retentionMs))
  }

  get sweepIntervalMs(): number {
    return this.intervalMs
  }

  getStats(): SweeperStats {
    return { ...this.stats }
  }

  /**
   * Sweeps every interval until `signal` fires, then waits for sweeps still in flight.
   */
  async run(signal: AbortSignal): Promise<void> {
    if (this.targets.length === 0) {
      return
    }

    let next = this.clock.now()
    for (;;) {
      const now = this.clock.now()
      if (next - now > 0 && !(await sleepUnlessAborted(this.clock, next - now, signal))) {
        break
      }
      if (signal.aborted) {
        break
      }
      void this.sweep()
      next = Math.max(next + this.intervalMs, this.clock.now())
    }

    await Promise.all(this.inFlight.values())
  }

  /**
   * Starts one sweep of every pipeline not already being swept.
   * @returns Resolves when the sweeps started here have finished; never rejects.
   */
  sweep(): Promise<void> {
    const now = this.clock.now()
    this.stats.sweeps += 1
    const started: Promise<void>[] = []

    for (const target of this.targets) {
      if (this.inFlight.has(target.pipelineName)) {
        this.logger.debug('Previous sweep still running; skipping', {
          pipeline: target.pipelineName,
        })
        continue
      }
      const sweep = this.sweepPipeline(target, now).finally(() => {
        this.inFlight.delete(target.pipelineName)
      })
      this.inFlight.set(target.pipelineName, sweep)
      started.push(sweep)
    }

    return Promise.all(started).then(() => undefined)
  }

  private async sweepPipeline(target: RetentionTarget, now: number): Promise<void> {
    for (const artifact of this.ledger.expired(target.pipelineName, target.retentionMs, now)) {
      try {
        await target.sink.delete(artifact.location)
      } catch (error) {
        this.stats.deleteFailures += 1
        this.logger.error('Failed to delete expired artifact; retrying next sweep', {
          pipeline: target.pipelineName,
          sweep: formatTimestamp(now),
          location: artifact.location,
          error: describeError(error),
        })
        continue
      }
      this.ledger.remove(target.pipelineName, artifact.location)
      this.stats.deleted += 1
      this.logger.info('Deleted expired artifact', {
        pipeline: target.pipelineName,
        location: artifact.location,
        ageMs: now - artifact.createdAt,
      })
    }
  }
}
