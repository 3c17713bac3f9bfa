import { createAbortError, type Clock } from './clock'

interface PendingTimer {
  id: number
  dueAt: number
  resolve: () => void
  release: () => void
}

const settle = (): Promise<void> => new Promise((resolve) => setImmediate(resolve))

/**
 * Deterministic clock for tests. Time only moves when `advance` is called;
 * timers fire in due order and pending promise chains settle between them.
 */
export class ManualClock implements Clock {
  private current: number
  private timers: PendingTimer[] = []
  private nextId = 0

  constructor(startMs = 0) {
    this.current = startMs
  }

  now(): number {
    return this.current
  }

  sleep(ms: number, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) {
      return Promise.reject(createAbortError(signal))
    }

    return new Promise<void>((resolve, reject) => {
      const id = this.nextId
      this.nextId += 1

      const onAbort = (): void => {
        this.timers = this.timers.filter((timer) => timer.id !== id)
        reject(createAbortError(signal))
      }

      signal?.addEventListener('abort', onAbort, { once: true })
      this.timers.push({
        id,
        dueAt: this.current + Math.max(0, ms),
        resolve,
        release: () => signal?.removeEventListener('abort', onAbort),
      })
    })
  }

  /** Number of sleeps that have not fired or been cancelled yet. */
  get pendingTimers(): number {
    return this.timers.length
  }

  /**
   * Moves time forward, firing every timer due on the way.
   * @param ms Milliseconds to advance.
   */
  async advance(ms: number): Promise<void> {
    await this.advanceTo(this.current + ms)
  }

  /**
   * Moves time to an absolute instant, firing every timer due on the way.
   * @param targetMs Epoch milliseconds to stop at.
   */
  async advanceTo(targetMs: number): Promise<void> {
    await settle()

    for (;;) {
      const next = this.nextDue(targetMs)
      if (!next) {
        break
      }
      this.timers = this.timers.filter((timer) => timer.id !== next.id)
      this.current = Math.max(this.current, next.dueAt)
      next.release()
      next.resolve()
      await settle()
    }

    this.current = Math.max(this.current, targetMs)
    await settle()
  }

  private nextDue(targetMs: number): PendingTimer | undefined {
    let earliest: PendingTimer | undefined
    for (const timer of this.timers) {
      if (timer.dueAt > targetMs) {
        continue
      }
      if (!earliest || timer.dueAt < earliest.dueAt) {
        earliest = timer
      }
    }
    return earliest
  }
}
