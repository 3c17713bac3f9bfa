import { setTimeout as delay } from 'node:timers/promises'

/**
 * Time source and cancellable wait used by every scheduling loop.
 */
export interface Clock {
  /** Milliseconds since the epoch. */
  now(): number
  /**
   * Resolves after `ms` milliseconds. Rejects with an `AbortError` as soon as
   * `signal` fires, including when it has already fired.
   */
  sleep(ms: number, signal?: AbortSignal): Promise<void>
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: async (ms, signal) => {
    await delay(Math.max(0, ms), undefined, { signal })
  },
}

/**
 * Creates the error a cancelled sleep rejects with.
 * @param signal Signal whose reason, if any, is attached as the cause.
 */
export const createAbortError = (signal?: AbortSignal): Error => {
  const error = new Error('The operation was aborted', { cause: signal?.reason })
  error.name = 'AbortError'
  return error
}

/**
 * Checks whether a rejection came from a cancelled wait.
 * @param error Value caught from an awaited call.
 */
export const isAbortError = (error: unknown): boolean =>
  error instanceof Error && error.name === 'AbortError'

/**
 * Sleeps until `ms` elapses or `signal` fires, whichever comes first.
 * @returns `true` when the full wait elapsed, `false` when cancelled.
 * @throws Anything other than an abort raised by the clock.
 */
export const sleepUnlessAborted = async (
  clock: Clock,
  ms: number,
  signal: AbortSignal
): Promise<boolean> => {
  if (signal.aborted) {
    return false
  }
  try {
    await clock.sleep(ms, signal)
    return true
  } catch (error) {
    if (isAbortError(error)) {
      return false
    }
    throw error
  }
}
