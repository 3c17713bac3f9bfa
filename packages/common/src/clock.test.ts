import { describe, expect, it } from 'vitest'
import { isAbortError, sleepUnlessAborted } from './clock'
import { ManualClock } from './manual-clock'

describe('ManualClock', () => {
  it('fires sleeps in due order as time advances', async () => {
    const clock = new ManualClock(1000)
    const fired: string[] = []

    void clock.sleep(300).then(() => fired.push(`b@${clock.now()}`))
    void clock.sleep(100).then(() => fired.push(`a@${clock.now()}`))

    await clock.advance(200)
    expect(fired).toEqual(['a@1100'])
    expect(clock.now()).toBe(1200)

    await clock.advance(200)
    expect(fired).toEqual(['a@1100', 'b@1300'])
    expect(clock.pendingTimers).toBe(0)
  })

  it('rejects pending sleeps when the signal aborts', async () => {
    const clock = new ManualClock()
    const controller = new AbortController()
    const pending = clock.sleep(5000, controller.signal)

    controller.abort()

    await expect(pending).rejects.toSatisfy(isAbortError)
    expect(clock.pendingTimers).toBe(0)
  })
})

describe('sleepUnlessAborted', () => {
  it('reports whether the wait ran to completion', async () => {
    const clock = new ManualClock()
    const controller = new AbortController()

    const completed = sleepUnlessAborted(clock, 50, controller.signal)
    await clock.advance(50)
    await expect(completed).resolves.toBe(true)

    const cancelled = sleepUnlessAborted(clock, 50, controller.signal)
    controller.abort()
    await expect(cancelled).resolves.toBe(false)
  })
})
