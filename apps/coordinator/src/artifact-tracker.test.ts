import { describe, expect, it } from 'vitest'
import { ArtifactTracker } from './artifact-tracker'

const artifact = (pipelineName: string, location: string, createdAt: number) => ({
  id: location,
  pipelineName,
  location,
  createdAt,
})

describe('ArtifactTracker', () => {
  it('keeps artifacts per pipeline in registration order', () => {
    const tracker = new ArtifactTracker()
    tracker.register(artifact('batch_1', 'a', 0))
    tracker.register(artifact('batch_2', 'b', 5))
    tracker.register(artifact('batch_1', 'c', 10))

    expect(tracker.list('batch_1').map((entry) => entry.location)).toEqual(['a', 'c'])
    expect(tracker.count('batch_2')).toBe(1)
    expect(tracker.list('unknown')).toEqual([])
  })

  it('treats artifacts aged exactly the retention window as expired', () => {
    const tracker = new ArtifactTracker()
    tracker.register(artifact('batch_1', 'a', 1000))
    tracker.register(artifact('batch_1', 'b', 2000))

    expect(tracker.expired('batch_1', 3000, 3999)).toEqual([])
    expect(tracker.expired('batch_1', 3000, 4000).map((entry) => entry.location)).toEqual(['a'])
    expect(tracker.expired('batch_1', 3000, 5000).map((entry) => entry.location)).toEqual(['a', 'b'])
  })

  it('removes artifacts by location', () => {
    const tracker = new ArtifactTracker()
    tracker.register(artifact('batch_1', 'a', 0))

    expect(tracker.remove('batch_1', 'missing')).toBe(false)
    expect(tracker.remove('batch_2', 'a')).toBe(false)
    expect(tracker.remove('batch_1', 'a')).toBe(true)
    expect(tracker.count('batch_1')).toBe(0)
  })

  it('hands out snapshots that do not alias internal state', () => {
    const tracker = new ArtifactTracker()
    tracker.register(artifact('batch_1', 'a', 0))

    const snapshot = tracker.list('batch_1')
    tracker.remove('batch_1', 'a')

    expect(snapshot).toHaveLength(1)
  })
})
