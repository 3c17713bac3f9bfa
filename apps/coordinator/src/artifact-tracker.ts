/**
 * One live batch artifact.
 */
export interface TrackedArtifact {
  id: string
  pipelineName: string
  /** Sink-specific handle passed back to `delete`. */
  location: string
  /** Epoch milliseconds when the artifact was registered. */
  createdAt: number
}

/**
 * What a pipeline unit may do with the tracker.
 */
export interface ArtifactRegistrar {
  register(artifact: TrackedArtifact): void
}

/**
 * What the retention sweeper may do with the tracker.
 */
export interface ArtifactLedger {
  expired(pipelineName: string, retentionMs: number, nowMs: number): TrackedArtifact[]
  remove(pipelineName: string, location: string): boolean
}

/**
 * Authoritative list of live artifacts per batch pipeline.
 *
 * Owned by the coordinator. Every method is synchronous, so registrations and
 * removals from concurrent pipeline ticks and sweeps apply one at a time.
 */
export class ArtifactTracker implements ArtifactRegistrar, ArtifactLedger {
  private readonly artifacts = new Map<string, TrackedArtifact[]>()

  register(artifact: TrackedArtifact): void {
    const list = this.artifacts.get(artifact.pipelineName)
    if (list) {
      list.push(artifact)
      return
    }
    this.artifacts.set(artifact.pipelineName, [artifact])
  }

  /**
   * Lists artifacts whose age has reached the retention window.
   * @param pipelineName Batch pipeline name.
   * @param retentionMs Retention window; artifacts aged exactly this long are expired.
   * @param nowMs Sweep time.
   * @returns Expired artifacts, oldest first.
   */
  expired(pipelineName: string, retentionMs: number, nowMs: number): TrackedArtifact[] {
    return this.list(pipelineName).filter((artifact) => nowMs - artifact.createdAt >= retentionMs)
  }

  /**
   * Drops an artifact once its sink confirmed the delete.
   * @returns `false` when the artifact was not tracked.
   */
  remove(pipelineName: string, location: string): boolean {
    const list = this.artifacts.get(pipelineName)
    if (!list) {
      return false
    }
    const index = list.findIndex((artifact) => artifact.location === location)
    if (index === -1) {
      return false
    }
    list.splice(index, 1)
    return true
  }

  /**
   * Snapshot of one pipeline's live artifacts in registration order.
   */
  list(pipelineName: string): TrackedArtifact[] {
    return [...(this.artifacts.get(pipelineName) ?? [])]
  }

  count(pipelineName: string): number {
    return this.artifacts.get(pipelineName)?.length ?? 0
  }
}
