export { ArtifactTracker, type ArtifactLedger, type ArtifactRegistrar, type TrackedArtifact } from './artifact-tracker'
export { PipelineState, PipelineUnit, type PipelineBinding, type PipelineUnitOptions } from './pipeline-unit'
export {
  DEFAULT_SWEEP_INTERVAL_MS,
  RetentionSweeper,
  resolveSweepInterval,
  type RetentionSweeperOptions,
  type RetentionTarget,
  type SweeperStats,
} from './retention-sweeper'
export {
  startCoordinator,
  type CoordinatorHandle,
  type CoordinatorOptions,
  type PipelineStatus,
} from './coordinator'
export { parseCoordinatorArgs, usage, type CoordinatorArgs } from './config'
export { formatSummary } from './summary'
