export * from './types'
export {
  batchPipelineSchema,
  findPipelineSetViolations,
  findPortConflicts,
  findSweepIntervalViolations,
  generatorConfigSchema,
  recordSchemaSchema,
  streamingPipelineSchema,
  type RawGeneratorConfig,
} from './config-schema'
export { loadGeneratorConfig, parseGeneratorConfig } from './config-loader'
export { MetricsCollector, formatMetrics, type PipelineMetrics } from './metrics'
export {
  MS_PER_DAY,
  formatArtifactStamp,
  formatDate,
  formatTimestamp,
  parseDateBound,
  parseDateTimeBound,
} from './time'
