/**
 * Field data types a schema can describe.
 */
export type DataType = 'category' | 'float' | 'integer' | 'bool' | 'date' | 'datetime'

export type CategoryValue = string | number | boolean

interface FieldSpecBase {
  name: string
  /** Probability in [0, 1] that the field is emitted as null. */
  proportionNulls: number
}

export interface CategoryFieldSpec extends FieldSpecBase {
  dataType: 'category'
  allowableValues: readonly CategoryValue[]
}

export interface FloatFieldSpec extends FieldSpecBase {
  dataType: 'float'
  allowableValues: readonly [number, number]
}

export interface IntegerFieldSpec extends FieldSpecBase {
  dataType: 'integer'
  allowableValues: readonly [number, number]
}

export interface BoolFieldSpec extends FieldSpecBase {
  dataType: 'bool'
}

/** Bounds are `YYYY-MM-DD` strings. */
export interface DateFieldSpec extends FieldSpecBase {
  dataType: 'date'
  allowableValues: readonly [string, string]
}

/** Bounds are ISO-like strings; a missing offset means UTC. */
export interface DateTimeFieldSpec extends FieldSpecBase {
  dataType: 'datetime'
  allowableValues: readonly [string, string]
}

export type FieldSpec =
  | CategoryFieldSpec
  | FloatFieldSpec
  | IntegerFieldSpec
  | BoolFieldSpec
  | DateFieldSpec
  | DateTimeFieldSpec

/**
 * Ordered, uniquely named field specifications describing one record shape.
 */
export type Schema = readonly FieldSpec[]

export type FieldValue = string | number | boolean | null

/**
 * One generated record: the reserved timestamp key first, then every schema
 * field in schema order.
 */
export type DataRecord = Readonly<Record<string, FieldValue>>

/** Reserved record key holding the generation timestamp. */
export const RECORD_TIMESTAMP_KEY = 'timestamp'

export interface PubSubConnection {
  service: 'pubsub'
  projectId: string
  topicId: string
  credentialsPath?: string
}

export interface GoogleCloudStorageConnection {
  service: 'google_cloud_storage'
  projectId: string
  bucketName: string
  folderPath: string
  credentialsPath?: string
}

export interface LocalConnection {
  service: 'local'
  folderPath: string
  /** Serves `folderPath` over HTTP when set. */
  port?: number
}

export type StreamConnection = PubSubConnection
export type BatchConnection = GoogleCloudStorageConnection | LocalConnection

export type BatchFileType = 'json' | 'csv'

interface PipelineConfigBase {
  name: string
  /** Seconds between ticks. */
  interval: number
  /** Records per tick. */
  size: number
  /** Reserved; records are always emitted in insertion order. */
  randomise: boolean
  /** Optional RNG seed for reproducible output. */
  seed?: number
  schema: Schema
}

export interface StreamingPipelineConfig extends PipelineConfigBase {
  kind: 'streaming'
  connection: StreamConnection
}

export interface BatchPipelineConfig extends PipelineConfigBase {
  kind: 'batch'
  filetype: BatchFileType
  /** Seconds an artifact lives before the sweeper deletes it; 0 disables cleanup. */
  cleanupAfter: number
  connection: BatchConnection
}

export type PipelineConfig = StreamingPipelineConfig | BatchPipelineConfig

export interface PipelineLimits {
  maxStreaming: number
  maxBatch: number
}

/**
 * Fully validated configuration handed to the coordinator.
 */
export interface GeneratorConfig {
  version: string
  limits: PipelineLimits
  /** Seconds between retention sweeps; derived from cleanup windows when absent. */
  sweepInterval?: number
  /** Seconds to wait for execution contexts during shutdown. */
  shutdownTimeout: number
  streaming: StreamingPipelineConfig[]
  batch: BatchPipelineConfig[]
}

export const DEFAULT_LIMITS: PipelineLimits = {
  maxStreaming: 5,
  maxBatch: 5,
}

export const DEFAULT_SHUTDOWN_TIMEOUT_SECONDS = 10
