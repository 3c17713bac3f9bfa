import { z } from 'zod'
import { parseDateBound, parseDateTimeBound } from './time'
import {
  DEFAULT_LIMITS,
  DEFAULT_SHUTDOWN_TIMEOUT_SECONDS,
  RECORD_TIMESTAMP_KEY,
  type BatchConnection,
  type BatchPipelineConfig,
  type FieldSpec,
  type GeneratorConfig,
  type PipelineLimits,
  type StreamingPipelineConfig,
} from './types'

const PIPELINE_NAME_PATTERN = /^[A-Za-z0-9_.-]+$/

const scalarSchema = z.union([z.string(), z.number(), z.boolean()])

const rawFieldSchema = z.object({
  name: z.string().min(1),
  data_type: z.enum(['category', 'float', 'integer', 'bool', 'date', 'datetime']),
  allowable_values: z.array(scalarSchema).optional(),
  proportion_nulls: z.number().min(0).max(1).default(0),
})

type RawField = z.output<typeof rawFieldSchema>

const numericPair = (values: RawField['allowable_values']): [number, number] | null => {
  if (values?.length !== 2) {
    return null
  }
  const [min, max] = values
  if (typeof min !== 'number' || typeof max !== 'number') {
    return null
  }
  if (!Number.isFinite(min) || !Number.isFinite(max) || min > max) {
    return null
  }
  return [min, max]
}

const temporalPair = (
  values: RawField['allowable_values'],
  parse: (value: string) => number | null
): [string, string] | null => {
  if (values?.length !== 2) {
    return null
  }
  const [min, max] = values
  if (typeof min !== 'string' || typeof max !== 'string') {
    return null
  }
  const minMs = parse(min)
  const maxMs = parse(max)
  if (minMs == null || maxMs == null || minMs > maxMs) {
    return null
  }
  return [min, max]
}

type FieldCheck = { spec: FieldSpec } | { issue: string; path: string }

const toFieldSpec = (raw: RawField): FieldCheck => {
  const base = { name: raw.name, proportionNulls: raw.proportion_nulls }
  const values = raw.allowable_values
  const invalid = (issue: string): FieldCheck => ({ issue, path: 'allowable_values' })

  switch (raw.data_type) {
    case 'category': {
      if (!values || values.length === 0) {
        return invalid('category fields need at least one allowable value')
      }
      return { spec: { ...base, dataType: 'category', allowableValues: values } }
    }
    case 'float': {
      const pair = numericPair(values)
      return pair
        ? { spec: { ...base, dataType: 'float', allowableValues: pair } }
        : invalid('float fields need [min, max] numbers with min <= max')
    }
    case 'integer': {
      const pair = numericPair(values)
      if (!pair || !Number.isInteger(pair[0]) || !Number.isInteger(pair[1])) {
        return invalid('integer fields need [min, max] integers with min <= max')
      }
      return { spec: { ...base, dataType: 'integer', allowableValues: pair } }
    }
    case 'bool': {
      if (values && values.length > 0) {
        return invalid('bool fields take no allowable values')
      }
      return { spec: { ...base, dataType: 'bool' } }
    }
    case 'date': {
      const pair = temporalPair(values, parseDateBound)
      return pair
        ? { spec: { ...base, dataType: 'date', allowableValues: pair } }
        : invalid('date fields need ["YYYY-MM-DD", "YYYY-MM-DD"] with min <= max')
    }
    case 'datetime': {
      const pair = temporalPair(values, parseDateTimeBound)
      return pair
        ? { spec: { ...base, dataType: 'datetime', allowableValues: pair } }
        : invalid('datetime fields need two ISO-like datetimes with min <= max')
    }
  }
}

/**
 * `data_description`: uniquely named fields whose allowable values match their data type.
 */
export const recordSchemaSchema = z
  .array(rawFieldSchema)
  .min(1)
  .superRefine((fields, ctx) => {
    const seen = new Set<string>()
    fields.forEach((field, index) => {
      if (field.name === RECORD_TIMESTAMP_KEY) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `"${RECORD_TIMESTAMP_KEY}" is reserved for the generation timestamp`,
          path: [index, 'name'],
        })
      } else if (seen.has(field.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `duplicate field name "${field.name}"`,
          path: [index, 'name'],
        })
      }
      seen.add(field.name)
    })
  })
  .transform((fields, ctx): FieldSpec[] => {
    const specs: FieldSpec[] = []
    fields.forEach((field, index) => {
      const checked = toFieldSpec(field)
      if ('issue' in checked) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: checked.issue,
          path: [index, checked.path],
        })
        return
      }
      specs.push(checked.spec)
    })
    return specs.length === fields.length ? specs : z.NEVER
  })

const pubsubConnectionSchema = z
  .object({
    service: z.literal('pubsub'),
    project_id: z.string().min(1),
    topic_id: z.string().min(1),
    credentials_path: z.string().min(1).optional(),
  })
  .transform((raw) => ({
    service: raw.service,
    projectId: raw.project_id,
    topicId: raw.topic_id,
    credentialsPath: raw.credentials_path,
  }))

const batchConnectionSchema = z
  .discriminatedUnion('service', [
    z.object({
      service: z.literal('google_cloud_storage'),
      project_id: z.string().min(1),
      bucket_name: z.string().min(1),
      folder_path: z.string().default(''),
      credentials_path: z.string().min(1).optional(),
    }),
    z.object({
      service: z.literal('local'),
      folder_path: z.string().min(1).default('./public'),
      port: z.coerce.number().int().min(0).max(65535).optional(),
    }),
  ])
  .transform((raw): BatchConnection => {
    if (raw.service === 'local') {
      return { service: 'local', folderPath: raw.folder_path, port: raw.port }
    }
    return {
      service: 'google_cloud_storage',
      projectId: raw.project_id,
      bucketName: raw.bucket_name,
      folderPath: raw.folder_path,
      credentialsPath: raw.credentials_path,
    }
  })

const pipelineShape = {
  name: z
    .string()
    .min(1)
    .regex(PIPELINE_NAME_PATTERN, 'pipeline names may only use letters, digits, "_", "-" and "."'),
  interval: z.number().positive(),
  size: z.number().int().min(1).default(1),
  randomise: z.boolean().default(false),
  seed: z.number().int().optional(),
  data_description: recordSchemaSchema,
}

export const streamingPipelineSchema = z
  .object({ ...pipelineShape, connection: pubsubConnectionSchema })
  .transform(
    (raw): StreamingPipelineConfig => ({
      kind: 'streaming',
      name: raw.name,
      interval: raw.interval,
      size: raw.size,
      randomise: raw.randomise,
      seed: raw.seed,
      schema: raw.data_description,
      connection: raw.connection,
    })
  )

export const batchPipelineSchema = z
  .object({
    ...pipelineShape,
    filetype: z.enum(['json', 'csv']),
    cleanup_after: z.number().min(0).default(0),
    connection: batchConnectionSchema,
  })
  .transform(
    (raw): BatchPipelineConfig => ({
      kind: 'batch',
      name: raw.name,
      interval: raw.interval,
      size: raw.size,
      randomise: raw.randomise,
      seed: raw.seed,
      schema: raw.data_description,
      filetype: raw.filetype,
      cleanupAfter: raw.cleanup_after,
      connection: raw.connection,
    })
  )

/**
 * Lists violations of the cross-pipeline invariants: unique names and the count ceilings.
 * @param streaming Streaming pipelines.
 * @param batch Batch pipelines.
 * @param limits Maximum pipeline counts.
 * @returns One message per violation; empty when the set is valid.
 */
export const findPipelineSetViolations = (
  streaming: readonly { name: string }[],
  batch: readonly { name: string }[],
  limits: PipelineLimits
): string[] => {
  const violations: string[] = []

  if (streaming.length > limits.maxStreaming) {
    violations.push(
      `streaming: ${streaming.length} pipelines configured, at most ${limits.maxStreaming} allowed`
    )
  }
  if (batch.length > limits.maxBatch) {
    violations.push(`batch: ${batch.length} pipelines configured, at most ${limits.maxBatch} allowed`)
  }

  const seen = new Set<string>()
  for (const { name } of [...streaming, ...batch]) {
    if (seen.has(name)) {
      violations.push(`duplicate pipeline name "${name}"`)
    }
    seen.add(name)
  }

  return violations
}

/**
 * Lists local connections that would start two artifact servers on the same port.
 * @param batch Batch pipelines.
 * @returns One message per clashing port.
 */
export const findPortConflicts = (batch: readonly BatchPipelineConfig[]): string[] => {
  const owners = new Map<number, string>()
  const conflicts: string[] = []
  for (const pipeline of batch) {
    const connection = pipeline.connection
    if (connection.service !== 'local' || connection.port == null || connection.port === 0) {
      continue
    }
    const owner = owners.get(connection.port)
    if (owner != null) {
      conflicts.push(`port ${connection.port} is served by both "${owner}" and "${pipeline.name}"`)
      continue
    }
    owners.set(connection.port, pipeline.name)
  }
  return conflicts
}

/**
 * Checks that a configured sweep cadence is no longer than any retention window.
 * @param sweepInterval Configured sweep interval in seconds, if any.
 * @param batch Batch pipelines.
 * @returns One message when the interval outlasts the smallest `cleanup_after`.
 */
export const findSweepIntervalViolations = (
  sweepInterval: number | undefined,
  batch: readonly { cleanupAfter?: number }[]
): string[] => {
  const windows = batch
    .map((pipeline) => pipeline.cleanupAfter ?? 0)
    .filter((cleanupAfter) => cleanupAfter > 0)
  if (sweepInterval == null || windows.length === 0) {
    return []
  }
  const smallest = Math.min(...windows)
  return sweepInterval > smallest
    ? [`${sweepInterval}s is longer than the smallest cleanup_after of ${smallest}s`]
    : []
}

/**
 * Root configuration file schema. Keys are snake_case on disk.
 */
export const generatorConfigSchema = z
  .object({
    version: z.union([z.string(), z.number()]).default('2.0'),
    limits: z
      .object({
        max_streaming: z.number().int().min(0).default(DEFAULT_LIMITS.maxStreaming),
        max_batch: z.number().int().min(0).default(DEFAULT_LIMITS.maxBatch),
      })
      .default({}),
    sweep_interval: z.number().positive().optional(),
    shutdown_timeout: z.number().positive().default(DEFAULT_SHUTDOWN_TIMEOUT_SECONDS),
    streaming: z.array(streamingPipelineSchema).default([]),
    batch: z.array(batchPipelineSchema).default([]),
  })
  .superRefine((raw, ctx) => {
    const limits = { maxStreaming: raw.limits.max_streaming, maxBatch: raw.limits.max_batch }
    for (const message of findPipelineSetViolations(raw.streaming, raw.batch, limits)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message })
    }
    for (const message of findPortConflicts(raw.batch)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message })
    }
    for (const message of findSweepIntervalViolations(raw.sweep_interval, raw.batch)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message, path: ['sweep_interval'] })
    }
  })
  .transform(
    (raw): GeneratorConfig => ({
      version: String(raw.version),
      limits: { maxStreaming: raw.limits.max_streaming, maxBatch: raw.limits.max_batch },
      sweepInterval: raw.sweep_interval,
      shutdownTimeout: raw.shutdown_timeout,
      streaming: raw.streaming,
      batch: raw.batch,
    })
  )

export type RawGeneratorConfig = z.input<typeof generatorConfigSchema>
