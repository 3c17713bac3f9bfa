import { SynthesisError } from '@datafaucet/common'
import {
  MS_PER_DAY,
  RECORD_TIMESTAMP_KEY,
  formatDate,
  formatTimestamp,
  parseDateBound,
  parseDateTimeBound,
  type DataRecord,
  type FieldSpec,
  type FieldValue,
  type Schema,
} from '@datafaucet/pipeline-common'
import { createRng, randomInt, type Rng } from './rng'

export interface GenerateOptions {
  rng?: Rng
  /** Epoch milliseconds stamped on each record. */
  now?: () => number
}

const requireBound = (field: FieldSpec, bound: string, parsed: number | null): number => {
  if (parsed == null) {
    throw new SynthesisError(`Field "${field.name}" has an unparsable bound "${bound}"`)
  }
  return parsed
}

const drawValue = (field: FieldSpec, rng: Rng): FieldValue => {
  switch (field.dataType) {
    case 'category': {
      const values = field.allowableValues
      if (values.length === 0) {
        throw new SynthesisError(`Field "${field.name}" has no allowable values`)
      }
      return values[randomInt(rng, 0, values.length - 1)]
    }
    case 'float': {
      const [min, max] = field.allowableValues
      return min + rng() * (max - min)
    }
    case 'integer': {
      const [min, max] = field.allowableValues
      return randomInt(rng, min, max)
    }
    case 'bool':
      return rng() < 0.5
    case 'date': {
      const [minText, maxText] = field.allowableValues
      const min = requireBound(field, minText, parseDateBound(minText))
      const max = requireBound(field, maxText, parseDateBound(maxText))
      const days = Math.round((max - min) / MS_PER_DAY)
      return formatDate(min + randomInt(rng, 0, days) * MS_PER_DAY)
    }
    case 'datetime': {
      const [minText, maxText] = field.allowableValues
      const min = requireBound(field, minText, parseDateTimeBound(minText))
      const max = requireBound(field, maxText, parseDateTimeBound(maxText))
      return formatTimestamp(randomInt(rng, min, max))
    }
  }
}

const generateRecord = (schema: Schema, rng: Rng, timestamp: number): DataRecord => {
  const record: Record<string, FieldValue> = {
    [RECORD_TIMESTAMP_KEY]: formatTimestamp(timestamp),
  }
  for (const field of schema) {
    record[field.name] = rng() < field.proportionNulls ? null : drawValue(field, rng)
  }
  return Object.freeze(record)
}

/**
 * Generates `count` records for a schema.
 *
 * Every record carries its own generation timestamp under `timestamp`, followed
 * by each schema field in schema order. Records come back in generation order.
 * @param schema Validated field specifications.
 * @param count Number of records; 0 yields an empty batch.
 * @param options Random source and timestamp clock, mainly for tests.
 * @returns Frozen records.
 * @throws SynthesisError when a field specification cannot be sampled.
 */
export const generateRecords = (
  schema: Schema,
  count: number,
  options: GenerateOptions = {}
): DataRecord[] => {
  if (!Number.isInteger(count) || count < 0) {
    throw new SynthesisError(`Record count must be a non-negative integer, got ${count}`)
  }
  const rng = options.rng ?? createRng()
  const now = options.now ?? Date.now

  const records: DataRecord[] = []
  for (let index = 0; index < count; index += 1) {
    records.push(generateRecord(schema, rng, now()))
  }
  return records
}
