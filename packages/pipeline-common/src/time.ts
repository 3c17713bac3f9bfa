const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/
const DATETIME_PATTERN =
  /^(\d{4}-\d{2}-\d{2})[ T](\d{2}:\d{2}(?::\d{2}(?:\.\d{1,9})?)?)(Z|[+-]\d{2}:?\d{2})?$/

export const MS_PER_DAY = 86_400_000

/**
 * Parses a `YYYY-MM-DD` bound into UTC midnight epoch milliseconds.
 * @returns The instant, or `null` when the value is not a real calendar day.
 */
export const parseDateBound = (value: string): number | null => {
  if (!DATE_PATTERN.test(value)) {
    return null
  }
  const parsed = Date.parse(`${value}T00:00:00Z`)
  if (Number.isNaN(parsed)) {
    return null
  }
  // Rejects days that Date rolls over, e.g. 2023-02-30.
  return new Date(parsed).toISOString().slice(0, 10) === value ? parsed : null
}

const normalizeOffset = (offset: string | undefined): string => {
  if (offset == null) {
    return 'Z'
  }
  if (/^[+-]\d{4}$/.test(offset)) {
    return `${offset.slice(0, 3)}:${offset.slice(3)}`
  }
  return offset
}

/**
 * Parses an ISO-like datetime bound (`YYYY-MM-DD HH:MM:SS`, `T` separator,
 * optional fraction and offset). A missing offset is read as UTC.
 * @returns Epoch milliseconds, or `null` when unparsable.
 */
export const parseDateTimeBound = (value: string): number | null => {
  const match = DATETIME_PATTERN.exec(value.trim())
  if (!match) {
    return null
  }
  const [, day, time, offset] = match
  if (parseDateBound(day) == null) {
    return null
  }
  const fraction = time.includes('.') ? time.replace(/(\.\d{3})\d+$/, '$1') : time
  const parsed = Date.parse(`${day}T${fraction}${normalizeOffset(offset)}`)
  return Number.isNaN(parsed) ? null : parsed
}

/**
 * Formats a record generation timestamp: ISO 8601 with milliseconds and an explicit UTC offset.
 * @param epochMs Epoch milliseconds.
 * @returns e.g. `2024-05-01T12:00:00.123+00:00`.
 */
export const formatTimestamp = (epochMs: number): string =>
  new Date(epochMs).toISOString().replace('Z', '+00:00')

/**
 * Formats an instant for use inside artifact names (no separators that file systems dislike).
 * @param epochMs Epoch milliseconds.
 * @returns e.g. `20240501T120000123Z`.
 */
export const formatArtifactStamp = (epochMs: number): string =>
  new Date(epochMs).toISOString().replace(/[-:.]/g, '')

/**
 * Formats UTC midnight epoch milliseconds as `YYYY-MM-DD`.
 */
export const formatDate = (epochMs: number): string => new Date(epochMs).toISOString().slice(0, 10)
