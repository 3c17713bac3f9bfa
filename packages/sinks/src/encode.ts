import type { BatchFileType, DataRecord, FieldValue } from '@datafaucet/pipeline-common'

export interface EncodedArtifact {
  body: string
  contentType: string
  extension: string
}

const CSV_NEEDS_QUOTES = /[",\r\n]/

const csvCell = (value: FieldValue | undefined): string => {
  if (value == null) {
    return ''
  }
  const text = String(value)
  return CSV_NEEDS_QUOTES.test(text) ? `"${text.replace(/"/g, '""')}"` : text
}

/**
 * Renders records as CSV: a header row of the first record's keys, CRLF line endings.
 */
export const encodeCsv = (records: readonly DataRecord[]): string => {
  if (records.length === 0) {
    return ''
  }
  const columns = Object.keys(records[0])
  const rows = [
    columns.map(csvCell).join(','),
    ...records.map((record) => columns.map((column) => csvCell(record[column])).join(',')),
  ]
  return `${rows.join('\r\n')}\r\n`
}

export const encodeJson = (records: readonly DataRecord[]): string =>
  `${JSON.stringify(records, null, 2)}\n`

/**
 * Encodes one batch in the pipeline's file type.
 */
export const encodeArtifact = (
  filetype: BatchFileType,
  records: readonly DataRecord[]
): EncodedArtifact => {
  switch (filetype) {
    case 'json':
      return { body: encodeJson(records), contentType: 'application/json', extension: 'json' }
    case 'csv':
      return { body: encodeCsv(records), contentType: 'text/csv', extension: 'csv' }
  }
}
