import { ResultField } from './fieldTypes'
import { narrowBigInt } from './packet'
import { decodeString } from './stringParser'

export type ColumnValue = number | bigint | string | Buffer | Date | null

export type ParsedRowType = Record<string, ColumnValue>

// YYYY-MM-DD[ HH:MM:SS[.ffffff]]
const DATE_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})(?:[ T](\d{2}):(\d{2}):(\d{2})(?:\.(\d{1,6}))?)?$/

/**
 * Converts one text-protocol cell. Everything arrives as a string on the
 * wire; the column's value type decides what it becomes.
 */
export function convertTextValue(
  raw: Buffer | null,
  field: ResultField,
  encoding: string
): ColumnValue {
  if (raw === null) {
    return null
  }

  switch (field.valueType) {
    case 'null':
      return null
    case 'buffer':
      return raw
    case 'number':
      return Number(raw.toString('latin1'))
    case 'bigint':
      return parseBigInt(raw.toString('latin1'))
    case 'date':
      return parseDate(raw.toString('latin1'))
    case 'string':
      // numbers and dates are always ascii, whatever the session encoding
      return field.internalType === 'text' || field.internalType === 'json'
        ? decodeString(raw, encoding, 0, raw.length)
        : raw.toString('latin1')
  }
}

/** A number while it is exact, a bigint beyond that. */
function parseBigInt(text: string): number | bigint {
  return narrowBigInt(BigInt(text))
}

/** Dates and datetimes are read as UTC. Zero dates become null. */
export function parseDate(text: string): Date | null {
  const match = DATE_PATTERN.exec(text)
  if (!match) {
    return null
  }
  const [, year, month, day, hours, minutes, seconds, fraction] = match
  if (year === '0000' || month === '00' || day === '00') {
    return null
  }
  return new Date(
    Date.UTC(
      Number(year),
      Number(month) - 1,
      Number(day),
      Number(hours ?? 0),
      Number(minutes ?? 0),
      Number(seconds ?? 0),
      fraction ? Number(fraction.padEnd(3, '0').slice(0, 3)) : 0
    )
  )
}
