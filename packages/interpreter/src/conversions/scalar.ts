import { Decimal } from "decimal.js"
import { DateTime } from "luxon"
import { UnsupportedConversionError } from "../errors.js"
import { DEFAULT_COMPARISON_OPTIONS } from "../options.js"
import { SqlBaseType } from "../types.js"
import type { SqlType } from "../types.js"

const DECIMAL_TEXT = /^[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i
// Luxon fills a missing date from the clock, so a year must lead
const DATED_TEXT = /^\d{4}(-|$)/

function fromFiniteNumber(value: number, from: SqlType): Decimal {
  if (!Number.isFinite(value)) {
    throw new UnsupportedConversionError(from, SqlBaseType.DECIMAL, value)
  }
  return new Decimal(value)
}

function fromDecimalText(text: string, from: SqlType): Decimal {
  const trimmed = text.trim()
  if (!DECIMAL_TEXT.test(trimmed)) {
    throw new UnsupportedConversionError(from, SqlBaseType.DECIMAL, text)
  }
  try {
    return new Decimal(trimmed)
  } catch (error) {
    throw new UnsupportedConversionError(from, SqlBaseType.DECIMAL, text, {
      cause: error,
    })
  }
}

/**
 * Coerces a decimal, double, integer, bigint or decimal text into a
 * `Decimal`. Numbers are taken at their shortest round-trip value, so the
 * double `0.1` becomes exactly `0.1`.
 */
export function toDecimal(value: unknown, from: SqlType): Decimal {
  if (Decimal.isDecimal(value)) {
    if (!value.isFinite()) {
      throw new UnsupportedConversionError(from, SqlBaseType.DECIMAL, value)
    }
    return value
  }
  if (typeof value === `number`) {
    return fromFiniteNumber(value, from)
  }
  if (typeof value === `bigint`) {
    return new Decimal(value.toString())
  }
  if (typeof value === `string`) {
    return fromDecimalText(value, from)
  }
  throw new UnsupportedConversionError(from, SqlBaseType.DECIMAL, value)
}

export interface TimestampConversionOptions {
  timeZone?: string
}

/**
 * Parses timestamp text. ISO-8601 forms are tried first, including partial
 * ones such as `2024-03` or `2024-03-01T10:15`, then the SQL form
 * `2024-03-01 10:15:00`. Text without an offset is read in `timeZone`;
 * text without a leading year, such as `10:15`, is rejected.
 */
export function parseTimestamp(
  text: string,
  timeZone: string = DEFAULT_COMPARISON_OPTIONS.timeZone
): Date | undefined {
  const trimmed = text.trim()
  if (!DATED_TEXT.test(trimmed)) {
    return undefined
  }
  let parsed = DateTime.fromISO(trimmed, { zone: timeZone })
  if (!parsed.isValid) {
    parsed = DateTime.fromSQL(trimmed, { zone: timeZone })
  }
  return parsed.isValid ? parsed.toJSDate() : undefined
}

export function toTimestamp(
  value: unknown,
  from: SqlType,
  options: TimestampConversionOptions = {}
): Date {
  if (value instanceof Date) {
    if (Number.isNaN(value.getTime())) {
      throw new UnsupportedConversionError(from, SqlBaseType.TIMESTAMP, value)
    }
    return value
  }
  if (typeof value === `string`) {
    const parsed = parseTimestamp(value, options.timeZone)
    if (parsed === undefined) {
      throw new UnsupportedConversionError(from, SqlBaseType.TIMESTAMP, value)
    }
    return parsed
  }
  throw new UnsupportedConversionError(from, SqlBaseType.TIMESTAMP, value)
}
