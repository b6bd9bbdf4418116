import { Decimal } from "decimal.js"
import { UnsupportedConversionError } from "../errors.js"
import { SqlBaseType } from "../types.js"
import type { SqlType } from "../types.js"

const INTEGER_TEXT = /^[+-]?\d+$/
const NUMBER_TEXT = /^[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i

const INT64_MIN = -(2n ** 63n)
const INT64_MAX = 2n ** 63n - 1n
const INT32_MIN = -(2 ** 31)
const INT32_MAX = 2 ** 31 - 1

export function toDouble(value: unknown, from: SqlType): number {
  if (typeof value === `number`) {
    return value
  }
  if (typeof value === `bigint`) {
    return Number(value)
  }
  if (Decimal.isDecimal(value)) {
    return value.toNumber()
  }
  if (typeof value === `string`) {
    const trimmed = value.trim()
    if (NUMBER_TEXT.test(trimmed)) {
      return Number(trimmed)
    }
  }
  throw new UnsupportedConversionError(from, SqlBaseType.DOUBLE, value)
}

function truncateDecimal(
  value: Decimal,
  from: SqlType,
  to: SqlBaseType
): bigint {
  if (!value.isFinite()) {
    throw new UnsupportedConversionError(from, to, value)
  }
  return BigInt(value.trunc().toFixed())
}

/**
 * 64-bit integer coercion. Fractional values are truncated toward zero.
 */
export function toLong(value: unknown, from: SqlType): bigint {
  if (typeof value === `bigint`) {
    return value
  }
  if (typeof value === `number`) {
    if (!Number.isFinite(value)) {
      throw new UnsupportedConversionError(from, SqlBaseType.BIGINT, value)
    }
    return BigInt(Math.trunc(value))
  }
  if (Decimal.isDecimal(value)) {
    return truncateDecimal(value, from, SqlBaseType.BIGINT)
  }
  if (typeof value === `string`) {
    const trimmed = value.trim()
    if (INTEGER_TEXT.test(trimmed)) {
      const parsed = BigInt(trimmed)
      if (parsed >= INT64_MIN && parsed <= INT64_MAX) {
        return parsed
      }
    }
  }
  throw new UnsupportedConversionError(from, SqlBaseType.BIGINT, value)
}

/**
 * 32-bit integer coercion. Numeric values are truncated toward zero and
 * wrapped into the 32-bit range; text must name an in-range integer.
 */
export function toInteger(value: unknown, from: SqlType): number {
  if (typeof value === `number`) {
    if (!Number.isFinite(value)) {
      throw new UnsupportedConversionError(from, SqlBaseType.INTEGER, value)
    }
    return Math.trunc(value) | 0
  }
  if (typeof value === `bigint`) {
    return Number(BigInt.asIntN(32, value))
  }
  if (Decimal.isDecimal(value)) {
    return Number(
      BigInt.asIntN(32, truncateDecimal(value, from, SqlBaseType.INTEGER))
    )
  }
  if (typeof value === `string`) {
    const trimmed = value.trim()
    if (INTEGER_TEXT.test(trimmed)) {
      const parsed = Number(trimmed)
      if (parsed >= INT32_MIN && parsed <= INT32_MAX) {
        return parsed
      }
    }
  }
  throw new UnsupportedConversionError(from, SqlBaseType.INTEGER, value)
}
