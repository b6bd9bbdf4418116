import { toDouble, toInteger, toLong } from "../conversions/number.js"
import { toDecimal, toTimestamp } from "../conversions/scalar.js"
import { DEFAULT_COMPARISON_OPTIONS } from "../options.js"
import { SqlBaseType } from "../types.js"
import {
  compareDecimals,
  compareDoubles,
  compareNatural,
  compareTimestamps,
} from "../utils/comparison.js"
import { deepEquals } from "../utils/equality.js"
import { formatValue } from "../utils/format.js"
import type { Conversion } from "../conversions/types.js"
import type { ComparisonOptions } from "../options.js"
import type {
  ComparisonFunction,
  EqualsFunction,
} from "../terms/comparison-term.js"
import type { EvaluationContext, SqlType } from "../types.js"
import type { Term } from "../terms/term.js"

/**
 * Representation both operands are converted to before they are ordered.
 */
export type ComparisonFamily =
  | `decimal`
  | `timestamp`
  | `string`
  | `double`
  | `long`
  | `integer`

function either(left: SqlType, right: SqlType, baseType: SqlBaseType) {
  return left.baseType === baseType || right.baseType === baseType
}

/**
 * First match wins: decimal, timestamp, string, double, bigint, integer.
 *
 * Only the left operand decides the string family, so `STRING < INTEGER`
 * orders text while `INTEGER < STRING` parses the right side as an integer.
 */
export function selectComparisonFamily(
  leftType: SqlType,
  rightType: SqlType
): ComparisonFamily | undefined {
  if (either(leftType, rightType, SqlBaseType.DECIMAL)) return `decimal`
  if (either(leftType, rightType, SqlBaseType.TIMESTAMP)) return `timestamp`
  if (leftType.baseType === SqlBaseType.STRING) return `string`
  if (either(leftType, rightType, SqlBaseType.DOUBLE)) return `double`
  if (either(leftType, rightType, SqlBaseType.BIGINT)) return `long`
  if (either(leftType, rightType, SqlBaseType.INTEGER)) return `integer`
  return undefined
}

function convertAndCompare<T>(
  conversion: Conversion<T>,
  compare: (a: T, b: T) => number,
  leftType: SqlType,
  rightType: SqlType
): ComparisonFunction {
  return (c: EvaluationContext, l: Term, r: Term) =>
    compare(
      conversion(l.getValue(c), leftType),
      conversion(r.getValue(c), rightType)
    )
}

/**
 * Resolves the three-way ordering for two declared operand types, or
 * `undefined` when the pair has no ordering.
 */
export function resolveComparator(
  leftType: SqlType,
  rightType: SqlType,
  options: ComparisonOptions = DEFAULT_COMPARISON_OPTIONS
): ComparisonFunction | undefined {
  const family = selectComparisonFamily(leftType, rightType)
  if (family === undefined) {
    return undefined
  }

  switch (family) {
    case `decimal`:
      return convertAndCompare(toDecimal, compareDecimals, leftType, rightType)
    case `timestamp`: {
      const timeZone = options.timeZone
      return convertAndCompare(
        (value, from) => toTimestamp(value, from, { timeZone }),
        compareTimestamps,
        leftType,
        rightType
      )
    }
    case `string`:
      return (c, l, r) =>
        compareNatural(formatValue(l.getValue(c)), formatValue(r.getValue(c)))
    case `double`:
      return convertAndCompare(toDouble, compareDoubles, leftType, rightType)
    case `long`:
      return convertAndCompare(toLong, compareNatural, leftType, rightType)
    case `integer`:
      return convertAndCompare(toInteger, compareNatural, leftType, rightType)
    default: {
      const exhaustive: never = family
      return exhaustive
    }
  }
}

const structuralEquals: EqualsFunction = (c, l, r) =>
  deepEquals(l.getValue(c), r.getValue(c))

/**
 * Resolves equality for types without a total order. Returns `undefined`
 * for every other type, in which case the comparator path applies.
 */
export function resolveEquals(leftType: SqlType): EqualsFunction | undefined {
  switch (leftType.baseType) {
    case SqlBaseType.ARRAY:
    case SqlBaseType.MAP:
    case SqlBaseType.STRUCT:
    case SqlBaseType.BOOLEAN:
      return structuralEquals
    case SqlBaseType.INTEGER:
    case SqlBaseType.BIGINT:
    case SqlBaseType.DOUBLE:
    case SqlBaseType.DECIMAL:
    case SqlBaseType.STRING:
    case SqlBaseType.TIMESTAMP:
      return undefined
    default: {
      const exhaustive: never = leftType
      return exhaustive
    }
  }
}
