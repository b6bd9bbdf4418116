import { ComparisonType } from "../types.js"
import type { ComparisonNullCheckFunction } from "../terms/comparison-term.js"

function isNull(value: unknown): boolean {
  return value === null || value === undefined
}

// IS DISTINCT FROM treats NULL as an ordinary, comparable value
const distinctFromNullCheck: ComparisonNullCheckFunction = (c, l, r) => {
  const leftIsNull = isNull(l.getValue(c))
  const rightIsNull = isNull(r.getValue(c))
  if (leftIsNull || rightIsNull) {
    return leftIsNull !== rightIsNull
  }
  return undefined
}

// UNKNOWN collapses to false for every other operator
const unknownIsFalseNullCheck: ComparisonNullCheckFunction = (c, l, r) => {
  if (isNull(l.getValue(c)) || isNull(r.getValue(c))) {
    return false
  }
  return undefined
}

/**
 * Picks how operand nullness decides the result before any conversion runs.
 */
export function selectNullCheck(
  type: ComparisonType
): ComparisonNullCheckFunction {
  return type === ComparisonType.IS_DISTINCT_FROM
    ? distinctFromNullCheck
    : unknownIsFalseNullCheck
}
