import { UnsupportedComparisonError } from "../errors.js"
import { ComparisonType } from "../types.js"
import { CompareToTerm, EqualsTerm } from "../terms/comparison-term.js"
import type {
  BooleanTerm,
  ComparisonFunction,
  ComparisonNullCheckFunction,
  EqualsFunction,
} from "../terms/comparison-term.js"
import type { Operand } from "../terms/term.js"

/**
 * Wraps an ordering function into the boolean term for `type`.
 */
export function buildComparisonTerm(
  type: ComparisonType,
  left: Operand,
  right: Operand,
  nullCheck: ComparisonNullCheckFunction,
  compare: ComparisonFunction
): BooleanTerm {
  const term = (toResult: (compareTo: number) => boolean) =>
    new CompareToTerm(left.term, right.term, nullCheck, compare, toResult)

  switch (type) {
    case ComparisonType.EQUAL:
      return term((compareTo) => compareTo === 0)
    case ComparisonType.NOT_EQUAL:
    case ComparisonType.IS_DISTINCT_FROM:
      return term((compareTo) => compareTo !== 0)
    case ComparisonType.GREATER_THAN_OR_EQUAL:
      return term((compareTo) => compareTo >= 0)
    case ComparisonType.GREATER_THAN:
      return term((compareTo) => compareTo > 0)
    case ComparisonType.LESS_THAN_OR_EQUAL:
      return term((compareTo) => compareTo <= 0)
    case ComparisonType.LESS_THAN:
      return term((compareTo) => compareTo < 0)
    default:
      throw new UnsupportedComparisonError(left.type, right.type, String(type))
  }
}

/**
 * Wraps an equality function into the boolean term for `type`. Only the
 * equality operators are defined here; ordering operators throw.
 */
export function buildEqualsTerm(
  type: ComparisonType,
  left: Operand,
  right: Operand,
  nullCheck: ComparisonNullCheckFunction,
  equals: EqualsFunction
): BooleanTerm {
  switch (type) {
    case ComparisonType.EQUAL:
      return new EqualsTerm(
        left.term,
        right.term,
        nullCheck,
        equals,
        (isEqual) => isEqual
      )
    case ComparisonType.NOT_EQUAL:
    case ComparisonType.IS_DISTINCT_FROM:
      return new EqualsTerm(
        left.term,
        right.term,
        nullCheck,
        equals,
        (isEqual) => !isEqual
      )
    default:
      throw new UnsupportedComparisonError(left.type, right.type, type)
  }
}
