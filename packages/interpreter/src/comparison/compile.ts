import { withSpan } from "@termcmp/tracing"
import { UnsupportedComparisonError } from "../errors.js"
import { validateComparisonOptions } from "../options.js"
import { formatSqlType, sqlTypesEqual } from "../sql-types.js"
import { isComparisonType } from "../types.js"
import { buildComparisonTerm, buildEqualsTerm } from "./builder.js"
import { selectNullCheck } from "./null-check.js"
import { resolveComparator, resolveEquals } from "./resolver.js"
import type { ComparisonOptions } from "../options.js"
import type { BooleanTerm } from "../terms/comparison-term.js"
import type { Operand } from "../terms/term.js"

/**
 * Compiles `left <operator> right` into a boolean term. All type dispatch
 * happens here, once; the returned term only evaluates.
 *
 * Types with structural equality (BOOLEAN, ARRAY, MAP, STRUCT on the left)
 * support only EQUAL, NOT_EQUAL and IS_DISTINCT_FROM. Everything else goes
 * through the ordering comparator.
 *
 * @throws {UnsupportedComparisonError} when no comparison exists for the
 * operand types, or `operator` is not a comparison operator
 * @throws {InvalidComparisonOptionsError} when `options` are malformed
 */
export function compileComparison(
  operator: string,
  left: Operand,
  right: Operand,
  options?: ComparisonOptions
): BooleanTerm {
  return withSpan(
    `termcmp.compileComparison`,
    () => {
      const resolved = validateComparisonOptions(options)

      if (!isComparisonType(operator)) {
        throw new UnsupportedComparisonError(left.type, right.type, operator)
      }

      const nullCheck = selectNullCheck(operator)

      const equals = resolveEquals(left.type)
      if (equals) {
        if (
          resolved.equalityTypeCheck === `strict` &&
          !sqlTypesEqual(left.type, right.type)
        ) {
          throw new UnsupportedComparisonError(left.type, right.type, operator)
        }
        return buildEqualsTerm(operator, left, right, nullCheck, equals)
      }

      const compare = resolveComparator(left.type, right.type, resolved)
      if (compare) {
        return buildComparisonTerm(operator, left, right, nullCheck, compare)
      }

      throw new UnsupportedComparisonError(left.type, right.type, operator)
    },
    {
      operator,
      leftType: formatSqlType(left.type),
      rightType: formatSqlType(right.type),
    }
  )
}
