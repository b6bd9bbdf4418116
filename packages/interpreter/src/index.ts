// Types
export * from "./types.js"
export { SqlTypes, formatSqlType, sqlTypesEqual } from "./sql-types.js"

// Errors
export * from "./errors.js"

// Options
export {
  DEFAULT_COMPARISON_OPTIONS,
  isValidTimeZone,
  validateComparisonOptions,
} from "./options.js"
export type {
  ComparisonOptions,
  EqualityTypeCheck,
  ResolvedComparisonOptions,
} from "./options.js"

// Conversions
export { toDecimal, toTimestamp, parseTimestamp } from "./conversions/scalar.js"
export type { TimestampConversionOptions } from "./conversions/scalar.js"
export { toDouble, toInteger, toLong } from "./conversions/number.js"
export type { Conversion } from "./conversions/types.js"

// Terms
export { column, literal, operand } from "./terms/term.js"
export type { Operand, Term } from "./terms/term.js"
export { CompareToTerm, EqualsTerm } from "./terms/comparison-term.js"
export type {
  BooleanTerm,
  ComparisonFunction,
  ComparisonNullCheckFunction,
  EqualsFunction,
} from "./terms/comparison-term.js"

// Comparison
export { selectNullCheck } from "./comparison/null-check.js"
export {
  resolveComparator,
  resolveEquals,
  selectComparisonFamily,
} from "./comparison/resolver.js"
export type { ComparisonFamily } from "./comparison/resolver.js"
export {
  buildComparisonTerm,
  buildEqualsTerm,
} from "./comparison/builder.js"
export { compileComparison } from "./comparison/compile.js"

// Utilities
export { deepEquals } from "./utils/equality.js"
export { formatValue } from "./utils/format.js"
