import { formatSqlType } from "./sql-types.js"
import type { SqlBaseType, SqlType } from "./types.js"

// Base error class for everything raised while compiling or evaluating terms
export class TermError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = `TermError`
  }
}

// Comparison Errors
export class UnsupportedComparisonError extends TermError {
  readonly leftType: SqlType
  readonly rightType: SqlType
  readonly operator: string

  constructor(leftType: SqlType, rightType: SqlType, operator: string) {
    super(
      `Unsupported comparison between ${formatSqlType(leftType)} and ${formatSqlType(rightType)}: ${operator}`
    )
    this.name = `UnsupportedComparisonError`
    this.leftType = leftType
    this.rightType = rightType
    this.operator = operator
  }
}

// Conversion Errors
export class UnsupportedConversionError extends TermError {
  readonly from: SqlType
  readonly to: SqlBaseType
  readonly value: unknown

  constructor(
    from: SqlType,
    to: SqlBaseType,
    value: unknown,
    options?: { cause?: unknown }
  ) {
    super(
      `Unsupported conversion from ${formatSqlType(from)} to ${to}`,
      options
    )
    this.name = `UnsupportedConversionError`
    this.from = from
    this.to = to
    this.value = value
  }
}

// Term Errors
export class MissingColumnError extends TermError {
  constructor(column: string) {
    super(`Column "${column}" is not present in the evaluated row`)
    this.name = `MissingColumnError`
  }
}

// Options Errors
export class InvalidComparisonOptionsError extends TermError {
  constructor(message: string) {
    super(message)
    this.name = `InvalidComparisonOptionsError`
  }
}

export class UnknownComparisonOptionError extends InvalidComparisonOptionsError {
  constructor(key: string, suggestion?: string) {
    super(
      suggestion
        ? `Unknown comparison option "${key}". Did you mean "${suggestion}"?`
        : `Unknown comparison option "${key}"`
    )
    this.name = `UnknownComparisonOptionError`
  }
}

export class InvalidOptionValueError extends InvalidComparisonOptionsError {
  constructor(key: string, expected: string, received: string) {
    super(
      `Invalid value for comparison option "${key}": expected ${expected}, but received ${received}`
    )
    this.name = `InvalidOptionValueError`
  }
}
