import { MissingColumnError } from "../errors.js"
import type { EvaluationContext, SqlType, SqlValue } from "../types.js"

/**
 * A compiled expression node: evaluates to a value, or to `null` /
 * `undefined` for SQL NULL.
 */
export interface Term {
  readonly sqlType: SqlType
  getValue: (context: EvaluationContext) => unknown
}

/**
 * A term paired with the type the compiler declared for it. Resolution reads
 * the declared type, evaluation reads the term.
 */
export interface Operand {
  readonly term: Term
  readonly type: SqlType
}

export function operand(term: Term, type: SqlType = term.sqlType): Operand {
  return { term, type }
}

class LiteralTerm implements Term {
  constructor(
    readonly value: SqlValue,
    readonly sqlType: SqlType
  ) {}

  getValue(): unknown {
    return this.value
  }
}

class ColumnTerm implements Term {
  constructor(
    readonly column: string,
    readonly sqlType: SqlType
  ) {}

  getValue(context: EvaluationContext): unknown {
    if (!Object.hasOwn(context.row, this.column)) {
      throw new MissingColumnError(this.column)
    }
    return context.row[this.column]
  }
}

export function literal(value: SqlValue, sqlType: SqlType): Term {
  return new LiteralTerm(value, sqlType)
}

/**
 * Reads `name` from the row. A present but null column is SQL NULL; an absent
 * one is an error.
 */
export function column(name: string, sqlType: SqlType): Term {
  return new ColumnTerm(name, sqlType)
}
