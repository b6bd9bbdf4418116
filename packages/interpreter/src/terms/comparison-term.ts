import { SqlTypes } from "../sql-types.js"
import type { EvaluationContext, SqlType } from "../types.js"
import type { Term } from "./term.js"

// ============================================================
// FUNCTION SHAPES
// ============================================================

/**
 * Three-way ordering of two non-null operands: negative, zero or positive.
 */
export type ComparisonFunction = (
  context: EvaluationContext,
  left: Term,
  right: Term
) => number

/**
 * Equality of two non-null operands.
 */
export type EqualsFunction = (
  context: EvaluationContext,
  left: Term,
  right: Term
) => boolean

/**
 * Returns the final result when operand nullness already decides it, or
 * `undefined` when both operands are non-null and the comparison must run.
 */
export type ComparisonNullCheckFunction = (
  context: EvaluationContext,
  left: Term,
  right: Term
) => boolean | undefined

// ============================================================
// TERMS
// ============================================================

export interface BooleanTerm extends Term {
  getValue: (context: EvaluationContext) => boolean
}

export class CompareToTerm implements BooleanTerm {
  readonly sqlType: SqlType = SqlTypes.BOOLEAN

  constructor(
    readonly left: Term,
    readonly right: Term,
    private readonly nullCheck: ComparisonNullCheckFunction,
    private readonly compare: ComparisonFunction,
    private readonly toResult: (compareTo: number) => boolean
  ) {}

  getValue(context: EvaluationContext): boolean {
    const determined = this.nullCheck(context, this.left, this.right)
    if (determined !== undefined) {
      return determined
    }
    return this.toResult(this.compare(context, this.left, this.right))
  }
}

export class EqualsTerm implements BooleanTerm {
  readonly sqlType: SqlType = SqlTypes.BOOLEAN

  constructor(
    readonly left: Term,
    readonly right: Term,
    private readonly nullCheck: ComparisonNullCheckFunction,
    private readonly equals: EqualsFunction,
    private readonly toResult: (equals: boolean) => boolean
  ) {}

  getValue(context: EvaluationContext): boolean {
    const determined = this.nullCheck(context, this.left, this.right)
    if (determined !== undefined) {
      return determined
    }
    return this.toResult(this.equals(context, this.left, this.right))
  }
}
