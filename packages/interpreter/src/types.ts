import type { Decimal } from "decimal.js"

// ============================================================
// BASE TYPES
// ============================================================

export const SqlBaseType = {
  INTEGER: `INTEGER`,
  BIGINT: `BIGINT`,
  DOUBLE: `DOUBLE`,
  DECIMAL: `DECIMAL`,
  STRING: `STRING`,
  BOOLEAN: `BOOLEAN`,
  TIMESTAMP: `TIMESTAMP`,
  ARRAY: `ARRAY`,
  MAP: `MAP`,
  STRUCT: `STRUCT`,
} as const

export type SqlBaseType = (typeof SqlBaseType)[keyof typeof SqlBaseType]

// ============================================================
// SQL TYPES
// ============================================================

export interface SqlPrimitiveType {
  readonly baseType:
    | typeof SqlBaseType.INTEGER
    | typeof SqlBaseType.BIGINT
    | typeof SqlBaseType.DOUBLE
    | typeof SqlBaseType.STRING
    | typeof SqlBaseType.BOOLEAN
    | typeof SqlBaseType.TIMESTAMP
}

export interface SqlDecimalType {
  readonly baseType: typeof SqlBaseType.DECIMAL
  readonly precision: number
  readonly scale: number
}

export interface SqlArrayType {
  readonly baseType: typeof SqlBaseType.ARRAY
  readonly itemType: SqlType
}

export interface SqlMapType {
  readonly baseType: typeof SqlBaseType.MAP
  readonly keyType: SqlType
  readonly valueType: SqlType
}

export interface SqlStructField {
  readonly name: string
  readonly type: SqlType
}

export interface SqlStructType {
  readonly baseType: typeof SqlBaseType.STRUCT
  readonly fields: ReadonlyArray<SqlStructField>
}

export type SqlType =
  | SqlPrimitiveType
  | SqlDecimalType
  | SqlArrayType
  | SqlMapType
  | SqlStructType

// ============================================================
// RUNTIME VALUES
// ============================================================

/**
 * In-memory representation of a SQL value. `null` and `undefined` are both
 * SQL NULL.
 */
export type SqlValue =
  | number
  | bigint
  | Decimal
  | string
  | boolean
  | Date
  | Array<SqlValue>
  | Map<SqlValue, SqlValue>
  | { [field: string]: SqlValue }
  | null
  | undefined

// ============================================================
// OPERATORS
// ============================================================

export const ComparisonType = {
  EQUAL: `EQUAL`,
  NOT_EQUAL: `NOT_EQUAL`,
  IS_DISTINCT_FROM: `IS_DISTINCT_FROM`,
  LESS_THAN: `LESS_THAN`,
  LESS_THAN_OR_EQUAL: `LESS_THAN_OR_EQUAL`,
  GREATER_THAN: `GREATER_THAN`,
  GREATER_THAN_OR_EQUAL: `GREATER_THAN_OR_EQUAL`,
} as const

export type ComparisonType =
  (typeof ComparisonType)[keyof typeof ComparisonType]

const COMPARISON_TYPES: ReadonlySet<string> = new Set(
  Object.values(ComparisonType)
)

export function isComparisonType(value: unknown): value is ComparisonType {
  return typeof value === `string` && COMPARISON_TYPES.has(value)
}

// ============================================================
// EVALUATION
// ============================================================

/**
 * Per-row input handed to every term evaluation.
 */
export interface EvaluationContext {
  readonly row: Readonly<Record<string, unknown>>
}
