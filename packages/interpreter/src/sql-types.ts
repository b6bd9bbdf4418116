import { SqlBaseType } from "./types.js"
import type {
  SqlArrayType,
  SqlDecimalType,
  SqlMapType,
  SqlPrimitiveType,
  SqlStructField,
  SqlStructType,
  SqlType,
} from "./types.js"

function primitive(baseType: SqlPrimitiveType[`baseType`]): SqlPrimitiveType {
  return Object.freeze({ baseType })
}

export const SqlTypes = {
  INTEGER: primitive(SqlBaseType.INTEGER),
  BIGINT: primitive(SqlBaseType.BIGINT),
  DOUBLE: primitive(SqlBaseType.DOUBLE),
  STRING: primitive(SqlBaseType.STRING),
  BOOLEAN: primitive(SqlBaseType.BOOLEAN),
  TIMESTAMP: primitive(SqlBaseType.TIMESTAMP),

  decimal(precision: number, scale: number): SqlDecimalType {
    return Object.freeze({ baseType: SqlBaseType.DECIMAL, precision, scale })
  },

  array(itemType: SqlType): SqlArrayType {
    return Object.freeze({ baseType: SqlBaseType.ARRAY, itemType })
  },

  map(keyType: SqlType, valueType: SqlType): SqlMapType {
    return Object.freeze({ baseType: SqlBaseType.MAP, keyType, valueType })
  },

  struct(fields: ReadonlyArray<SqlStructField>): SqlStructType {
    return Object.freeze({
      baseType: SqlBaseType.STRUCT,
      fields: Object.freeze(fields.map((field) => Object.freeze({ ...field }))),
    })
  },
} as const

/**
 * Renders a type the way it appears in error messages, e.g.
 * `MAP<STRING, DECIMAL(4, 2)>`.
 */
export function formatSqlType(type: SqlType): string {
  switch (type.baseType) {
    case SqlBaseType.DECIMAL:
      return `DECIMAL(${type.precision}, ${type.scale})`
    case SqlBaseType.ARRAY:
      return `ARRAY<${formatSqlType(type.itemType)}>`
    case SqlBaseType.MAP:
      return `MAP<${formatSqlType(type.keyType)}, ${formatSqlType(type.valueType)}>`
    case SqlBaseType.STRUCT:
      return `STRUCT<${type.fields
        .map((field) => `\`${field.name}\` ${formatSqlType(field.type)}`)
        .join(`, `)}>`
    case SqlBaseType.INTEGER:
    case SqlBaseType.BIGINT:
    case SqlBaseType.DOUBLE:
    case SqlBaseType.STRING:
    case SqlBaseType.BOOLEAN:
    case SqlBaseType.TIMESTAMP:
      return type.baseType
    default: {
      const exhaustive: never = type
      return exhaustive
    }
  }
}

/**
 * Structural type identity, including nested element and field types.
 */
export function sqlTypesEqual(a: SqlType, b: SqlType): boolean {
  switch (a.baseType) {
    case SqlBaseType.DECIMAL:
      return (
        b.baseType === SqlBaseType.DECIMAL &&
        a.precision === b.precision &&
        a.scale === b.scale
      )
    case SqlBaseType.ARRAY:
      return (
        b.baseType === SqlBaseType.ARRAY && sqlTypesEqual(a.itemType, b.itemType)
      )
    case SqlBaseType.MAP:
      return (
        b.baseType === SqlBaseType.MAP &&
        sqlTypesEqual(a.keyType, b.keyType) &&
        sqlTypesEqual(a.valueType, b.valueType)
      )
    case SqlBaseType.STRUCT:
      return (
        b.baseType === SqlBaseType.STRUCT &&
        a.fields.length === b.fields.length &&
        a.fields.every((field, i) => {
          const other = b.fields[i]
          return (
            other !== undefined &&
            field.name === other.name &&
            sqlTypesEqual(field.type, other.type)
          )
        })
      )
    case SqlBaseType.INTEGER:
    case SqlBaseType.BIGINT:
    case SqlBaseType.DOUBLE:
    case SqlBaseType.STRING:
    case SqlBaseType.BOOLEAN:
    case SqlBaseType.TIMESTAMP:
      return a.baseType === b.baseType
    default: {
      const exhaustive: never = a
      return exhaustive
    }
  }
}
