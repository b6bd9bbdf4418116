import { Decimal } from "decimal.js"

/**
 * Text form of a runtime value, used when values are compared as strings.
 */
export function formatValue(value: unknown): string {
  if (value === null || value === undefined) return `null`
  if (typeof value === `string`) return value
  if (Decimal.isDecimal(value)) return value.toString()
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? `Invalid Date` : value.toISOString()
  }
  if (Array.isArray(value)) {
    return `[${value.map(formatValue).join(`, `)}]`
  }
  if (value instanceof Map) {
    const entries = Array.from(
      value.entries(),
      ([key, entry]) => `${formatValue(key)}=${formatValue(entry)}`
    )
    return `{${entries.join(`, `)}}`
  }
  if (typeof value === `object`) {
    const fields = Object.entries(value).map(
      ([name, field]) => `${name}=${formatValue(field)}`
    )
    return `Struct{${fields.join(`, `)}}`
  }
  return String(value)
}
