import { Decimal } from "decimal.js"

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  if (typeof value !== `object` || value === null) return false
  const proto: unknown = Object.getPrototypeOf(value)
  return proto === Object.prototype || proto === null
}

function isObjectKey(key: unknown): key is object {
  return typeof key === `object` && key !== null
}

/**
 * Object keys (decimals, dates, arrays, structs) are matched by value, each
 * key of `b` at most once. Primitive keys use the map's own lookup.
 */
function mapsEqual(a: Map<unknown, unknown>, b: Map<unknown, unknown>) {
  const unmatched = Array.from(b.keys()).filter(isObjectKey)
  for (const [key, value] of a) {
    if (!isObjectKey(key)) {
      if (!b.has(key) || !deepEquals(value, b.get(key))) return false
      continue
    }
    const index = unmatched.findIndex((candidate) => deepEquals(key, candidate))
    const match = unmatched[index]
    if (match === undefined || !deepEquals(value, b.get(match))) return false
    unmatched.splice(index, 1)
  }
  return true
}

/**
 * Deep value equality for SQL runtime values.
 *
 * - arrays: same length, pairwise equal in order
 * - maps: same key set (object keys by value), pairwise equal values
 * - structs (plain objects): same own keys, pairwise equal fields
 * - decimals by numeric value, so `1.0` equals `1.00`
 * - dates by instant
 * - NaN equals NaN
 */
export function deepEquals(a: unknown, b: unknown): boolean {
  if (a === b) return true

  if (typeof a === `number` && typeof b === `number`) {
    return Number.isNaN(a) && Number.isNaN(b)
  }

  if (a === null || b === null || a === undefined || b === undefined) {
    return false
  }

  if (Decimal.isDecimal(a) || Decimal.isDecimal(b)) {
    return Decimal.isDecimal(a) && Decimal.isDecimal(b) && a.equals(b)
  }

  if (a instanceof Date || b instanceof Date) {
    return (
      a instanceof Date && b instanceof Date && a.getTime() === b.getTime()
    )
  }

  if (Array.isArray(a) || Array.isArray(b)) {
    if (!Array.isArray(a) || !Array.isArray(b)) return false
    if (a.length !== b.length) return false
    for (let i = 0; i < a.length; i++) {
      if (!deepEquals(a[i], b[i])) return false
    }
    return true
  }

  if (a instanceof Map || b instanceof Map) {
    if (!(a instanceof Map) || !(b instanceof Map)) return false
    if (a.size !== b.size) return false
    return mapsEqual(a, b)
  }

  if (isPlainRecord(a) && isPlainRecord(b)) {
    const keysA = Object.keys(a)
    const keysB = Object.keys(b)
    if (keysA.length !== keysB.length) return false
    for (const key of keysA) {
      if (!Object.hasOwn(b, key) || !deepEquals(a[key], b[key])) {
        return false
      }
    }
    return true
  }

  return false
}
