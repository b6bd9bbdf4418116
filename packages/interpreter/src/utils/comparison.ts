import type { Decimal } from "decimal.js"

/**
 * Plain ascending comparator for values with a native `<` ordering
 * (32-bit integers, bigints, strings by UTF-16 code unit).
 */
export function compareNatural<T extends number | bigint | string>(
  a: T,
  b: T
): number {
  if (a < b) return -1
  if (a > b) return 1
  return 0
}

/**
 * Total order over doubles: `-0` sorts before `0`, and NaN sorts after every
 * other value and equals itself. Returning NaN from a comparator would make
 * every operator false, so NaN is ranked instead.
 */
export function compareDoubles(a: number, b: number): number {
  if (a < b) return -1
  if (a > b) return 1

  const aNaN = Number.isNaN(a)
  const bNaN = Number.isNaN(b)
  if (aNaN || bNaN) {
    if (aNaN && bNaN) return 0
    return aNaN ? 1 : -1
  }

  // a == b here, only the sign of zero can still differ
  const aNegZero = Object.is(a, -0)
  const bNegZero = Object.is(b, -0)
  if (aNegZero === bNegZero) return 0
  return aNegZero ? -1 : 1
}

export function compareDecimals(a: Decimal, b: Decimal): number {
  return a.comparedTo(b)
}

export function compareTimestamps(a: Date, b: Date): number {
  return compareNatural(a.getTime(), b.getTime())
}
