import { IANAZone } from "luxon"
import {
  InvalidComparisonOptionsError,
  InvalidOptionValueError,
  UnknownComparisonOptionError,
} from "./errors.js"

export type EqualityTypeCheck = `lenient` | `strict`

export interface ComparisonOptions {
  /**
   * Zone used to read timestamp text that carries no offset. Accepts `UTC`
   * or any IANA zone name.
   * @default `UTC`
   */
  timeZone?: string
  /**
   * Whether the structural-equality path (BOOLEAN, ARRAY, MAP, STRUCT)
   * requires both operands to declare identical types. `lenient` compares
   * the values whatever the right operand declares.
   * @default `lenient`
   */
  equalityTypeCheck?: EqualityTypeCheck
}

export type ResolvedComparisonOptions = Required<ComparisonOptions>

export const DEFAULT_COMPARISON_OPTIONS: ResolvedComparisonOptions =
  Object.freeze({
    timeZone: `UTC`,
    equalityTypeCheck: `lenient`,
  })

const VALID_OPTION_KEYS: ReadonlyArray<keyof ComparisonOptions> = [
  `timeZone`,
  `equalityTypeCheck`,
]

/**
 * Compute Levenshtein distance between two strings for typo detection.
 */
function levenshtein(a: string, b: string): number {
  const m = a.length
  const n = b.length
  let previous = Array.from({ length: n + 1 }, (_, j) => j)
  for (let i = 1; i <= m; i++) {
    const current = [i]
    for (let j = 1; j <= n; j++) {
      const substitution =
        (previous[j - 1] ?? 0) + (a[i - 1] === b[j - 1] ? 0 : 1)
      current[j] = Math.min(
        (previous[j] ?? 0) + 1,
        (current[j - 1] ?? 0) + 1,
        substitution
      )
    }
    previous = current
  }
  return previous[n] ?? 0
}

function findClosestKey(unknownKey: string): string | undefined {
  let bestMatch: string | undefined
  let bestDistance = Infinity
  for (const validKey of VALID_OPTION_KEYS) {
    const distance = levenshtein(
      unknownKey.toLowerCase(),
      validKey.toLowerCase()
    )
    if (distance < bestDistance) {
      bestDistance = distance
      bestMatch = validKey
    }
  }
  return bestDistance <= 3 ? bestMatch : undefined
}

function describeType(value: unknown): string {
  if (value === null) return `null`
  if (Array.isArray(value)) return `an array`
  return typeof value
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === `object` && value !== null && !Array.isArray(value)
}

function isKnownKey(key: string): key is keyof ComparisonOptions {
  return VALID_OPTION_KEYS.some((validKey) => validKey === key)
}

export function isValidTimeZone(zone: string): boolean {
  return zone.toUpperCase() === `UTC` || IANAZone.isValidZone(zone)
}

/**
 * Checks user supplied options and fills in defaults. Runs once per
 * compiled comparison, never per row.
 */
export function validateComparisonOptions(
  options: unknown
): ResolvedComparisonOptions {
  if (options === undefined) {
    return DEFAULT_COMPARISON_OPTIONS
  }
  if (!isRecord(options)) {
    throw new InvalidComparisonOptionsError(
      `Comparison options must be an object, but received ${describeType(options)}`
    )
  }

  for (const key of Object.keys(options)) {
    if (!isKnownKey(key)) {
      throw new UnknownComparisonOptionError(key, findClosestKey(key))
    }
  }

  const { timeZone, equalityTypeCheck } = options

  let resolvedZone = DEFAULT_COMPARISON_OPTIONS.timeZone
  if (timeZone !== undefined) {
    if (typeof timeZone !== `string`) {
      throw new InvalidOptionValueError(
        `timeZone`,
        `a string`,
        describeType(timeZone)
      )
    }
    if (!isValidTimeZone(timeZone)) {
      throw new InvalidOptionValueError(
        `timeZone`,
        `"UTC" or an IANA zone name`,
        `"${timeZone}"`
      )
    }
    resolvedZone = timeZone
  }

  let resolvedCheck = DEFAULT_COMPARISON_OPTIONS.equalityTypeCheck
  if (equalityTypeCheck !== undefined) {
    if (equalityTypeCheck === `lenient` || equalityTypeCheck === `strict`) {
      resolvedCheck = equalityTypeCheck
    } else {
      throw new InvalidOptionValueError(
        `equalityTypeCheck`,
        `"lenient" or "strict"`,
        String(equalityTypeCheck)
      )
    }
  }

  return Object.freeze({
    timeZone: resolvedZone,
    equalityTypeCheck: resolvedCheck,
  })
}
