import type { SqlType } from "../types.js"

/**
 * Converts a non-null runtime value declared as `from` into one comparable
 * representation. Throws `UnsupportedConversionError` for anything it
 * cannot represent.
 */
export type Conversion<T> = (value: unknown, from: SqlType) => T
