export type ScalarParsed<T> = {
  readonly kind: "parsed"
  readonly value: T
}

export type ScalarRejected = {
  readonly kind: "rejected"
  readonly reason: string
}

export type ScalarParseResult<T> = ScalarParsed<T> | ScalarRejected

/**
 * A type that can be built from the text of a configuration value.
 *
 * This is the hook domain scalars (addresses, qualified names, keyword sets)
 * use to plug into `TypedValue.parseAs` and `ParseContext.parseName`.
 *
 * @example
 * ```typescript
 * const Port: ScalarType<number> = {
 *   typeName: "Port",
 *   parse: (raw) => {
 *     const n = Number(raw)
 *     return Number.isInteger(n) && n > 0 && n < 65536
 *       ? parsed(n)
 *       : rejected("expected 1-65535")
 *   },
 * }
 * ```
 */
export interface ScalarType<T> {
  /** Short name shown in diagnostics, e.g. "FQDN". */
  readonly typeName: string

  parse(raw: string): ScalarParseResult<T>
}

export const parsed = <T>(value: T): ScalarParsed<T> => ({ kind: "parsed", value })

export const rejected = (reason: string): ScalarRejected => ({ kind: "rejected", reason })

export function formatParseFailure(typeName: string, raw: string, reason: string): string {
  return `Invalid ${typeName} '${raw}'. Reason: ${reason}`
}

/**
 * Scalar type accepting exactly one of `keywords`.
 */
export function keywordType<K extends string>(
  typeName: string,
  keywords: readonly K[],
): ScalarType<K> {
  const expected = keywords.map((k) => `'${k}'`).join(", ")

  return {
    typeName,
    parse: (raw) => {
      const match = keywords.find((k) => k === raw)

      return match === undefined ? rejected(`expected one of ${expected}`) : parsed(match)
    },
  }
}
