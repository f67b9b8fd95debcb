import type { DocumentEntry, ScalarKind } from "../../ports/document"
import type { ConfigDiagnostic } from "../diagnostics/config-diagnostic"
import { describeValue } from "./describe"
import type { ParseContext } from "./parse-context"
import { formatParseFailure, type ScalarType } from "./scalar-type"

/**
 * One entry of a node, with the context needed to report a bad value at the
 * entry itself.
 */
export class TypedValue {
  constructor(
    private readonly ctx: ParseContext,
    readonly entry: DocumentEntry,
  ) {}

  get kind(): ScalarKind {
    return this.entry.value.kind
  }

  asStr(): string {
    const value = this.entry.value

    if (value.kind !== "string") throw this.mismatch("Expected a string value")

    return value.value
  }

  asBool(): boolean {
    const value = this.entry.value

    if (value.kind !== "boolean") throw this.mismatch("Expected a boolean")

    return value.value
  }

  asUsize(): number {
    const value = this.entry.value

    if (value.kind !== "integer" || value.value < 0 || !Number.isSafeInteger(value.value)) {
      throw this.mismatch("Expected a positive integer")
    }

    return value.value
  }

  /**
   * Text form of any non-null scalar: `42`, `1.5`, `true`. Numbers are
   * written in plain decimal, infinities as `inf` and `-inf`.
   */
  asStringLossy(): string {
    const value = this.entry.value

    switch (value.kind) {
      case "string":
        return value.value
      case "integer":
      case "float":
        return formatNumber(value.value)
      case "boolean":
        return String(value.value)
      case "null":
        throw this.ctx.errorWithSpan(
          "Cannot parse 'null' as a string or number",
          this.entry.span,
          "type_mismatch",
        )
    }
  }

  parseAs<T>(type: ScalarType<T>): T {
    const raw = this.asStringLossy()
    const result = type.parse(raw)

    if (result.kind === "rejected") {
      throw this.ctx.errorWithSpan(
        formatParseFailure(type.typeName, raw, result.reason),
        this.entry.span,
        "format",
      )
    }

    return result.value
  }

  private mismatch(expected: string): ConfigDiagnostic {
    return this.ctx.errorWithSpan(
      `${expected}, found ${describeValue(this.entry.value)}`,
      this.entry.span,
      "type_mismatch",
    )
  }
}

const EXPONENT_FORM = /^(-?)(\d)(?:\.(\d+))?e([+-]\d+)$/

function formatNumber(n: number): string {
  if (Number.isNaN(n)) return "NaN"
  if (!Number.isFinite(n)) return n > 0 ? "inf" : "-inf"
  if (Object.is(n, -0)) return "-0"

  const text = String(n)
  const match = EXPONENT_FORM.exec(text)
  if (!match) return text

  const [, sign = "", lead = "", fraction = "", exponent = "0"] = match
  const digits = lead + fraction
  const point = 1 + Number(exponent)

  if (point <= 0) return `${sign}0.${"0".repeat(-point)}${digits}`
  if (point >= digits.length) return `${sign}${digits}${"0".repeat(point - digits.length)}`

  return `${sign}${digits.slice(0, point)}.${digits.slice(point)}`
}
