import { parsed, rejected, type ScalarParseResult, type ScalarType } from "../parser/scalar-type"

const MAX_LABEL_LENGTH = 63
const MAX_NAME_LENGTH = 253
const LABEL_CHARS = /^[A-Za-z0-9-]+$/

/**
 * Fully qualified domain name, used for filter identifiers such as
 * `com.example.auth`. A single trailing dot is accepted and dropped.
 */
export class Fqdn {
  private constructor(private readonly value: string) {}

  static readonly type: ScalarType<Fqdn> = {
    typeName: "FQDN",
    parse: (raw) => Fqdn.parse(raw),
  }

  static parse(raw: string): ScalarParseResult<Fqdn> {
    const name = raw.endsWith(".") ? raw.slice(0, -1) : raw

    if (name.length === 0) return rejected("empty FQDN")

    for (const label of name.split(".")) {
      if (label.length === 0) return rejected("empty label in FQDN")
      if (label.length > MAX_LABEL_LENGTH) return rejected("too long label in FQDN")
      if (!LABEL_CHARS.test(label)) return rejected("invalid char found in FQDN")
      if (label.startsWith("-") || label.endsWith("-")) {
        return rejected("label starts or ends with hyphen in FQDN")
      }
    }

    if (name.length > MAX_NAME_LENGTH) return rejected("too long FQDN")

    return parsed(new Fqdn(name))
  }

  toString(): string {
    return this.value
  }

  toJSON(): string {
    return this.value
  }
}
