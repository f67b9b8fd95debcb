import type { ScalarKind, ScalarValue } from "../../ports/document"

const kindNames: Record<ScalarKind, string> = {
  string: "String",
  integer: "Integer",
  float: "Float",
  boolean: "Boolean",
  null: "Null",
}

export function kindName(kind: ScalarKind): string {
  return kindNames[kind]
}

/** `String("abc")`, `Integer(42)`, `Boolean(true)`, `Null` */
export function describeValue(value: ScalarValue): string {
  switch (value.kind) {
    case "null":
      return "Null"
    case "string":
      return `String(${JSON.stringify(value.value)})`
    default:
      return `${kindNames[value.kind]}(${String(value.value)})`
  }
}

/** `["fallback", "seed"]` */
export function formatKeyList(keys: readonly string[]): string {
  return `[${keys.map((k) => JSON.stringify(k)).join(", ")}]`
}
