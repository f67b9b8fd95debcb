import type { ScalarKind } from "../../ports/document"
import { describeValue, formatKeyList, kindName } from "./describe"
import type { ParseContext } from "./parse-context"
import type { ScalarType } from "./scalar-type"

export type NamePredicate = {
  /** Completes "expected ...", e.g. "a valid SocketAddr". */
  readonly description: string
  readonly test: (name: string) => boolean
}

export type KeyType = readonly [key: string, kind: ScalarKind]

export type Rule =
  | { readonly kind: "no_children" }
  | { readonly kind: "no_positional_args" }
  | { readonly kind: "max_positional_args"; readonly max: number }
  | { readonly kind: "only_keys_typed"; readonly keys: readonly KeyType[] }
  | { readonly kind: "name"; readonly predicate: NamePredicate }

export const Rules = {
  noChildren: { kind: "no_children" },
  noPositionalArgs: { kind: "no_positional_args" },
  maxPositionalArgs: (max: number): Rule => ({ kind: "max_positional_args", max }),
  /** Only these keys may appear, each with a value of the given kind. */
  onlyKeysTyped: (keys: readonly KeyType[]): Rule => ({ kind: "only_keys_typed", keys }),
  name: (predicate: NamePredicate): Rule => ({ kind: "name", predicate }),
} as const satisfies Record<string, Rule | ((...args: never[]) => Rule)>

export function namePredicate<T>(type: ScalarType<T>): NamePredicate {
  return {
    description: `a valid ${type.typeName}`,
    test: (name) => type.parse(name).kind === "parsed",
  }
}

/**
 * Checks `rules` in order against the node `ctx` points at; the first broken
 * rule throws.
 */
export function validateRules(ctx: ParseContext, rules: readonly Rule[]): void {
  for (const rule of rules) {
    checkRule(ctx, rule)
  }
}

function checkRule(ctx: ParseContext, rule: Rule): void {
  switch (rule.kind) {
    case "no_children": {
      if (ctx.hasChildrenBlock()) {
        throw ctx.error(`Directive '${ctx.name()}' does not accept a children block`, "structural")
      }
      return
    }

    case "no_positional_args": {
      const positional = ctx.args().find((e) => e.name === null)

      if (positional) {
        throw ctx.errorWithSpan(
          `Directive '${ctx.name()}' does not accept positional arguments, found ${describeValue(positional.value)}`,
          positional.span,
          "structural",
        )
      }
      return
    }

    case "max_positional_args": {
      const extra = ctx.args().filter((e) => e.name === null)[rule.max]

      if (extra) {
        throw ctx.errorWithSpan(
          `Directive '${ctx.name()}' accepts at most ${rule.max} positional argument(s), found ${describeValue(extra.value)}`,
          extra.span,
          "structural",
        )
      }
      return
    }

    case "only_keys_typed": {
      const allowed = rule.keys.map(([key]) => key)

      for (const entry of ctx.args()) {
        if (entry.name === null) continue

        const declared = rule.keys.find(([key]) => key === entry.name)

        if (!declared) {
          throw ctx.errorWithSpan(
            `Unknown configuration key: '${entry.name}'. Allowed keys are: ${formatKeyList(allowed)}`,
            entry.span,
            "unknown_key",
          )
        }

        const [, expected] = declared

        if (entry.value.kind !== expected) {
          throw ctx.errorWithSpan(
            `Key '${entry.name}' expects a ${kindName(expected)}, found ${describeValue(entry.value)}`,
            entry.span,
            "type_mismatch",
          )
        }
      }
      return
    }

    case "name": {
      const name = ctx.name()

      if (!rule.predicate.test(name)) {
        throw ctx.error(
          `Invalid node name '${name}': expected ${rule.predicate.description}`,
          "format",
        )
      }
      return
    }
  }
}
