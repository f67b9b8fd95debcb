import {
  DEFAULT_HASH_ALGORITHM,
  type HashAlgorithm,
  type KeyTemplateConfig,
  type Transform,
} from "../../ports/definitions"
import type { SectionParser } from "../../ports/section-parser"
import { BlockParser } from "../parser/block-parser"
import type { ParseContext } from "../parser/parse-context"
import { Rules } from "../parser/rules"

const defaultAlgorithm: HashAlgorithm = { name: DEFAULT_HASH_ALGORITHM, seed: null }

/**
 * Cache key profile:
 *
 * ```kdl
 * key "${cookie_session}" fallback="${client_ip}"
 * algorithm name="xxhash32" seed="s1"
 * transforms-order {
 *   lowercase
 *   truncate length="256"
 * }
 * ```
 */
export class KeyProfileSection implements SectionParser<KeyTemplateConfig> {
  parse(ctx: ParseContext): KeyTemplateConfig {
    const block = BlockParser.from(ctx)

    const { source, fallback } = block.required("key", (c) => {
      c.validate([Rules.noChildren, Rules.maxPositionalArgs(1)])

      const opts = c.argsMapWithOnlyKeys({}, ["fallback"])

      return { source: c.arg(0).asStr(), fallback: opts.get("fallback") ?? null }
    })

    const algorithm =
      block.optional("algorithm", (c) => {
        c.validate([Rules.noChildren, Rules.noPositionalArgs])

        const opts = c.argsMapWithOnlyKeys({}, ["name", "seed"])

        return {
          name: opts.get("name") ?? DEFAULT_HASH_ALGORITHM,
          seed: opts.get("seed") ?? null,
        }
      }) ?? defaultAlgorithm

    const transforms =
      block.optional("transforms-order", (c) => {
        c.validate([Rules.noPositionalArgs, Rules.onlyKeysTyped([])])

        return c.nodes().map((step) => this.extractTransform(step))
      }) ?? []

    block.exhaust()

    return { source, fallback, algorithm, transforms }
  }

  private extractTransform(ctx: ParseContext): Transform {
    ctx.validate([Rules.noChildren, Rules.noPositionalArgs])

    return { name: ctx.name(), params: Object.fromEntries(ctx.argsMap()) }
  }
}
