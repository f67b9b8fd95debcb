import type { ConfiguredFilter, FilterChain } from "../../ports/definitions"
import type { SectionParser } from "../../ports/section-parser"
import { BlockParser } from "../parser/block-parser"
import type { ParseContext } from "../parser/parse-context"
import { Rules } from "../parser/rules"
import { Fqdn } from "../scalars/fqdn"

/**
 * Ordered filter chain:
 *
 * ```kdl
 * filter name="com.example.auth"
 * filter name="com.example.logger" level="debug"
 * ```
 *
 * Every property besides `name` is passed to the filter as text.
 */
export class ChainSection implements SectionParser<FilterChain> {
  parse(ctx: ParseContext): FilterChain {
    const block = BlockParser.from(ctx)
    const filters = block.repeated("filter", (c) => this.extractFilter(c))

    block.exhaust()

    return { filters }
  }

  private extractFilter(ctx: ParseContext): ConfiguredFilter {
    ctx.validate([Rules.noChildren, Rules.noPositionalArgs])

    const name = ctx.prop("name").parseAs(Fqdn.type)
    const args = Object.fromEntries([...ctx.argsMap()].filter(([key]) => key !== "name"))

    return { name, args }
  }
}
