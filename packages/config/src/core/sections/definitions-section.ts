import type {
  Definitions,
  FilterChain,
  KeyTemplateConfig,
  NamedFilterChain,
  NamedKeyProfile,
} from "../../ports/definitions"
import type { SectionParser } from "../../ports/section-parser"
import { BlockParser } from "../parser/block-parser"
import type { ParseContext } from "../parser/parse-context"
import { Rules } from "../parser/rules"
import { ChainSection } from "./chain-section"
import { KeyProfileSection } from "./key-profile-section"

export type DefinitionsSectionDeps = {
  chain?: SectionParser<FilterChain>
  keyProfile?: SectionParser<KeyTemplateConfig>
}

/**
 * Named, reusable pieces:
 *
 * ```kdl
 * definitions {
 *   chain "public" { filter name="com.example.auth" }
 *   key-profile "by-path" { key "${uri_path}" }
 * }
 * ```
 */
export class DefinitionsSection implements SectionParser<Definitions> {
  private readonly chain: SectionParser<FilterChain>
  private readonly keyProfile: SectionParser<KeyTemplateConfig>

  constructor(deps: DefinitionsSectionDeps = {}) {
    this.chain = deps.chain ?? new ChainSection()
    this.keyProfile = deps.keyProfile ?? new KeyProfileSection()
  }

  parse(ctx: ParseContext): Definitions {
    ctx.validate([Rules.noPositionalArgs, Rules.onlyKeysTyped([])])

    const block = BlockParser.from(ctx)

    const chains = block.repeated(
      "chain",
      (c): NamedFilterChain => ({ name: this.definitionName(c), chain: this.chain.parse(c) }),
    )
    const keyProfiles = block.repeated(
      "key-profile",
      (c): NamedKeyProfile => ({ name: this.definitionName(c), profile: this.keyProfile.parse(c) }),
    )

    block.exhaust()

    return { chains, keyProfiles }
  }

  private definitionName(ctx: ParseContext): string {
    ctx.validate([Rules.maxPositionalArgs(1), Rules.onlyKeysTyped([])])

    return ctx.arg(0).asStr()
  }
}
