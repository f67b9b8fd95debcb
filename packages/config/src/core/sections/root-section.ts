import type { ConfigDocument } from "../../ports/document"
import type { Connectors } from "../../ports/connectors"
import type { Definitions } from "../../ports/definitions"
import type { Listeners } from "../../ports/listeners"
import type { ProxyConfig, RootConfig } from "../../ports/proxy-config"
import type { SectionParser } from "../../ports/section-parser"
import { BlockParser } from "../parser/block-parser"
import { ParseContext } from "../parser/parse-context"
import { Rules } from "../parser/rules"
import { ConnectorsSection } from "./connectors-section"
import { DefinitionsSection } from "./definitions-section"
import { ListenersSection } from "./listeners-section"
import { ServiceSection } from "./service-section"

export type RootSectionDeps = {
  definitions?: SectionParser<Definitions>
  listeners?: SectionParser<Listeners>
  connectors?: SectionParser<Connectors>
}

/**
 * Top level of one document:
 *
 * ```kdl
 * include "./shared.kdl"
 * definitions { ... }
 * services {
 *   "edge" {
 *     listeners { ... }
 *     connectors { ... }
 *   }
 * }
 * ```
 *
 * `include` directives are checked here; following them is up to the
 * document source.
 */
export class RootSection implements SectionParser<RootConfig> {
  private readonly definitions: SectionParser<Definitions>
  private readonly listeners: SectionParser<Listeners>
  private readonly connectors: SectionParser<Connectors>

  constructor(deps: RootSectionDeps = {}) {
    this.definitions = deps.definitions ?? new DefinitionsSection()
    this.listeners = deps.listeners ?? new ListenersSection()
    this.connectors = deps.connectors ?? new ConnectorsSection()
  }

  parse(ctx: ParseContext): RootConfig {
    const block = BlockParser.from(ctx)

    block.repeated("include", readInclude)
    const definitions = block.optional("definitions", (c) => this.definitions.parse(c))
    const services = block.optional("services", (c) => this.parseServices(c)) ?? []

    block.exhaust()

    return {
      services,
      chains: definitions?.chains ?? [],
      keyProfiles: definitions?.keyProfiles ?? [],
    }
  }

  private parseServices(ctx: ParseContext): ProxyConfig[] {
    ctx.validate([Rules.noPositionalArgs, Rules.onlyKeysTyped([])])

    return ctx.nodes().map((service) => {
      service.validate([Rules.noPositionalArgs, Rules.onlyKeysTyped([])])

      return new ServiceSection(this.listeners, this.connectors, service.name()).parse(service)
    })
  }
}

function readInclude(ctx: ParseContext): string {
  ctx.validate([Rules.noChildren, Rules.maxPositionalArgs(1), Rules.onlyKeysTyped([])])

  return ctx.arg(0).asStr()
}

/** Paths named by the top-level `include` directives of `document`, in order. */
export function includeDirectives(document: ConfigDocument, sourceName: string): string[] {
  return ParseContext.root(document, sourceName)
    .nodes()
    .filter((c) => c.name() === "include")
    .map(readInclude)
}
