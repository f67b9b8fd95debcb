import type { Connectors } from "../../ports/connectors"
import type { Listeners } from "../../ports/listeners"
import type { ProxyConfig } from "../../ports/proxy-config"
import type { SectionParser } from "../../ports/section-parser"
import { BlockParser } from "../parser/block-parser"
import type { ParseContext } from "../parser/parse-context"

/**
 * One proxied service: a `listeners` block and a `connectors` block, each
 * handed to its own section parser.
 */
export class ServiceSection implements SectionParser<ProxyConfig> {
  constructor(
    private readonly listeners: SectionParser<Listeners>,
    private readonly connectors: SectionParser<Connectors>,
    private readonly name: string,
  ) {}

  parse(ctx: ParseContext): ProxyConfig {
    const block = BlockParser.from(ctx)

    const listeners = block.required("listeners", (c) => this.listeners.parse(c))
    const connectors = block.required("connectors", (c) => this.connectors.parse(c))

    block.exhaust()

    return { name: this.name, listeners, connectors }
  }
}
