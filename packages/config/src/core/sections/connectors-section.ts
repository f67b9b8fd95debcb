import {
  type Connectors,
  type LoadBalanceConfig,
  selectionKinds,
  type UpstreamConfig,
  upstreamProtocols,
} from "../../ports/connectors"
import type { SectionParser } from "../../ports/section-parser"
import { BlockParser } from "../parser/block-parser"
import type { ParseContext } from "../parser/parse-context"
import { Rules } from "../parser/rules"
import { keywordType } from "../parser/scalar-type"
import { SocketAddress } from "../scalars/socket-address"

const ProtocolType = keywordType("protocol", upstreamProtocols)
const SelectionType = keywordType("selection", selectionKinds)

/**
 * Upstream set:
 *
 * ```kdl
 * connectors {
 *   upstream "10.0.0.2:443" tls-sni="api.internal" proto="h2-or-h11"
 *   upstream "10.0.0.3:8080"
 *   load-balance selection="ketama" key-profile="by-session"
 * }
 * ```
 */
export class ConnectorsSection implements SectionParser<Connectors> {
  parse(ctx: ParseContext): Connectors {
    ctx.expectName("connectors")

    const block = BlockParser.from(ctx)
    const upstreams = block.repeated("upstream", (c) => this.extractUpstream(c))
    const loadBalance = block.optional("load-balance", (c) => this.extractLoadBalance(c)) ?? null

    block.exhaust()

    if (upstreams.length === 0) {
      throw ctx.error("Missing required directive 'upstream'", "missing_required")
    }

    return { upstreams, loadBalance }
  }

  private extractUpstream(ctx: ParseContext): UpstreamConfig {
    ctx.validate([
      Rules.noChildren,
      Rules.maxPositionalArgs(1),
      Rules.onlyKeysTyped([
        ["tls-sni", "string"],
        ["proto", "string"],
      ]),
    ])

    const address = ctx.arg(0).parseAs(SocketAddress.type).toString()
    const tlsSni = ctx.optProp("tls-sni")?.asStr() ?? null
    const proto = ctx.optProp("proto")?.parseAs(ProtocolType) ?? "h1-only"

    if (proto !== "h1-only" && tlsSni === null) {
      throw ctx.error(`'proto="${proto}"' requires TLS, specify 'tls-sni'`, "mutual_exclusion")
    }

    return { address, tlsSni, proto }
  }

  private extractLoadBalance(ctx: ParseContext): LoadBalanceConfig {
    ctx.validate([
      Rules.noChildren,
      Rules.noPositionalArgs,
      Rules.onlyKeysTyped([
        ["selection", "string"],
        ["key-profile", "string"],
      ]),
    ])

    const selection = ctx.optProp("selection")?.parseAs(SelectionType) ?? "round-robin"
    const keyProfile = ctx.optProp("key-profile")?.asStr() ?? null

    if (keyProfile !== null && selection !== "fnv-hash" && selection !== "ketama") {
      throw ctx.error(
        `'key-profile' requires a hashing selection ('fnv-hash' or 'ketama'), found '${selection}'`,
        "mutual_exclusion",
      )
    }

    return { selection, keyProfile }
  }
}
