import type { ListenerConfig, Listeners } from "../../ports/listeners"
import type { SectionParser } from "../../ports/section-parser"
import type { ParseContext } from "../parser/parse-context"
import { namePredicate, Rules } from "../parser/rules"
import { SocketAddress } from "../scalars/socket-address"

type ListenerOptions = {
  certPath: string | null
  keyPath: string | null
  offerH2: boolean | null
}

/**
 * Listener set. Each child is named by the address it binds:
 *
 * ```kdl
 * listeners {
 *   "0.0.0.0:8080"
 *   "0.0.0.0:4443" cert-path="./cert.pem" key-path="./key.pem" offer-h2=#false
 * }
 * ```
 */
export class ListenersSection implements SectionParser<Listeners> {
  parse(ctx: ParseContext): Listeners {
    ctx.expectName("listeners")

    const listeners = ctx.reqNodes().map((c) => this.extractListener(c))

    return { listeners }
  }

  private extractListener(ctx: ParseContext): ListenerConfig {
    ctx.validate([
      Rules.noChildren,
      Rules.noPositionalArgs,
      Rules.onlyKeysTyped([
        ["cert-path", "string"],
        ["key-path", "string"],
        ["offer-h2", "boolean"],
      ]),
      Rules.name(namePredicate(SocketAddress.type)),
    ])

    const address = ctx.parseName(SocketAddress.type).toString()
    const [cert, key, h2] = ctx.props(["cert-path", "key-path", "offer-h2"])

    return this.resolveTcpListener(ctx, address, {
      certPath: cert?.asStr() ?? null,
      keyPath: key?.asStr() ?? null,
      offerH2: h2?.asBool() ?? null,
    })
  }

  private resolveTcpListener(
    ctx: ParseContext,
    address: string,
    { certPath, keyPath, offerH2 }: ListenerOptions,
  ): ListenerConfig {
    if (certPath !== null && keyPath !== null) {
      return { kind: "tcp", address, tls: { certPath, keyPath }, offerH2: offerH2 ?? true }
    }

    if (certPath !== null || keyPath !== null) {
      throw ctx.error(
        "'cert-path' and 'key-path' must either BOTH be present, or NEITHER should be present",
        "mutual_exclusion",
      )
    }

    if (offerH2 !== null) {
      throw ctx.error(
        "'offer-h2' requires TLS, specify 'cert-path' and 'key-path'",
        "mutual_exclusion",
      )
    }

    return { kind: "tcp", address, tls: null, offerH2: false }
  }
}
