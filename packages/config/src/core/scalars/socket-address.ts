import { isIPv4, isIPv6 } from "node:net"
import { parsed, rejected, type ScalarParseResult, type ScalarType } from "../parser/scalar-type"

const PORT = /^\d{1,5}$/
const MAX_PORT = 65535

/**
 * IP address and port: `127.0.0.1:8080` or `[::1]:443`. Host names are not
 * resolved and are rejected.
 */
export class SocketAddress {
  private constructor(
    readonly host: string,
    readonly port: number,
    readonly family: "ipv4" | "ipv6",
  ) {}

  static readonly type: ScalarType<SocketAddress> = {
    typeName: "SocketAddr",
    parse: (raw) => SocketAddress.parse(raw),
  }

  static parse(raw: string): ScalarParseResult<SocketAddress> {
    const bracketed = raw.startsWith("[")
    const separator = bracketed ? raw.indexOf("]:") + 1 : raw.lastIndexOf(":")

    if (separator <= 0) return rejected("missing port")

    const host = bracketed ? raw.slice(1, separator - 1) : raw.slice(0, separator)
    const portText = raw.slice(separator + 1)

    const family = bracketed ? (isIPv6(host) ? "ipv6" : null) : isIPv4(host) ? "ipv4" : null
    if (family === null) return rejected("invalid IP address")

    const port = Number(portText)
    if (!PORT.test(portText) || port > MAX_PORT) return rejected("invalid port")

    return parsed(new SocketAddress(host, port, family))
  }

  toString(): string {
    return this.family === "ipv6" ? `[${this.host}]:${this.port}` : `${this.host}:${this.port}`
  }
}
