import type { Connectors } from "../../ports/connectors"
import {
  DEFAULT_HASH_ALGORITHM,
  type FilterChain,
  type KeyTemplateConfig,
} from "../../ports/definitions"
import type { Listeners } from "../../ports/listeners"
import type { ProxyConfig, RootConfig } from "../../ports/proxy-config"

const INDENT = "  "
const BARE_IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_\-.]*$/
const RESERVED_IDENTIFIERS = new Set(["true", "false", "null", "inf", "nan"])

/*
 * Writers for each section. Output is KDL v2 using the keys the section
 * parsers read, so parsing it back gives an equal value. Defaults are left
 * out.
 */

export function formatFilterChain(chain: FilterChain): string {
  return render(chainLines(chain))
}

export function formatKeyProfile(profile: KeyTemplateConfig): string {
  return render(keyProfileLines(profile))
}

export function formatListeners(listeners: Listeners): string {
  return render(listenersLines(listeners))
}

export function formatConnectors(connectors: Connectors): string {
  return render(connectorsLines(connectors))
}

export function formatService(service: ProxyConfig): string {
  return render(serviceLines(service))
}

export function formatRootConfig(config: RootConfig): string {
  const lines: string[] = []

  if (config.chains.length > 0 || config.keyProfiles.length > 0) {
    lines.push(
      ...block("definitions", [
        ...config.chains.flatMap(({ name, chain }) =>
          block(`chain ${kdlString(name)}`, chainLines(chain)),
        ),
        ...config.keyProfiles.flatMap(({ name, profile }) =>
          block(`key-profile ${kdlString(name)}`, keyProfileLines(profile)),
        ),
      ]),
    )
  }

  if (config.services.length > 0) {
    lines.push(...block("services", config.services.flatMap(serviceLines)))
  }

  return render(lines)
}

function chainLines(chain: FilterChain): string[] {
  return chain.filters.map((f) =>
    node("filter", [], { name: f.name.toString(), ...f.args }),
  )
}

function keyProfileLines(profile: KeyTemplateConfig): string[] {
  const lines = [node("key", [profile.source], { fallback: profile.fallback })]
  const { name, seed } = profile.algorithm

  if (name !== DEFAULT_HASH_ALGORITHM || seed !== null) {
    lines.push(node("algorithm", [], { name, seed }))
  }

  if (profile.transforms.length > 0) {
    lines.push(
      ...block(
        "transforms-order",
        profile.transforms.map((t) => node(kdlIdentifier(t.name), [], t.params)),
      ),
    )
  }

  return lines
}

function listenersLines({ listeners }: Listeners): string[] {
  return block(
    "listeners",
    listeners.map((l) =>
      node(kdlString(l.address), [], {
        "cert-path": l.tls?.certPath ?? null,
        "key-path": l.tls?.keyPath ?? null,
        "offer-h2": l.tls !== null && !l.offerH2 ? false : null,
      }),
    ),
  )
}

function connectorsLines({ upstreams, loadBalance }: Connectors): string[] {
  const lines = upstreams.map((u) =>
    node("upstream", [u.address], {
      "tls-sni": u.tlsSni,
      proto: u.proto === "h1-only" ? null : u.proto,
    }),
  )

  if (loadBalance !== null) {
    lines.push(
      node("load-balance", [], {
        selection: loadBalance.selection,
        "key-profile": loadBalance.keyProfile,
      }),
    )
  }

  return block("connectors", lines)
}

function serviceLines(service: ProxyConfig): string[] {
  return block(kdlString(service.name), [
    ...listenersLines(service.listeners),
    ...connectorsLines(service.connectors),
  ])
}

/** One node line. `null` properties are skipped. */
function node(
  name: string,
  args: readonly string[],
  props: Readonly<Record<string, string | boolean | null>>,
): string {
  const parts = [name, ...args.map(kdlString)]

  for (const [key, value] of Object.entries(props)) {
    if (value === null) continue

    const rendered = typeof value === "boolean" ? (value ? "#true" : "#false") : kdlString(value)
    parts.push(`${kdlIdentifier(key)}=${rendered}`)
  }

  return parts.join(" ")
}

function block(header: string, lines: readonly string[]): string[] {
  return [`${header} {`, ...lines.map((l) => `${INDENT}${l}`), "}"]
}

function render(lines: readonly string[]): string {
  return lines.length === 0 ? "" : `${lines.join("\n")}\n`
}

export function kdlIdentifier(name: string): string {
  return BARE_IDENTIFIER.test(name) && !RESERVED_IDENTIFIERS.has(name) ? name : kdlString(name)
}

export function kdlString(value: string): string {
  let out = '"'

  for (const ch of value) {
    switch (ch) {
      case '"':
        out += '\\"'
        break
      case "\\":
        out += "\\\\"
        break
      case "\n":
        out += "\\n"
        break
      case "\r":
        out += "\\r"
        break
      case "\t":
        out += "\\t"
        break
      default: {
        const code = ch.codePointAt(0) ?? 0
        out += mustEscape(code) ? `\\u{${code.toString(16)}}` : ch
      }
    }
  }

  return `${out}"`
}

/** Code points a KDL v2 string cannot hold literally: controls, newlines, bidi marks, BOM, surrogates. */
function mustEscape(code: number): boolean {
  return (
    code < 0x20 ||
    code === 0x7f ||
    code === 0x85 ||
    (code >= 0xd800 && code <= 0xdfff) ||
    code === 0x200e ||
    code === 0x200f ||
    code === 0x2028 ||
    code === 0x2029 ||
    (code >= 0x202a && code <= 0x202e) ||
    (code >= 0x2066 && code <= 0x2069) ||
    code === 0xfeff
  )
}
