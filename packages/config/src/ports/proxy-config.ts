import type { Connectors } from "./connectors"
import type { NamedFilterChain, NamedKeyProfile } from "./definitions"
import type { Listeners } from "./listeners"

export type ProxyConfig = {
  readonly name: string
  readonly listeners: Listeners
  readonly connectors: Connectors
}

/**
 * Everything read from one load, across all collected documents.
 */
export type RootConfig = {
  readonly services: readonly ProxyConfig[]
  readonly chains: readonly NamedFilterChain[]
  readonly keyProfiles: readonly NamedKeyProfile[]
}
