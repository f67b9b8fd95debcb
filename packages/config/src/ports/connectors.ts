export const upstreamProtocols = ["h1-only", "h2-only", "h2-or-h11"] as const

export type UpstreamProtocol = (typeof upstreamProtocols)[number]

export const selectionKinds = ["round-robin", "random", "fnv-hash", "ketama"] as const

export type SelectionKind = (typeof selectionKinds)[number]

export type UpstreamConfig = {
  readonly address: string
  readonly tlsSni: string | null
  readonly proto: UpstreamProtocol
}

export type LoadBalanceConfig = {
  readonly selection: SelectionKind
  /** Name of a key profile from `definitions`; hashing selections only. */
  readonly keyProfile: string | null
}

export type Connectors = {
  readonly upstreams: readonly UpstreamConfig[]
  readonly loadBalance: LoadBalanceConfig | null
}
