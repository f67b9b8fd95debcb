export type TlsConfig = {
  readonly certPath: string
  readonly keyPath: string
}

export type ListenerConfig = {
  readonly kind: "tcp"
  readonly address: string
  readonly tls: TlsConfig | null
  /** Only ever `true` when `tls` is set. */
  readonly offerH2: boolean
}

export type Listeners = {
  readonly listeners: readonly ListenerConfig[]
}
