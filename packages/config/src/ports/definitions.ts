import type { Fqdn } from "../core/scalars/fqdn"

export type ConfiguredFilter = {
  readonly name: Fqdn
  readonly args: Readonly<Record<string, string>>
}

export type FilterChain = {
  readonly filters: readonly ConfiguredFilter[]
}

export type HashAlgorithm = {
  readonly name: string
  readonly seed: string | null
}

export type Transform = {
  readonly name: string
  readonly params: Readonly<Record<string, string>>
}

/**
 * How a cache key is built: a `${var}` template, an optional fallback
 * template, the hash to apply and the transforms to run first.
 */
export type KeyTemplateConfig = {
  readonly source: string
  readonly fallback: string | null
  readonly algorithm: HashAlgorithm
  readonly transforms: readonly Transform[]
}

export type NamedFilterChain = {
  readonly name: string
  readonly chain: FilterChain
}

export type NamedKeyProfile = {
  readonly name: string
  readonly profile: KeyTemplateConfig
}

export type Definitions = {
  readonly chains: readonly NamedFilterChain[]
  readonly keyProfiles: readonly NamedKeyProfile[]
}

export const DEFAULT_HASH_ALGORITHM = "xxhash64"
