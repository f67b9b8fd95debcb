import { isAppError } from "@gantry/errors"
import { createNullLogger, type Logger } from "@gantry/logger"
import type { DocumentSource } from "../ports/document-source"
import type { RootConfig } from "../ports/proxy-config"
import type { SectionParser } from "../ports/section-parser"
import { ParseContext } from "./parser/parse-context"
import { RootSection } from "./sections/root-section"

export type LoadProxyConfigOptions = {
  source: DocumentSource
  /** Entry point handed to `source.collect`. */
  entry: string
  logger?: Logger
  /** Parser applied to each collected document. */
  root?: SectionParser<RootConfig>
}

/**
 * Collects every document reachable from `entry`, parses each one and merges
 * the results in collection order.
 *
 * The first failure (unreadable source, invalid KDL, configuration
 * diagnostic) is logged and rethrown as is.
 */
export async function loadProxyConfig({
  source,
  entry,
  logger = createNullLogger(),
  root = new RootSection(),
}: LoadProxyConfigOptions): Promise<RootConfig> {
  const log = logger.child({ module: "config", entry })

  try {
    const documents = await source.collect(entry)

    log.debug("Collected configuration documents", {
      via: source.name,
      count: documents.length,
    })

    const parsed = documents.map(({ document, sourceName }) => {
      const config = root.parse(ParseContext.root(document, sourceName))

      log.debug("Parsed configuration document", {
        source: sourceName,
        services: config.services.length,
      })

      return config
    })

    const config = mergeRootConfigs(parsed)

    log.info("Configuration loaded", {
      documents: documents.length,
      services: config.services.length,
      chains: config.chains.length,
      keyProfiles: config.keyProfiles.length,
    })

    return config
  } catch (err) {
    log.warn("Configuration rejected", {
      code: isAppError(err) ? err.code : "unknown",
      err,
    })

    throw err
  }
}

/** Concatenates services and definitions, keeping document order. */
export function mergeRootConfigs(configs: readonly RootConfig[]): RootConfig {
  return {
    services: configs.flatMap((c) => c.services),
    chains: configs.flatMap((c) => c.chains),
    keyProfiles: configs.flatMap((c) => c.keyProfiles),
  }
}
