import { loadProxyConfig } from "@gantry/config"
import { type CommandDeps, ExitCode } from "./command-io"
import { reportFailure } from "./report-failure"

export type CheckOptions = {
  json: boolean
}

/**
 * Loads `entry` and reports whether it is valid, with a short summary.
 */
export async function runCheck(
  entry: string,
  options: CheckOptions,
  { source, logger, io }: CommandDeps,
): Promise<ExitCode> {
  try {
    const config = await loadProxyConfig({ source, entry, logger })

    if (options.json) {
      io.out(
        JSON.stringify({
          ok: true,
          services: config.services.map((s) => s.name),
          chains: config.chains.map((c) => c.name),
          keyProfiles: config.keyProfiles.map((p) => p.name),
        }),
      )
    } else {
      io.out(
        `${entry}: ok (${config.services.length} service(s), ${config.chains.length} chain(s), ${config.keyProfiles.length} key profile(s))`,
      )
    }

    return ExitCode.Ok
  } catch (err) {
    return reportFailure(err, io, options.json)
  }
}
