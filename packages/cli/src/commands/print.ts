import { formatRootConfig, loadProxyConfig } from "@gantry/config"
import { type CommandDeps, ExitCode } from "./command-io"
import { reportFailure } from "./report-failure"

/**
 * Loads `entry` with its includes and prints the merged configuration as one
 * KDL document.
 */
export async function runPrint(entry: string, { source, logger, io }: CommandDeps): Promise<ExitCode> {
  try {
    const config = await loadProxyConfig({ source, entry, logger })

    io.out(formatRootConfig(config).trimEnd())

    return ExitCode.Ok
  } catch (err) {
    return reportFailure(err, io, false)
  }
}
