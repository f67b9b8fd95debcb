import { ConfigDiagnostic } from "@gantry/config"
import { serializeError } from "@gantry/errors"
import { type CommandIo, ExitCode } from "./command-io"

/**
 * Prints a failed load and picks the exit code: configuration diagnostics
 * exit with {@link ExitCode.InvalidConfig}, anything else with
 * {@link ExitCode.Failure}.
 */
export function reportFailure(err: unknown, io: CommandIo, json: boolean): ExitCode {
  const code = err instanceof ConfigDiagnostic ? ExitCode.InvalidConfig : ExitCode.Failure

  if (json) {
    io.out(JSON.stringify({ ok: false, error: serializeError(err) }))
  } else if (err instanceof ConfigDiagnostic) {
    io.err(err.help)
  } else {
    io.err(`error: ${err instanceof Error ? err.message : String(err)}`)
  }

  return code
}
