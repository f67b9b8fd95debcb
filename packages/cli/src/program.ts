import { type DocumentSource, FileSource } from "@gantry/config"
import type { Logger } from "@gantry/logger"
import { Command } from "commander"
import { runCheck } from "./commands/check"
import type { CommandIo } from "./commands/command-io"
import { runPrint } from "./commands/print"

const VERSION = "0.1.0"

export type ProgramDeps = {
  io: CommandIo
  logger: Logger
  setExitCode: (code: number) => void
  /** Builds the document source for `--cwd`. */
  createSource?: (cwd: string) => DocumentSource
}

type GlobalOptions = {
  cwd: string
}

/**
 * Builds the command tree. Parse errors, `--help` and `--version` throw a
 * `CommanderError` instead of exiting the process.
 */
export function createProgram(deps: ProgramDeps): Command {
  const createSource = deps.createSource ?? ((cwd: string) => new FileSource({ cwd }))
  const program = new Command()

  program
    .name("gantry-config")
    .description("Validate and print reverse proxy configuration")
    .version(VERSION)
    .option("-C, --cwd <dir>", "base directory for relative paths", process.cwd())
    .exitOverride()
    .configureOutput({
      writeOut: (text) => deps.io.out(text.trimEnd()),
      writeErr: (text) => deps.io.err(text.trimEnd()),
    })

  const commandDeps = () => {
    const { cwd } = program.opts<GlobalOptions>()

    return { source: createSource(cwd), logger: deps.logger, io: deps.io }
  }

  program
    .command("check")
    .description("Check a configuration file and everything it includes")
    .argument("<entry>", "configuration file or directory")
    .option("--json", "print the result as JSON", false)
    .action(async (entry: string, options: { json: boolean }) => {
      deps.setExitCode(await runCheck(entry, options, commandDeps()))
    })

  program
    .command("print")
    .description("Print the merged configuration as KDL")
    .argument("<entry>", "configuration file or directory")
    .action(async (entry: string) => {
      deps.setExitCode(await runPrint(entry, commandDeps()))
    })

  return program
}
