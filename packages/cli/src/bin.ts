#!/usr/bin/env tsx
import { createPinoLogger } from "@gantry/logger"
import { CommanderError } from "commander"
import { ExitCode } from "./commands/command-io"
import { createProgram } from "./program"
import { type CliSettings, loadSettings, SettingsError } from "./settings"

const io = {
  out: (text: string) => process.stdout.write(`${text}\n`),
  err: (text: string) => process.stderr.write(`${text}\n`),
}

async function main(argv: string[]): Promise<number> {
  let settings: CliSettings

  try {
    settings = loadSettings()
  } catch (err) {
    if (err instanceof SettingsError) {
      io.err(`error: ${err.message}`)
      return ExitCode.Failure
    }
    throw err
  }

  const logger = settings.prettyLogs
    ? createPinoLogger({}, { level: settings.logLevel, prettify: true })
    : createPinoLogger({ destination: process.stderr }, { level: settings.logLevel })

  let exitCode = 0
  const program = createProgram({
    io,
    logger: logger.child({ service: "gantry-config" }),
    setExitCode: (code) => {
      exitCode = code
    },
  })

  try {
    await program.parseAsync(argv)
  } catch (err) {
    if (err instanceof CommanderError) return err.exitCode === 0 ? 0 : ExitCode.Failure
    throw err
  }

  return exitCode
}

process.exitCode = await main(process.argv)
