import type { DocumentSource } from "@gantry/config"
import type { Logger } from "@gantry/logger"

/** Where command output goes; each call writes whole lines. */
export type CommandIo = {
  out(text: string): void
  err(text: string): void
}

export type CommandDeps = {
  source: DocumentSource
  logger: Logger
  io: CommandIo
}

export const ExitCode = {
  Ok: 0,
  InvalidConfig: 1,
  Failure: 2,
} as const

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode]
