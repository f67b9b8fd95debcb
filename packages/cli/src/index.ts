export { runCheck, type CheckOptions } from "./commands/check"
export { type CommandDeps, type CommandIo, ExitCode } from "./commands/command-io"
export { runPrint } from "./commands/print"
export { createProgram, type ProgramDeps } from "./program"
export { type CliSettings, loadSettings, SettingsError, settingsSchema } from "./settings"
