import { BaseError, type ErrorContext } from "@gantry/errors"
import { type LogLevelName, logLevelNames } from "@gantry/logger"
import { z } from "zod/mini"

export const settingsSchema = z.object({
  GANTRY_LOG_LEVEL: z._default(z.enum(logLevelNames), "warn"),
  GANTRY_LOG_PRETTY: z._default(z.stringbool(), false),
})

export type CliSettings = {
  logLevel: LogLevelName
  prettyLogs: boolean
}

export type SettingsIssue = { path: string; message: string }

export type SettingsErrorContext = ErrorContext & {
  issues: SettingsIssue[]
}

export class SettingsError extends BaseError<"invalid_settings"> {
  declare readonly context: SettingsErrorContext

  static fromIssues(issues: SettingsIssue[]): SettingsError {
    const detail = issues.map((i) => `${i.path}: ${i.message}`).join("; ")

    return new SettingsError(`Invalid settings: ${detail}`, {
      code: "invalid_settings",
      context: { issues },
    })
  }
}

function formatPath(path: readonly PropertyKey[]): string {
  let out = ""
  for (const part of path) {
    if (typeof part === "number") out += `[${part}]`
    else out += out ? `.${String(part)}` : String(part)
  }
  return out
}

/**
 * Reads the CLI's own settings from the environment.
 *
 * @throws {SettingsError} listing every invalid variable
 */
export function loadSettings(
  env: Readonly<Record<string, string | undefined>> = process.env,
): CliSettings {
  const result = settingsSchema.safeParse(env)

  if (!result.success) {
    throw SettingsError.fromIssues(
      result.error.issues.map((i) => ({ path: formatPath(i.path), message: i.message })),
    )
  }

  return {
    logLevel: result.data.GANTRY_LOG_LEVEL,
    prettyLogs: result.data.GANTRY_LOG_PRETTY,
  }
}
