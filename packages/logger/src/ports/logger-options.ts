import type { LogLevelName } from "./log-level"

export type LoggerOptions = {
  /**
   * Minimum level to emit; "info" suppresses "trace" and "debug".
   */
  level: LogLevelName

  /**
   * Human-readable output for terminals. Leave off where logs are collected
   * as JSON.
   */
  prettify?: boolean
}
