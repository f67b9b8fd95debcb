/**
 * Fields a logger can carry for the lifetime of a child.
 *
 * `entry` is the path a load started from; `source` the document currently
 * being read or parsed.
 */
export type LogContext = {
  service: string
  module: string
  env: string

  entry: string
  source: string
}

export type LogEvent = {
  err: unknown
}

export type LogMeta<TContext extends LogContext = LogContext> = Partial<TContext> &
  Partial<LogEvent> &
  Record<string, unknown>

/**
 * A partial overlay applied to an existing log context by child().
 */
export type LogContextPatch = Partial<LogContext> & Record<string, unknown>
