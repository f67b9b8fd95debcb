/**
 * Machine-readable error identifier.
 *
 * Codes are lowercase snake case, e.g. `missing_required` or `source_not_found`.
 */
export type ErrorCode = Lowercase<string>

/**
 * Structured metadata attached to an error (source names, spans, paths).
 */
export type ErrorContext = Readonly<Record<string, unknown>>

export interface AppError extends Error {
  readonly code: ErrorCode

  readonly context: ErrorContext

  /**
   * `true` for expected failures caused by input (a malformed configuration
   * file, a missing include), `false` for bugs and broken invariants.
   *
   * @default true
   */
  readonly isOperational: boolean

  readonly timestamp: Date

  /**
   * Underlying cause
   *
   * See {@link https://developer.mozilla.org/en-US/docs/Web/JavaScript/Reference/Global_Objects/Error/cause Error.cause}
   */
  readonly cause?: unknown
}

/**
 * JSON-safe error shape, used by the CLI's `--json` output and by loggers.
 */
export type SerializedError = Readonly<{
  name: string
  code: string
  message: string
  context: Record<string, unknown>
  timestamp: string
  isOperational: boolean
  cause?: SerializedError
  stack?: string
}>
