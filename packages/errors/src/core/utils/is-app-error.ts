import type { AppError } from "../../ports/error"

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null
}

/**
 * Structural check for {@link AppError}, so errors raised by another copy of
 * this package (or hand-built ones) are recognized too.
 */
export function isAppError(e: unknown): e is AppError {
  if (!isRecord(e)) return false

  return (
    typeof e.code === "string" &&
    isRecord(e.context) &&
    typeof e.isOperational === "boolean" &&
    e.timestamp instanceof Date &&
    Number.isFinite(e.timestamp.valueOf()) &&
    typeof e.message === "string" &&
    typeof e.name === "string"
  )
}
