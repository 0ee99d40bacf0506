import type { AppError } from "../ports/error"

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null
}

/**
 * Structural check for {@link AppError}, so errors raised by another copy of
 * this package (or by a hand-written pool adapter) are recognised too.
 */
export function isAppError(e: unknown): e is AppError {
  if (!(e instanceof Error)) return false

  const err: Partial<Record<keyof AppError, unknown>> = e

  return (
    typeof err.code === "string" &&
    isRecord(err.context) &&
    typeof err.isRetryable === "boolean" &&
    typeof err.isOperational === "boolean" &&
    err.timestamp instanceof Date
  )
}

/** True when `e` is an {@link AppError} flagged as retryable. */
export function isRetryableError(e: unknown): boolean {
  return isAppError(e) && e.isRetryable
}
