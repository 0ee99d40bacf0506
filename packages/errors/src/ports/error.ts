export type ErrorCode = Lowercase<string>

/**
 * Structured metadata attached to an error (file names, key names, sizes).
 * Never put secret values here; contexts end up in logs.
 */
export type ErrorContext = Readonly<Record<string, unknown>>

export interface AppError extends Error {
  /** Lowercase, machine-readable error code */
  readonly code: ErrorCode

  readonly context: ErrorContext

  /**
   * `true` when the same operation may succeed if attempted again.
   *
   * @remarks
   * The executor relies on this flag: a worker pool signals a transient
   * hand-off rejection by throwing a retryable error.
   */
  readonly isRetryable: boolean

  /**
   * `true` for expected runtime failures (missing file, bad value),
   * `false` for programmer errors (invalid definitions, broken invariants).
   */
  readonly isOperational: boolean

  readonly timestamp: Date

  readonly cause?: unknown
}

/**
 * JSON-safe error shape used in logs.
 */
export type SerializedError = Readonly<{
  name: string
  code: string
  message: string
  context: Record<string, unknown>
  timestamp: string
  isRetryable: boolean
  isOperational: boolean
  cause?: SerializedError
  stack?: string
}>
