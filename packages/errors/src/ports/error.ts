/** Lowercase snake_case by convention, e.g. `file_not_found`. */
export type ErrorCode = string

/**
 * Structured metadata attached to an error (paths, sizes, exit codes...).
 * Keep values JSON-safe; they end up in logs and event payloads.
 */
export type ErrorContext = Readonly<Record<string, unknown>>

export interface AppError extends Error {
  readonly code: ErrorCode

  readonly context: ErrorContext

  /** `true` if running the same operation again might succeed */
  readonly isRetryable: boolean

  /**
   * `true` for expected runtime failures (missing file, bad input, tool failure);
   * `false` for programmer errors such as an illegal state transition.
   *
   * @default true
   */
  readonly isOperational: boolean

  readonly timestamp: Date

  readonly cause?: unknown
}

/**
 * JSON-safe error shape for logs and event payloads.
 */
export type SerializedError = Readonly<{
  name: string
  code: string
  message: string
  context: Record<string, unknown>
  timestamp: string
  isOperational: boolean
  /** Node.js system error code (`ENOENT`, `EACCES`...) when the error carried one */
  errno?: string
  cause?: SerializedError
  stack?: string
}>
