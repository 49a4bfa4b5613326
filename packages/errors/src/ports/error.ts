/** Lower-case, snake_case error code, e.g. `"truncated"` or `"type_mismatch"`. */
export type ErrorCode = Lowercase<string>

/** What the failing operation was looking at: an OID, an offset, a geometry kind. */
export type ErrorContext = Readonly<Record<string, unknown>>

export interface AppError<C extends ErrorCode = ErrorCode> extends Error {
  readonly code: C
  readonly context: ErrorContext
  readonly timestamp: Date
  readonly cause?: unknown
}

export type SerializedError = Readonly<{
  name: string
  /** `"unknown"` for anything that is not an {@link AppError}. */
  code: string
  message: string
  context: Record<string, unknown>
  timestamp?: string
  stack?: string
  cause?: SerializedError
}>
