export type ErrorCode = Lowercase<string>

/**
 * Structured data attached to an error (indexes, sizes, operation names).
 */
export type ErrorContext = Readonly<Record<string, unknown>>

export interface AppError extends Error {
  readonly code: ErrorCode

  readonly context: ErrorContext

  /**
   * `false` for programmer errors such as a bad index or a mutation attempted on a
   * read-only view. Nothing in this library retries; callers use this to tell a
   * misuse apart from an expected failure.
   *
   * @default true
   */
  readonly isOperational: boolean

  readonly timestamp: Date

  readonly cause?: unknown
}

/**
 * JSON-safe error shape used by log sinks.
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

/**
 * The two parts of a thrown value that a single log line shows.
 */
export type ThrownDescription = Readonly<{
  typeName: string
  message: string
}>
