import type { AppError, ErrorCode, ErrorContext, SerializedError } from "../ports/error"

export type BaseErrorOptions<C extends ErrorCode = ErrorCode> = Readonly<{
  code: C
  context?: ErrorContext
  cause?: unknown
  isOperational?: boolean
}>

export class BaseError<C extends ErrorCode = ErrorCode> extends Error implements AppError {
  readonly code: C
  readonly context: ErrorContext
  readonly isOperational: boolean
  readonly timestamp: Date

  constructor(message: string, options: BaseErrorOptions<C>) {
    super(message, { cause: options.cause })

    this.name = this.constructor.name
    this.code = options.code
    this.context = Object.freeze({ ...options.context })
    this.isOperational = options.isOperational ?? true
    this.timestamp = new Date()

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor)
    }
  }

  toJSON(): SerializedError {
    return serializeError(this)
  }
}

export type SerializeOptions = Readonly<{
  /** Include stack traces in output. Default: false */
  includeStack?: boolean
  /** Stop following `cause` after this many links. Default: 10 */
  maxDepth?: number
}>

/**
 * Serialize any error (or thrown value) to a consistent shape.
 *
 * - BaseError instances keep their code and context
 * - other Error instances get code "unknown" and are marked non-operational
 * - non-Error values are wrapped, with the value kept in `context`
 */
export function serializeError(err: unknown, options?: SerializeOptions): SerializedError {
  return serializeAt(err, options ?? {}, 0)
}

function serializeAt(err: unknown, options: SerializeOptions, depth: number): SerializedError {
  const includeStack = options.includeStack ?? false
  const maxDepth = options.maxDepth ?? 10
  const cause = err instanceof Error && depth < maxDepth ? err.cause : undefined
  const serializedCause =
    cause !== undefined ? { cause: serializeAt(cause, options, depth + 1) } : {}

  if (err instanceof BaseError) {
    return {
      name: err.name,
      code: err.code,
      message: err.message,
      context: { ...err.context },
      isOperational: err.isOperational,
      timestamp: err.timestamp.toISOString(),
      ...serializedCause,
      ...(includeStack && err.stack && { stack: err.stack }),
    }
  }

  if (err instanceof Error) {
    return {
      name: err.name,
      code: "unknown",
      message: err.message,
      context: {},
      isOperational: false,
      timestamp: new Date().toISOString(),
      ...serializedCause,
      ...(includeStack && err.stack && { stack: err.stack }),
    }
  }

  return {
    name: "NonErrorThrown",
    code: "unknown",
    message: typeof err === "string" ? err : "Unknown error",
    context: { value: err },
    isOperational: false,
    timestamp: new Date().toISOString(),
  }
}
