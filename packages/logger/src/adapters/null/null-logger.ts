import { type LoggerDeps, EmittingLogger } from "../../core/emitting-logger"
import type { NamedOrigin } from "../../core/origin-name"
import type { LogEntry, Logger } from "../../ports/logger"
import type { LoggerOptions } from "../../ports/logger-options"

/**
 * Writes nothing. Events still reach the dispatcher, so a capture sees them
 * without any console or stream output.
 */
export class NullLogger extends EmittingLogger {
  protected write(_entry: LogEntry): void {}
}

export function createNullLogger(
  origin: string | NamedOrigin,
  deps: LoggerDeps = {},
  opts: Partial<LoggerOptions> = {},
): Logger {
  return new NullLogger(origin, deps, opts)
}
