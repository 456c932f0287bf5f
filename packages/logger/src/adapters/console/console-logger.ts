import { formatTimeOfDay } from "@logtrap/clock"
import { describeThrown, serializeError } from "@logtrap/errors"
import { type LoggerDeps, EmittingLogger } from "../../core/emitting-logger"
import { messageText } from "../../core/message-text"
import type { NamedOrigin } from "../../core/origin-name"
import type { LogLevelName } from "../../ports/log-level"
import type { LogEntry, Logger } from "../../ports/logger"
import type { LoggerOptions } from "../../ports/logger-options"

export type ConsoleWriter = Pick<Console, LogLevelName>

export type ConsoleLoggerDeps = LoggerDeps & {
  console?: ConsoleWriter
}

export class ConsoleLogger extends EmittingLogger {
  private readonly sink: ConsoleWriter

  constructor(
    origin: string | NamedOrigin,
    deps: ConsoleLoggerDeps = {},
    opts: Partial<LoggerOptions> = {},
  ) {
    super(origin, deps, opts)
    this.sink = deps.console ?? globalThis.console
  }

  protected write(entry: LogEntry): void {
    const output = this.opts.prettify ? this.prettyLine(entry) : this.jsonLine(entry)

    this.sink[entry.level](output)
  }

  private jsonLine(entry: LogEntry): string {
    const payload: Record<string, unknown> = {
      timestamp: new Date(entry.time).toISOString(),
      level: entry.level,
      logger: entry.name,
      message: messageText(entry.message),
    }

    if (entry.err !== null) {
      payload.err = serializeError(entry.err, { includeStack: true })
    }

    return safeStringify(payload)
  }

  private prettyLine(entry: LogEntry): string {
    const time = formatTimeOfDay(entry.time, this.opts.timeZone)
    const line = `${time} ${entry.level.toUpperCase()} ${entry.name} ${messageText(entry.message)}`

    if (entry.err === null) return line

    const stack = entry.err instanceof Error ? entry.err.stack : undefined

    if (!stack) {
      const { typeName, message } = describeThrown(entry.err)
      return `${line}\n  ${typeName}: ${message}`
    }

    const indentedStack = stack
      .split("\n")
      .map((l) => `  ${l}`)
      .join("\n")

    return `${line}\n${indentedStack}`
  }
}

function safeStringify(value: unknown): string {
  try {
    return JSON.stringify(value)
  } catch {
    return JSON.stringify({ message: "Failed to stringify log payload" })
  }
}

export function createConsoleLogger(
  origin: string | NamedOrigin,
  deps: ConsoleLoggerDeps = {},
  opts: Partial<LoggerOptions> = {},
): Logger {
  return new ConsoleLogger(origin, deps, opts)
}
