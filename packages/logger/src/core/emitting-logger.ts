import { type Clock, SystemClock } from "@logtrap/clock"
import { LEVEL_SEVERITY, type LogLevelName } from "../ports/log-level"
import type { LogEntry, Logger } from "../ports/logger"
import type { LoggerOptions } from "../ports/logger-options"
import { defaultLogDispatcher, type LogDispatcher } from "./log-dispatcher"
import { type NamedOrigin, originName } from "./origin-name"

export type LoggerDeps = {
  /** Stamps events. Defaults to the system clock. */
  clock?: Clock
  /** Receives every emitted event. Defaults to {@link defaultLogDispatcher}. */
  dispatcher?: LogDispatcher
}

/**
 * Base for every adapter: level gate, timestamp, dispatch to listeners, then
 * `write` to the adapter's sink.
 *
 * Listeners see exactly the events the sink sees. Events below the minimum level
 * reach neither.
 */
export abstract class EmittingLogger implements Logger {
  readonly name: string
  readonly level: LogLevelName

  protected readonly clock: Clock
  protected readonly dispatcher: LogDispatcher
  protected readonly opts: Partial<LoggerOptions>

  constructor(
    origin: string | NamedOrigin,
    deps: LoggerDeps = {},
    opts: Partial<LoggerOptions> = {},
  ) {
    this.name = originName(origin)
    this.level = opts.level ?? "info"
    this.clock = deps.clock ?? new SystemClock()
    this.dispatcher = deps.dispatcher ?? defaultLogDispatcher
    this.opts = opts
  }

  isEnabled(level: LogLevelName): boolean {
    return LEVEL_SEVERITY[level] >= LEVEL_SEVERITY[this.level]
  }

  log(level: LogLevelName, message: unknown, err?: unknown): void {
    if (!this.isEnabled(level)) return

    const entry: LogEntry = {
      time: this.clock.nowMs(),
      name: this.name,
      level,
      message,
      err: err ?? null,
    }

    this.dispatcher.dispatch(entry.time, entry.name, level, message, entry.err)
    this.write(entry)
  }

  trace(message: unknown, err?: unknown): void {
    this.log("trace", message, err)
  }

  debug(message: unknown, err?: unknown): void {
    this.log("debug", message, err)
  }

  info(message: unknown, err?: unknown): void {
    this.log("info", message, err)
  }

  warn(message: unknown, err?: unknown): void {
    this.log("warn", message, err)
  }

  error(message: unknown, err?: unknown): void {
    this.log("error", message, err)
  }

  protected abstract write(entry: LogEntry): void
}
