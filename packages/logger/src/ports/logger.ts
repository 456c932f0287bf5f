import type { EpochMillis } from "@logtrap/clock"
import type { LogLevelName } from "./log-level"

/**
 * A named source of log events.
 *
 * Messages are opaque: anything can be logged and it is only turned into text by a
 * sink that writes it. `err` is an optional error (or any thrown value) attached to
 * the event.
 */
export interface Logger {
  /** Origin name stamped on every event. */
  readonly name: string

  /** Minimum level this logger emits. */
  readonly level: LogLevelName

  isEnabled(level: LogLevelName): boolean

  log(level: LogLevelName, message: unknown, err?: unknown): void
  trace(message: unknown, err?: unknown): void
  debug(message: unknown, err?: unknown): void
  info(message: unknown, err?: unknown): void
  warn(message: unknown, err?: unknown): void
  error(message: unknown, err?: unknown): void
}

/**
 * One event as handed to a sink, after level filtering and timestamping.
 * `err` is `null` when the event carries no error.
 */
export type LogEntry = Readonly<{
  time: EpochMillis
  name: string
  level: LogLevelName
  message: unknown
  err: unknown
}>
