import type { TimeZone } from "@logtrap/clock"
import type { LogLevelName } from "./log-level"

/**
 * Configuration options for a Logger instance.
 *
 * @remarks
 * These options define *policy*, not behavior:
 * - which log levels are emitted (and therefore reach listeners)
 * - how logs are rendered for humans vs machines
 */
export type LoggerOptions = {
  /**
   * Minimum log level to emit.
   * Any log entries below this level are ignored.
   *
   * @default "info"
   */
  level: LogLevelName

  /**
   * Whether to pretty-print log output for human readability.
   *
   * @remarks
   * Intended for local development and debugging; structured (JSON) output
   * is the default.
   */
  prettify?: boolean

  /**
   * Zone used for the time of day in pretty output.
   *
   * @default the process time zone
   */
  timeZone?: TimeZone
}
