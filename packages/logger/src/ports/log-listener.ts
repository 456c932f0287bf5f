import type { EpochMillis } from "@logtrap/clock"
import type { LogLevelName } from "./log-level"

/**
 * Receives every event emitted by loggers sharing a dispatcher, whatever its origin.
 * Filtering by origin is up to the listener.
 */
export interface LogListener {
  receive(
    time: EpochMillis,
    name: string,
    level: LogLevelName,
    message: unknown,
    error: unknown,
  ): void
}
