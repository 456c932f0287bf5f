import type { EpochMillis } from "./time"

/**
 * Source of "now" for anything that stamps events with a time.
 */
export interface Clock {
  /**
   * Current time as a Date object.
   *
   * @remarks
   * Avoid for arithmetic; prefer `nowMs()` for calculations.
   */
  now(): Date

  /** Current time as milliseconds since Unix epoch. */
  nowMs(): EpochMillis
}
