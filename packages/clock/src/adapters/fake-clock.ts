import type { Clock } from "../ports/clock"
import type { EpochMillis, Milliseconds } from "../ports/time"

/**
 * A clock that only moves when told to. Stamps every event with the same time
 * until `advance()` or `set()` is called.
 */
export class FakeClock implements Clock {
  private time: EpochMillis

  constructor(start: EpochMillis = 0) {
    this.time = start
  }

  now(): Date {
    return new Date(this.time)
  }

  nowMs(): EpochMillis {
    return this.time
  }

  advance(ms: Milliseconds): void {
    this.time = this.time + ms
  }

  set(ms: EpochMillis): void {
    this.time = ms
  }
}
