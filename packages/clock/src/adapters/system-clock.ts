import type { Clock } from "../ports/clock"
import type { EpochMillis } from "../ports/time"

export class SystemClock implements Clock {
  now(): Date {
    return new Date()
  }

  nowMs(): EpochMillis {
    return Date.now()
  }
}
