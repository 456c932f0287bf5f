export { FakeClock } from "./adapters/fake-clock"
export { SystemClock } from "./adapters/system-clock"
export { formatTimeOfDay } from "./core/time-of-day"
export { isValidTimeZone, systemTimeZone } from "./core/time-zone"
export type { Clock } from "./ports/clock"
export type * from "./ports/time"
