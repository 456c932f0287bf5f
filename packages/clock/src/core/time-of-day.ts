import type { EpochMillis, TimeZone } from "../ports/time"
import { systemTimeZone } from "./time-zone"

const formatters = new Map<TimeZone, Intl.DateTimeFormat>()

function formatterFor(zone: TimeZone): Intl.DateTimeFormat {
  let formatter = formatters.get(zone)

  if (!formatter) {
    formatter = new Intl.DateTimeFormat("en-US", {
      timeZone: zone,
      hourCycle: "h23",
      hour: "2-digit",
      minute: "2-digit",
      second: "2-digit",
    })
    formatters.set(zone, formatter)
  }

  return formatter
}

/**
 * Format the time-of-day part of an epoch timestamp as `HH:mm:ss.SSS` in the given zone.
 *
 * Throws a RangeError for a zone `Intl` does not know.
 *
 * @example
 * ```ts
 * formatTimeOfDay(Date.UTC(2024, 0, 1, 12, 34, 56, 789), "UTC") // "12:34:56.789"
 * ```
 */
export function formatTimeOfDay(time: EpochMillis, zone: TimeZone = systemTimeZone): string {
  const parts = formatterFor(zone).formatToParts(time)
  const part = (type: Intl.DateTimeFormatPartTypes) =>
    parts.find((p) => p.type === type)?.value ?? "00"

  // zone offsets are whole minutes, so the millisecond field is zone independent
  const millis = ((time % 1000) + 1000) % 1000

  return `${part("hour")}:${part("minute")}:${part("second")}.${String(millis).padStart(3, "0")}`
}
