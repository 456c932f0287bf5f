import type { TimeZone } from "../ports/time"

/**
 * The process time zone, read once when this module loads.
 */
export const systemTimeZone: TimeZone = new Intl.DateTimeFormat().resolvedOptions().timeZone

export function isValidTimeZone(zone: string): zone is TimeZone {
  if (zone.trim() === "") return false

  try {
    new Intl.DateTimeFormat("en-US", { timeZone: zone })
    return true
  } catch (err) {
    if (err instanceof RangeError) return false
    throw err
  }
}
