export type Milliseconds = number

/** Milliseconds since the Unix epoch. */
export type EpochMillis = number

/** An IANA time zone name accepted by `Intl`, e.g. "Europe/Paris" or "UTC". */
export type TimeZone = string
