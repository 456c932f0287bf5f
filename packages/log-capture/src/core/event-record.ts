import { type EpochMillis, formatTimeOfDay, systemTimeZone, type TimeZone } from "@logtrap/clock"
import { describeThrown } from "@logtrap/errors"
import { LEVEL_SEVERITY, type LogLevelName, messageText } from "@logtrap/logger"
import { hashOf, numberHash, stringHash, valuesEqual } from "./values"

export type RenderOptions = {
  /** @default " " */
  separator?: string
  /** @default the process time zone */
  timeZone?: TimeZone
}

// memoized message text; kept outside the record so the record itself can be frozen
const messageStrings = new WeakMap<EventRecord, string>()

/**
 * One captured log event. Frozen on construction.
 *
 * Two records are equal when time, name, level, message and error are all equal.
 * The message text is derived from the message and plays no part in equality.
 */
export class EventRecord {
  /** `null` when the event carried no error. */
  readonly error: unknown

  constructor(
    readonly time: EpochMillis,
    readonly name: string,
    readonly level: LogLevelName,
    readonly message: unknown,
    error?: unknown,
  ) {
    this.error = error ?? null
    Object.freeze(this)
  }

  /**
   * String form of the message, "" when there is none. Computed on first use.
   */
  get messageString(): string {
    let text = messageStrings.get(this)

    if (text === undefined) {
      text = messageText(this.message)
      messageStrings.set(this, text)
    }

    return text
  }

  getMessageString(): string {
    return this.messageString
  }

  /**
   * `HH:mm:ss.SSS name LEVEL message`, with ` errorType errorMessage` appended when
   * an error is attached. The separator replaces every space in that layout.
   *
   * @example
   * ```ts
   * record.render({ separator: "|", timeZone: "UTC" })
   * // "12:34:56.789|DummyName|INFO|Dummy text"
   * ```
   */
  render(options: RenderOptions = {}): string {
    const separator = options.separator ?? " "
    const parts = [
      formatTimeOfDay(this.time, options.timeZone ?? systemTimeZone),
      this.name,
      this.level.toUpperCase(),
      this.messageString,
    ]

    if (this.error !== null) {
      const { typeName, message } = describeThrown(this.error)
      parts.push(typeName, message)
    }

    return parts.join(separator)
  }

  toString(): string {
    return this.render()
  }

  equals(other: unknown): boolean {
    if (this === other) return true
    if (!(other instanceof EventRecord)) return false

    return (
      this.time === other.time &&
      this.name === other.name &&
      this.level === other.level &&
      valuesEqual(this.message, other.message) &&
      valuesEqual(this.error, other.error)
    )
  }

  hashCode(): number {
    return (
      numberHash(this.time) ^
      stringHash(this.name) ^
      LEVEL_SEVERITY[this.level] ^
      hashOf(this.message) ^
      hashOf(this.error)
    )
  }
}
