import type { EpochMillis, TimeZone } from "@logtrap/clock"
import {
  defaultLogDispatcher,
  type LogDispatcher,
  type LogLevelName,
  type LogListener,
  type NamedOrigin,
  originName,
} from "@logtrap/logger"
import { StringMatchers } from "../adapters/string-matchers"
import type { EventList } from "../ports/event-list"
import type { StringMatcher } from "../ports/string-matcher"
import { CaptureCursor } from "./capture-cursor"
import { IndexOutOfRangeError, UnsupportedOperationError } from "./errors"
import { EventRecord, type RenderOptions } from "./event-record"
import { valuesEqual } from "./values"

export type EventCaptureOptions = {
  /** Keep only events whose origin name matches. Absent: keep everything. */
  filter?: StringMatcher
  /** Event source to attach to. Defaults to the shared dispatcher. */
  dispatcher?: LogDispatcher
  /** Zone used by `lines()`. Defaults to the process time zone. */
  timeZone?: TimeZone
}

export type CaptureSourceOptions = Omit<EventCaptureOptions, "filter">

/**
 * Collects log events while it is open.
 *
 * Attaches to its dispatcher on construction and keeps, in arrival order, a record
 * of every event whose origin passes the filter. `close()` detaches it; the records
 * stay readable afterwards.
 *
 * The capture is a read-only list to its callers: every mutating method throws
 * {@link UnsupportedOperationError}.
 *
 * @example
 * ```ts
 * const logs = EventCapture.forOrigin("accounts")
 * try {
 *   service.createAccount()
 *   expect(logs.hasInfo("Account created")).toBe(true)
 * } finally {
 *   logs.close()
 * }
 * ```
 */
export class EventCapture implements LogListener, EventList {
  private readonly records: EventRecord[] = []
  private readonly filter: StringMatcher | undefined
  private readonly dispatcher: LogDispatcher
  private readonly timeZone: TimeZone | undefined
  private active = true

  constructor(options: EventCaptureOptions = {}) {
    this.filter = options.filter
    this.dispatcher = options.dispatcher ?? defaultLogDispatcher
    this.timeZone = options.timeZone
    this.dispatcher.attach(this)
  }

  static create(options: CaptureSourceOptions = {}): EventCapture {
    return new EventCapture(options)
  }

  static forOrigin(name: string, options: CaptureSourceOptions = {}): EventCapture {
    return new EventCapture({ ...options, filter: StringMatchers.exact(name) })
  }

  /** Capture events from the origin named after a class (or any named thing). */
  static forType(type: NamedOrigin, options: CaptureSourceOptions = {}): EventCapture {
    return EventCapture.forOrigin(originName(type), options)
  }

  static matching(filter: StringMatcher, options: CaptureSourceOptions = {}): EventCapture {
    return new EventCapture({ ...options, filter })
  }

  get isActive(): boolean {
    return this.active
  }

  receive(
    time: EpochMillis,
    name: string,
    level: LogLevelName,
    message: unknown,
    error: unknown,
  ): void {
    if (!this.active) return
    if (this.filter && !this.filter.matches(name)) return

    this.records.push(new EventRecord(time, name, level, message, error))
  }

  /** Stop receiving events. Safe to call more than once. */
  close(): void {
    if (!this.active) return

    this.active = false
    this.dispatcher.detach(this)
  }

  get size(): number {
    return this.records.length
  }

  isEmpty(): boolean {
    return this.records.length === 0
  }

  snapshot(): EventRecord[] {
    return [...this.records]
  }

  /** Every record rendered on its own line, for assertion messages. */
  lines(options: RenderOptions = {}): string[] {
    const renderOptions = { ...options, timeZone: options.timeZone ?? this.timeZone }

    return this.records.map((r) => r.render(renderOptions))
  }

  hasLevel(level: LogLevelName, message: unknown): boolean {
    return this.records.some((r) => r.level === level && valuesEqual(r.message, message))
  }

  hasLevelContaining(level: LogLevelName, text: string): boolean {
    return this.records.some((r) => r.level === level && r.messageString.includes(text))
  }

  hasTrace(message: unknown): boolean {
    return this.hasLevel("trace", message)
  }

  hasDebug(message: unknown): boolean {
    return this.hasLevel("debug", message)
  }

  hasInfo(message: unknown): boolean {
    return this.hasLevel("info", message)
  }

  hasWarn(message: unknown): boolean {
    return this.hasLevel("warn", message)
  }

  hasError(message: unknown): boolean {
    return this.hasLevel("error", message)
  }

  hasTraceContaining(text: string): boolean {
    return this.hasLevelContaining("trace", text)
  }

  hasDebugContaining(text: string): boolean {
    return this.hasLevelContaining("debug", text)
  }

  hasInfoContaining(text: string): boolean {
    return this.hasLevelContaining("info", text)
  }

  hasWarnContaining(text: string): boolean {
    return this.hasLevelContaining("warn", text)
  }

  hasErrorContaining(text: string): boolean {
    return this.hasLevelContaining("error", text)
  }

  get(index: number): EventRecord {
    const record = Number.isInteger(index) && index >= 0 ? this.records[index] : undefined

    if (record === undefined) throw new IndexOutOfRangeError(index, this.records.length)

    return record
  }

  [Symbol.iterator](): Iterator<EventRecord> {
    return this.snapshot()[Symbol.iterator]()
  }

  cursor(index = 0): CaptureCursor {
    return new CaptureCursor(this.records, index)
  }

  indexOf(record: EventRecord): number {
    return this.records.findIndex((r) => r.equals(record))
  }

  lastIndexOf(record: EventRecord): number {
    return this.records.findLastIndex((r) => r.equals(record))
  }

  includes(record: EventRecord): boolean {
    return this.indexOf(record) >= 0
  }

  containsAll(records: Iterable<EventRecord>): boolean {
    for (const record of records) {
      if (!this.includes(record)) return false
    }

    return true
  }

  /** Frozen copy of the records in `[fromIndex, toIndex)`. */
  subList(fromIndex: number, toIndex: number): readonly EventRecord[] {
    const size = this.records.length

    if (!Number.isInteger(fromIndex) || fromIndex < 0 || fromIndex > size) {
      throw new IndexOutOfRangeError(fromIndex, size)
    }
    if (!Number.isInteger(toIndex) || toIndex < fromIndex || toIndex > size) {
      throw new IndexOutOfRangeError(toIndex, size)
    }

    return Object.freeze(this.records.slice(fromIndex, toIndex))
  }

  add(_record: EventRecord): never {
    throw new UnsupportedOperationError("add")
  }

  insert(_index: number, _record: EventRecord): never {
    throw new UnsupportedOperationError("insert")
  }

  set(_index: number, _record: EventRecord): never {
    throw new UnsupportedOperationError("set")
  }

  remove(_record: EventRecord): never {
    throw new UnsupportedOperationError("remove")
  }

  removeAt(_index: number): never {
    throw new UnsupportedOperationError("removeAt")
  }

  addAll(_records: Iterable<EventRecord>): never {
    throw new UnsupportedOperationError("addAll")
  }

  removeAll(_records: Iterable<EventRecord>): never {
    throw new UnsupportedOperationError("removeAll")
  }

  retainAll(_records: Iterable<EventRecord>): never {
    throw new UnsupportedOperationError("retainAll")
  }

  clear(): never {
    throw new UnsupportedOperationError("clear")
  }
}
