import type { EventRecord } from "../core/event-record"

/**
 * Bidirectional position over a list of records. The position sits between
 * elements: `next()` returns the element after it, `previous()` the one before.
 */
export interface EventCursor {
  hasNext(): boolean
  next(): EventRecord
  hasPrevious(): boolean
  previous(): EventRecord
  nextIndex(): number
  previousIndex(): number
}

/**
 * Read capability over captured records, in arrival order.
 */
export interface EventList extends Iterable<EventRecord> {
  readonly size: number
  isEmpty(): boolean
  get(index: number): EventRecord
  indexOf(record: EventRecord): number
  lastIndexOf(record: EventRecord): number
  includes(record: EventRecord): boolean
  containsAll(records: Iterable<EventRecord>): boolean
  cursor(index?: number): EventCursor
  subList(fromIndex: number, toIndex: number): readonly EventRecord[]
  snapshot(): EventRecord[]
}
