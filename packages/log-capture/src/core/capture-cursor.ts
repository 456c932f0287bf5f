import type { EventCursor } from "../ports/event-list"
import { IndexOutOfRangeError, NoSuchElementError, UnsupportedOperationError } from "./errors"
import type { EventRecord } from "./event-record"

/**
 * Cursor over a live record list: records appended after the cursor was made are
 * reachable through `next()`.
 */
export class CaptureCursor implements EventCursor {
  private index: number

  constructor(
    private readonly records: readonly EventRecord[],
    index = 0,
  ) {
    if (!Number.isInteger(index) || index < 0 || index > records.length) {
      throw new IndexOutOfRangeError(
        index,
        records.length,
        index > records.length ? `Index ${index} beyond end of list ${records.length}` : undefined,
      )
    }

    this.index = index
  }

  hasNext(): boolean {
    return this.index < this.records.length
  }

  next(): EventRecord {
    const record = this.records[this.index]

    if (record === undefined) throw new NoSuchElementError(this.index, "next")

    this.index++
    return record
  }

  hasPrevious(): boolean {
    return this.index > 0
  }

  previous(): EventRecord {
    const record = this.index > 0 ? this.records[this.index - 1] : undefined

    if (record === undefined) throw new NoSuchElementError(this.index, "previous")

    this.index--
    return record
  }

  nextIndex(): number {
    return this.index
  }

  previousIndex(): number {
    return this.index - 1
  }

  remove(): never {
    throw new UnsupportedOperationError("remove")
  }

  set(_record: EventRecord): never {
    throw new UnsupportedOperationError("set")
  }

  add(_record: EventRecord): never {
    throw new UnsupportedOperationError("add")
  }
}
