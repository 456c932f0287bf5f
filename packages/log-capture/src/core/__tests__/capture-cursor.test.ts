import { CaptureCursor } from "../capture-cursor"
import { IndexOutOfRangeError, NoSuchElementError, UnsupportedOperationError } from "../errors"
import { EventRecord } from "../event-record"

const first = new EventRecord(1_000, "jobs", "info", "first")
const second = new EventRecord(2_000, "jobs", "warn", "second")

describe("CaptureCursor", () => {
  it("walks forward then back", () => {
    const cursor = new CaptureCursor([first, second])

    expect(cursor.hasPrevious()).toBe(false)
    expect(cursor.next()).toBe(first)
    expect(cursor.next()).toBe(second)
    expect(cursor.hasNext()).toBe(false)
    expect(cursor.previous()).toBe(second)
    expect(cursor.previous()).toBe(first)
    expect(cursor.hasPrevious()).toBe(false)
  })

  it("reports the indexes around its position", () => {
    const cursor = new CaptureCursor([first, second], 1)

    expect(cursor.nextIndex()).toBe(1)
    expect(cursor.previousIndex()).toBe(0)
  })

  it("starting at the end can only go back", () => {
    const cursor = new CaptureCursor([first, second], 2)

    expect(cursor.hasPrevious()).toBe(true)
    expect(cursor.hasNext()).toBe(false)
    expect(() => cursor.next()).toThrow(NoSuchElementError)
    expect(cursor.previous()).toBe(second)
  })

  it("refuses to move before the start", () => {
    const cursor = new CaptureCursor([first])

    expect(() => cursor.previous()).toThrow(NoSuchElementError)
    expect(cursor.nextIndex()).toBe(0)
  })

  it("rejects a start index outside the list", () => {
    expect(() => new CaptureCursor([first], -1)).toThrow(IndexOutOfRangeError)
    expect(() => new CaptureCursor([first], 1.5)).toThrow(IndexOutOfRangeError)
    expect(() => new CaptureCursor([first], 2)).toThrow("Index 2 beyond end of list 1")
  })

  it("sees records appended after it was made", () => {
    const records = [first]
    const cursor = new CaptureCursor(records, 1)

    records.push(second)

    expect(cursor.hasNext()).toBe(true)
    expect(cursor.next()).toBe(second)
  })

  it("rejects every structural change", () => {
    const cursor = new CaptureCursor([first])

    expect(() => cursor.remove()).toThrow(UnsupportedOperationError)
    expect(() => cursor.set(second)).toThrow(UnsupportedOperationError)
    expect(() => cursor.add(second)).toThrow(UnsupportedOperationError)
  })
})
