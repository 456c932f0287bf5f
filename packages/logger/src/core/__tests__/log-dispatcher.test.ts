import { mock } from "vitest-mock-extended"
import type { LogListener } from "../../ports/log-listener"
import { LogDispatcher } from "../log-dispatcher"

function namedListener(name: string, calls: string[]): LogListener {
  return {
    receive: (_time, origin, level, message) => {
      calls.push(`${name}:${origin}:${level}:${String(message)}`)
    },
  }
}

describe("LogDispatcher", () => {
  it("delivers nothing when no listener is attached", () => {
    const dispatcher = new LogDispatcher()

    expect(() => dispatcher.dispatch(0, "x", "info", "m", null)).not.toThrow()
    expect(dispatcher.listenerCount).toBe(0)
  })

  it("delivers every event to every listener in attach order", () => {
    const calls: string[] = []
    const dispatcher = new LogDispatcher()
    dispatcher.attach(namedListener("a", calls))
    dispatcher.attach(namedListener("b", calls))

    dispatcher.dispatch(1, "goanna", "info", "alpha", null)
    dispatcher.dispatch(2, "skink", "warn", "beta", null)

    expect(calls).toEqual([
      "a:goanna:info:alpha",
      "b:goanna:info:alpha",
      "a:skink:warn:beta",
      "b:skink:warn:beta",
    ])
  })

  it("attaches a listener only once", () => {
    const calls: string[] = []
    const dispatcher = new LogDispatcher()
    const listener = namedListener("a", calls)

    dispatcher.attach(listener)
    dispatcher.attach(listener)
    dispatcher.dispatch(1, "x", "info", "m", null)

    expect(dispatcher.listenerCount).toBe(1)
    expect(calls).toEqual(["a:x:info:m"])
  })

  it("detach() is idempotent and reports whether anything was removed", () => {
    const dispatcher = new LogDispatcher()
    const listener = namedListener("a", [])
    dispatcher.attach(listener)

    expect(dispatcher.isAttached(listener)).toBe(true)
    expect(dispatcher.detach(listener)).toBe(true)
    expect(dispatcher.detach(listener)).toBe(false)
    expect(dispatcher.isAttached(listener)).toBe(false)
  })

  it("lets a listener detach another one mid-dispatch without skipping it this time", () => {
    const calls: string[] = []
    const dispatcher = new LogDispatcher()
    const second = namedListener("b", calls)
    const first: LogListener = {
      receive: () => {
        calls.push("a")
        dispatcher.detach(second)
      },
    }

    dispatcher.attach(first)
    dispatcher.attach(second)

    dispatcher.dispatch(1, "x", "info", "m", null)
    dispatcher.dispatch(2, "x", "info", "n", null)

    expect(calls).toEqual(["a", "b:x:info:m", "a"])
  })

  it("propagates a listener failure to the caller", () => {
    const dispatcher = new LogDispatcher()
    dispatcher.attach({
      receive: () => {
        throw new Error("listener broke")
      },
    })

    expect(() => dispatcher.dispatch(1, "x", "info", "m", null)).toThrow("listener broke")
  })

  it("passes every field of the event through", () => {
    const dispatcher = new LogDispatcher()
    const listener = mock<LogListener>()
    const error = new Error("boom")
    dispatcher.attach(listener)

    dispatcher.dispatch(1_700_000_000_000, "billing", "error", "charge failed", error)

    expect(listener.receive).toHaveBeenCalledExactlyOnceWith(
      1_700_000_000_000,
      "billing",
      "error",
      "charge failed",
      error,
    )
  })
})
