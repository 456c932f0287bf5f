import { LogDispatcher } from "@logtrap/logger"
import { EventCapture } from "../event-capture"
import { withCapture } from "../with-capture"

describe("withCapture", () => {
  let dispatcher: LogDispatcher

  beforeEach(() => {
    dispatcher = new LogDispatcher()
  })

  it("closes after a synchronous body and returns its result", () => {
    const capture = EventCapture.create({ dispatcher })

    const result = withCapture(capture, (logs) => {
      dispatcher.dispatch(0, "jobs", "info", "inside", null)
      return logs.size
    })

    expect(result).toBe(1)
    expect(capture.isActive).toBe(false)
    expect(dispatcher.listenerCount).toBe(0)
  })

  it("closes when the body throws", () => {
    const capture = EventCapture.create({ dispatcher })

    expect(() =>
      withCapture(capture, () => {
        throw new Error("body failed")
      }),
    ).toThrow("body failed")
    expect(capture.isActive).toBe(false)
  })

  it("stays open until an async body settles", async () => {
    const capture = EventCapture.create({ dispatcher })
    let release: () => void = () => {}
    const gate = new Promise<void>((resolve) => {
      release = resolve
    })

    const pending = withCapture(capture, async () => {
      await gate
      dispatcher.dispatch(0, "jobs", "info", "after await", null)
      return "done"
    })

    expect(capture.isActive).toBe(true)
    release()

    await expect(pending).resolves.toBe("done")
    expect(capture.isActive).toBe(false)
    expect(capture.hasInfo("after await")).toBe(true)
  })

  it("closes when an async body rejects", async () => {
    const capture = EventCapture.create({ dispatcher })

    await expect(
      withCapture(capture, async () => {
        throw new Error("async failure")
      }),
    ).rejects.toThrow("async failure")
    expect(capture.isActive).toBe(false)
  })
})
