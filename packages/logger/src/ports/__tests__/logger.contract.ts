import { FakeClock } from "@logtrap/clock"
import { LogDispatcher } from "../../core/log-dispatcher"
import type { LogListener } from "../log-listener"
import type { LoggerHarness } from "./logger-harness"

type Received = Parameters<LogListener["receive"]>

function recordingListener() {
  const received: Received[] = []
  const listener: LogListener = {
    receive: (...args) => {
      received.push(args)
    },
  }

  return { listener, received }
}

export function describeLoggerContract(h: LoggerHarness) {
  describe(`Logger contract: ${h.name}`, () => {
    const start = Date.UTC(2024, 0, 1, 12, 0, 0, 0)

    function setup(level?: Parameters<LoggerHarness["make"]>[0]["level"]) {
      const clock = new FakeClock(start)
      const dispatcher = new LogDispatcher()
      const { listener, received } = recordingListener()
      dispatcher.attach(listener)

      const logger = h.make({ origin: "payments", level, clock, dispatcher })

      return { logger, clock, dispatcher, listener, received }
    }

    it("exposes its origin name and level", () => {
      const { logger } = setup("warn")

      expect(logger.name).toBe("payments")
      expect(logger.level).toBe("warn")
    })

    it("defaults to the info level", () => {
      const { logger } = setup()

      expect(logger.level).toBe("info")
      expect(logger.isEnabled("debug")).toBe(false)
      expect(logger.isEnabled("info")).toBe(true)
    })

    it("dispatches each enabled event with clock time, name, level, message and error", () => {
      const { logger, clock, received } = setup("trace")
      const err = new Error("declined")

      logger.info("charge started")
      clock.advance(25)
      logger.error("charge failed", err)

      expect(received).toEqual([
        [start, "payments", "info", "charge started", null],
        [start + 25, "payments", "error", "charge failed", err],
      ])
    })

    it("routes every level method to its own level", () => {
      const { logger, received } = setup("trace")

      logger.trace("t")
      logger.debug("d")
      logger.info("i")
      logger.warn("w")
      logger.error("e")

      expect(received.map(([, , level, message]) => [level, message])).toEqual([
        ["trace", "t"],
        ["debug", "d"],
        ["info", "i"],
        ["warn", "w"],
        ["error", "e"],
      ])
    })

    it("suppresses events below the configured minimum", () => {
      const { logger, received } = setup("warn")

      logger.info("info")
      logger.warn("warn")
      logger.error("error")

      expect(received.map(([, , level]) => level)).toEqual(["warn", "error"])
    })

    it("hands listeners the message object itself, unconverted", () => {
      const { logger, received } = setup("trace")
      const toString = vi.fn(() => "lazy")
      const message = { toString }

      logger.debug(message)

      expect(received[0]?.[3]).toBe(message)
      expect(received[0]?.[4]).toBeNull()
    })

    it("stops delivering to a detached listener", () => {
      const { logger, dispatcher, listener, received } = setup("trace")

      logger.info("first")
      dispatcher.detach(listener)
      logger.info("second")

      expect(received).toHaveLength(1)
    })
  })
}
