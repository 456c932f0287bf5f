import type { EpochMillis } from "@logtrap/clock"
import type { LogLevelName } from "../ports/log-level"
import type { LogListener } from "../ports/log-listener"

/**
 * Fans emitted log events out to attached listeners.
 *
 * Delivery is synchronous and in attach order. Each dispatch walks a copy of the
 * listener set, so a listener may attach or detach (itself or others) while an
 * event is being delivered; the change applies from the next event on.
 */
export class LogDispatcher {
  private readonly listeners = new Set<LogListener>()

  get listenerCount(): number {
    return this.listeners.size
  }

  attach(listener: LogListener): void {
    this.listeners.add(listener)
  }

  /** Returns `false` when the listener was not attached. */
  detach(listener: LogListener): boolean {
    return this.listeners.delete(listener)
  }

  isAttached(listener: LogListener): boolean {
    return this.listeners.has(listener)
  }

  dispatch(
    time: EpochMillis,
    name: string,
    level: LogLevelName,
    message: unknown,
    error: unknown,
  ): void {
    if (this.listeners.size === 0) return

    for (const listener of [...this.listeners]) {
      listener.receive(time, name, level, message, error)
    }
  }
}

/** Dispatcher shared by every logger and capture that is not given one. */
export const defaultLogDispatcher = new LogDispatcher()
