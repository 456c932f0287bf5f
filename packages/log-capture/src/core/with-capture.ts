import type { EventCapture } from "./event-capture"

/**
 * Run `body` with an open capture and close the capture when the body finishes,
 * throws, or (for an async body) settles.
 *
 * @example
 * ```ts
 * await withCapture(EventCapture.forType(AccountService), async (logs) => {
 *   await service.createAccount()
 *   expect(logs.hasInfo("Account created")).toBe(true)
 * })
 * ```
 */
export function withCapture<T>(
  capture: EventCapture,
  body: (capture: EventCapture) => Promise<T>,
): Promise<T>
export function withCapture<T>(capture: EventCapture, body: (capture: EventCapture) => T): T
export function withCapture<T>(
  capture: EventCapture,
  body: (capture: EventCapture) => T | Promise<T>,
): T | Promise<T> {
  let result: T | Promise<T>

  try {
    result = body(capture)
  } catch (err) {
    capture.close()
    throw err
  }

  if (result instanceof Promise) {
    return result.finally(() => capture.close())
  }

  capture.close()
  return result
}
