import type { ThrownDescription } from "../ports/error"

/**
 * Type name and message of anything that can be thrown or attached to a log event.
 *
 * @example
 * ```ts
 * describeThrown(new RangeError("bad index"))
 * // { typeName: "RangeError", message: "bad index" }
 *
 * describeThrown("plain")
 * // { typeName: "string", message: "plain" }
 * ```
 */
export function describeThrown(value: unknown): ThrownDescription {
  if (value instanceof Error) {
    return { typeName: errorTypeName(value), message: value.message }
  }

  return { typeName: typeNameOf(value), message: String(value) }
}

// a subclass that never sets `name` still reports "Error"; its class name is more useful
function errorTypeName(err: Error): string {
  if (err.name !== "Error") return err.name

  const ctorName = typeNameOf(err)

  return ctorName === "Object" ? err.name : ctorName
}

function typeNameOf(value: unknown): string {
  if (value === null) return "null"
  if (typeof value !== "object") return typeof value

  const ctor: unknown = Object.getPrototypeOf(value)?.constructor

  return typeof ctor === "function" && ctor.name ? ctor.name : "Object"
}
