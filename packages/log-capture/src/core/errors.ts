import { BaseError } from "@logtrap/errors"

/** A structural change was attempted on a read-only view of captured events. */
export class UnsupportedOperationError extends BaseError<"unsupported_operation"> {
  constructor(operation: string) {
    super(`${operation}() is not supported: captured events are read-only`, {
      code: "unsupported_operation",
      context: { operation },
      isOperational: false,
    })
  }
}

export class IndexOutOfRangeError extends BaseError<"index_out_of_range"> {
  constructor(index: number, size: number, message?: string) {
    super(message ?? `Index ${index} out of range for size ${size}`, {
      code: "index_out_of_range",
      context: { index, size },
      isOperational: false,
    })
  }
}

/** A cursor was moved past its first or last element. */
export class NoSuchElementError extends BaseError<"no_such_element"> {
  constructor(index: number, direction: "next" | "previous") {
    super(`No ${direction} element at index ${index}`, {
      code: "no_such_element",
      context: { index, direction },
      isOperational: false,
    })
  }
}
