export { BaseError, type BaseErrorOptions, type SerializeOptions, serializeError } from "./core/base-error"
export { describeThrown } from "./core/describe-thrown"
export type * from "./ports/error"
