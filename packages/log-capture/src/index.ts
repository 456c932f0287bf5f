export { ExactMatcher } from "./adapters/exact/exact-matcher"
export { PredicateMatcher, type StringPredicate } from "./adapters/predicate/predicate-matcher"
export { StringMatchers } from "./adapters/string-matchers"
export { WildcardMatcher } from "./adapters/wildcard/wildcard-matcher"
export { CaptureCursor } from "./core/capture-cursor"
export { IndexOutOfRangeError, NoSuchElementError, UnsupportedOperationError } from "./core/errors"
export {
  type CaptureSourceOptions,
  EventCapture,
  type EventCaptureOptions,
} from "./core/event-capture"
export { EventRecord, type RenderOptions } from "./core/event-record"
export { withCapture } from "./core/with-capture"
export type { EventCursor, EventList } from "./ports/event-list"
export type { StringMatcher } from "./ports/string-matcher"
