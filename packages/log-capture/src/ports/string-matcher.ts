/**
 * Decides whether a candidate string (an origin name) is accepted.
 *
 * Implementations must be pure: the same candidate always gives the same answer.
 */
export interface StringMatcher {
  matches(candidate: string): boolean
}
