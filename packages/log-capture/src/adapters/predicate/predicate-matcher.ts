import type { StringMatcher } from "../../ports/string-matcher"

export type StringPredicate = (candidate: string) => boolean

export class PredicateMatcher implements StringMatcher {
  constructor(private readonly predicate: StringPredicate) {}

  matches(candidate: string): boolean {
    return this.predicate(candidate)
  }
}
