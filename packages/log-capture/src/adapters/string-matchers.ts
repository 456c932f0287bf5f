import type { StringMatcher } from "../ports/string-matcher"
import { ExactMatcher } from "./exact/exact-matcher"
import { PredicateMatcher, type StringPredicate } from "./predicate/predicate-matcher"
import { WildcardMatcher } from "./wildcard/wildcard-matcher"

export const StringMatchers = {
  exact: (text: string): StringMatcher => new ExactMatcher(text),
  wildcard: (pattern: string): StringMatcher => new WildcardMatcher(pattern),
  predicate: (predicate: StringPredicate): StringMatcher => new PredicateMatcher(predicate),
} as const
