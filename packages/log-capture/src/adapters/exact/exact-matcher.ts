import type { StringMatcher } from "../../ports/string-matcher"

export class ExactMatcher implements StringMatcher {
  constructor(readonly text: string) {}

  matches(candidate: string): boolean {
    return candidate === this.text
  }
}
