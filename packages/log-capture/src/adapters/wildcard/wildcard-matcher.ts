import type { StringMatcher } from "../../ports/string-matcher"

/**
 * Whole-string glob match: `*` stands for any run of characters (including none),
 * `?` for exactly one. Every other character matches itself.
 *
 * @example
 * ```ts
 * new WildcardMatcher("w*").matches("wombat")      // true
 * new WildcardMatcher("job-?").matches("job-12")   // false
 * ```
 */
export class WildcardMatcher implements StringMatcher {
  private readonly regex: RegExp

  constructor(readonly pattern: string) {
    this.regex = new RegExp(`^${toRegexSource(pattern)}$`, "su")
  }

  matches(candidate: string): boolean {
    return this.regex.test(candidate)
  }
}

function toRegexSource(pattern: string): string {
  let source = ""

  for (const ch of pattern) {
    if (ch === "*") source += ".*"
    else if (ch === "?") source += "."
    else source += ch.replace(/[.+^${}()|[\]\\]/g, "\\$&")
  }

  return source
}
