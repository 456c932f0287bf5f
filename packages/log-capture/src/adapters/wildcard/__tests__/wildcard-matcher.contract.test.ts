import { describeStringMatcherContract } from "../../../ports/__tests__/string-matcher.contract"
import { WildcardMatcher } from "../wildcard-matcher"

describeStringMatcherContract({
  name: "WildcardMatcher",
  make: () => new WildcardMatcher("w*"),
  accepted: ["wallaby", "wombat", "w"],
  rejected: ["echidna", "Wombat", "awombat", ""],
})
