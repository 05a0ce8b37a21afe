export type { PatternInput, PatternMatcher, RegexMatcherOptions } from "./matcher.ts";
export { literalMatcher, regexMatcher, toMatcher } from "./matcher.ts";
export { escapePattern } from "./escape.ts";
