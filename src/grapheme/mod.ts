export type { GraphemeStringLike, GraphemeStringOptions } from "./string.ts";
export { GraphemeString } from "./string.ts";
export { Grapheme } from "./grapheme.ts";
export type { InvalidMatchDetails, MatchOccurrence } from "./match.ts";
export { GraphemeMatch } from "./match.ts";
export type { LocatorEntry } from "./locator.ts";
export { buildLocator, locateOffset } from "./locator.ts";
export { resolveSliceIndex, sliceGraphemes } from "./slice.ts";
export type { MatchIterable } from "./translate.ts";
export { findAllMatches, findFirstMatch, translateSpan } from "./translate.ts";
