export type { GraphemeBoundaries, GraphemeBoundary, GraphemeSegmentOptions } from "./grapheme.ts";
export { intlGraphemeBoundaries, segmentGraphemes, splitGraphemes } from "./grapheme.ts";
export { createSegmentIterable } from "./segment-iterable.ts";
