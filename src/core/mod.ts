export type {
  GraphemeSpan,
  OffsetUnit,
  Provenance,
  SegmentIterable,
  Span,
  TextInput,
} from "./types.ts";
export type { GraphemeIndexErrorCode } from "./error.ts";
export { GraphemeIndexError, isGraphemeIndexError } from "./error.ts";
export type { Lazy } from "./lazy.ts";
export { createLazy } from "./lazy.ts";
export { iterateCodePoints, utf8Length } from "./codepoint.ts";
export { sliceBySpan, toArray } from "./span.ts";
export { IMPLEMENTATION_ID, LIBRARY_VERSION, UNICODE_VERSION } from "./version.ts";
