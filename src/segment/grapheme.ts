import { normalizeInput } from "../core/input.ts";
import { createProvenance } from "../core/provenance.ts";
import type { SegmentIterable, Span, TextInput } from "../core/types.ts";
import { IMPLEMENTATION_ID, UNICODE_VERSION } from "../core/version.ts";
import { createSegmentIterable } from "./segment-iterable.ts";

/**
 * One extended grapheme cluster as reported by a segmentation collaborator.
 * Units: UTF-16 code units.
 */
export interface GraphemeBoundary {
  startCU: number;
  text: string;
}

/**
 * Segmentation collaborator: ordered clusters covering the whole text.
 */
export type GraphemeBoundaries = (text: string) => Iterable<GraphemeBoundary>;

/**
 * GraphemeSegmentOptions defines an exported structural contract.
 */
export interface GraphemeSegmentOptions {
  algorithmRevision?: string;
  boundaries?: GraphemeBoundaries;
}

const UAX29_SPEC = "https://unicode.org/reports/tr29/";

let segmenter: Intl.Segmenter | undefined;

function getSegmenter(): Intl.Segmenter {
  // "und" keeps cluster rules locale-independent
  segmenter ??= new Intl.Segmenter("und", { granularity: "grapheme" });
  return segmenter;
}

/**
 * Extended grapheme clusters from the runtime's ICU data.
 * Units: UTF-16 code units.
 */
export const intlGraphemeBoundaries: GraphemeBoundaries = function* (text) {
  for (const part of getSegmenter().segment(text)) {
    yield { startCU: part.index, text: part.segment };
  }
};

/**
 * Segment grapheme clusters using UAX #29.
 * Units: UTF-16 code units.
 */
export function segmentGraphemes(
  input: TextInput,
  options: GraphemeSegmentOptions = {},
): SegmentIterable {
  const { text } = normalizeInput(input);
  const boundaries = options.boundaries ?? intlGraphemeBoundaries;
  const normalizedOptions = {
    algorithmRevision: options.algorithmRevision ?? `Unicode ${UNICODE_VERSION}`,
    boundaries: boundaries === intlGraphemeBoundaries ? "intl" : "custom",
  };
  const algorithm = {
    name: "UAX29.Grapheme",
    spec: UAX29_SPEC,
    revisionOrDate: normalizedOptions.algorithmRevision,
    implementationId: IMPLEMENTATION_ID,
  };
  const provenance = createProvenance(algorithm, normalizedOptions, {
    text: "utf16-code-unit",
    token: "uax29-grapheme",
    grapheme: "uax29-grapheme",
  });

  const generate = function* (): Iterable<Span> {
    for (const boundary of boundaries(text)) {
      yield { startCU: boundary.startCU, endCU: boundary.startCU + boundary.text.length };
    }
  };

  return createSegmentIterable(generate, provenance);
}

/**
 * Cluster texts in order.
 */
export function splitGraphemes(input: TextInput, options: GraphemeSegmentOptions = {}): string[] {
  const { text } = normalizeInput(input);
  const boundaries = options.boundaries ?? intlGraphemeBoundaries;
  return Array.from(boundaries(text), (boundary) => boundary.text);
}
