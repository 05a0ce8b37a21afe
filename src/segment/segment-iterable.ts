import type { Provenance, SegmentIterable, Span } from "../core/types.ts";

/**
 * createSegmentIterable wraps a generator so every iteration starts over.
 */
export function createSegmentIterable(
  generate: () => Iterable<Span>,
  provenance: Provenance,
): SegmentIterable {
  return {
    provenance,
    [Symbol.iterator]: () => generate()[Symbol.iterator](),
  };
}
