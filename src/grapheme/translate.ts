import { toArray } from "../core/span.ts";
import type { Span } from "../core/types.ts";
import type { PatternInput } from "../pattern/matcher.ts";
import { toMatcher } from "../pattern/matcher.ts";
import { GraphemeMatch } from "./match.ts";
import type { GraphemeString } from "./string.ts";

/**
 * Restartable sequence of matches; every iteration runs the pattern again.
 */
export interface MatchIterable extends Iterable<GraphemeMatch> {
  toArray(): GraphemeMatch[];
}

/**
 * Translate a code-unit match into grapheme indices.
 *
 * The text is re-sliced from `source` at the translated indices rather than copied
 * from the raw span, so a span that cuts through a cluster does not keep its exact
 * matched text.
 */
export function translateSpan(source: GraphemeString, span: Span): GraphemeMatch {
  const start = source.locate(span.startCU);
  const end = source.locate(span.endCU);
  return new GraphemeMatch(start, end, source.slice(start, end));
}

export function findFirstMatch(
  source: GraphemeString,
  pattern: PatternInput,
): GraphemeMatch | undefined {
  const span = toMatcher(pattern).findFirst(source.text);
  return span ? translateSpan(source, span) : undefined;
}

export function findAllMatches(source: GraphemeString, pattern: PatternInput): MatchIterable {
  const matcher = toMatcher(pattern);
  const generate = function* (): Iterable<GraphemeMatch> {
    for (const span of matcher.findAll(source.text)) {
      yield translateSpan(source, span);
    }
  };
  return {
    [Symbol.iterator]: () => generate()[Symbol.iterator](),
    toArray: () => toArray(generate()),
  };
}
