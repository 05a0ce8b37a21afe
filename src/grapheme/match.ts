import { GraphemeIndexError } from "../core/error.ts";
import { createLogger } from "../core/log.ts";
import { sliceBySpan } from "../core/span.ts";
import type { GraphemeSpan, Span } from "../core/types.ts";
import { literalMatcher } from "../pattern/matcher.ts";
import type { GraphemeString } from "./string.ts";

const log = createLogger("match");
const inspectCustom = Symbol.for("nodejs.util.inspect.custom");

/**
 * Where the expected text of an invalid match actually occurs in the source.
 */
export interface MatchOccurrence {
  span: Span;
  start: number;
  end: number;
  text: string;
}

/**
 * Payload of a `MATCH_INVALID` error.
 */
export interface InvalidMatchDetails {
  start: number;
  end: number;
  expected: string;
  actual: string | null;
  occurrences: MatchOccurrence[];
  source: string;
}

/**
 * A match in grapheme indices, `end` exclusive.
 *
 * The text is owned and holds no reference to the source it came from. Nothing is
 * checked on construction; call `isValid` or `ensureValid` with the source.
 */
export class GraphemeMatch {
  readonly start: number;
  readonly end: number;
  readonly text: GraphemeString;

  constructor(start: number, end: number, text: GraphemeString) {
    this.start = start;
    this.end = end;
    this.text = text;
  }

  get span(): GraphemeSpan {
    return { start: this.start, end: this.end };
  }

  asString(): string {
    return this.text.text;
  }

  toGraphemeString(): GraphemeString {
    return this.text;
  }

  equals(other: GraphemeMatch): boolean {
    return this.start === other.start && this.end === other.end && this.text.equals(other.text);
  }

  /**
   * The text found in `source` at this match's indices, or `null` when they fall outside it.
   */
  sliceFrom(source: GraphemeString): GraphemeString | null {
    if (!isIndex(this.start) || !isIndex(this.end)) return null;
    if (this.start > this.end || this.end > source.length) return null;
    return source.slice(this.start, this.end);
  }

  isValid(source: GraphemeString): boolean {
    const found = this.sliceFrom(source);
    return found !== null && found.equals(this.text);
  }

  /**
   * Throws `MATCH_INVALID` unless `source` reproduces this match's text at its indices.
   * The error lists where the text does occur, found by a literal re-search.
   */
  ensureValid(source: GraphemeString): this {
    const found = this.sliceFrom(source);
    if (found !== null && found.equals(this.text)) {
      log("valid %s in %O", this.toDebugString(), source.text);
      return this;
    }

    const expected = this.text.text;
    const occurrences: MatchOccurrence[] = [];
    for (const span of literalMatcher(expected).findAll(source.text)) {
      const start = source.locate(span.startCU);
      const end = source.locate(span.endCU);
      occurrences.push({ span, start, end, text: source.slice(start, end).text });
    }

    const details: InvalidMatchDetails = {
      start: this.start,
      end: this.end,
      expected,
      actual: found === null ? null : found.text,
      occurrences,
      source: source.text,
    };
    log("invalid %s: %O", this.toDebugString(), details);
    throw new GraphemeIndexError("MATCH_INVALID", formatInvalidMatch(this, details, source), {
      ...details,
    });
  }

  toDebugString(): string {
    return `GraphemeMatch { start: ${this.start}, end: ${this.end}, text: ${JSON.stringify(
      this.text.text,
    )} }`;
  }

  toJSON(): { start: number; end: number; text: string } {
    return { start: this.start, end: this.end, text: this.text.text };
  }

  toString(): string {
    return this.text.text;
  }

  [inspectCustom](): string {
    return this.toDebugString();
  }
}

function isIndex(value: number): boolean {
  return Number.isInteger(value) && value >= 0;
}

function formatInvalidMatch(
  match: GraphemeMatch,
  details: InvalidMatchDetails,
  source: GraphemeString,
): string {
  const lines: string[] = [];
  if (details.occurrences.length > 0) {
    const found = details.occurrences
      .map((occurrence) => {
        const raw = sliceBySpan(source.text, occurrence.span);
        return `[${occurrence.start},${occurrence.end}]: ${JSON.stringify(occurrence.text)} (code units ${occurrence.span.startCU}..${occurrence.span.endCU}, raw ${JSON.stringify(raw)})`;
      })
      .join(", ");
    lines.push(`not found at [${match.start},${match.end}] but found at ${found}`);
  }
  const actual = details.actual === null ? "out of range" : JSON.stringify(details.actual);
  lines.push(
    `substring ${JSON.stringify(details.expected)} not at source.slice(${match.start}, ${match.end}): ${actual}`,
  );
  lines.push(`invalid ${match.toDebugString()}`);
  lines.push(JSON.stringify(details.source));
  return lines.join("\n");
}
