import { utf8Length } from "../core/codepoint.ts";
import { GraphemeIndexError } from "../core/error.ts";
import { fnv1a32 } from "../core/hash.ts";
import { normalizeInput } from "../core/input.ts";
import type { Lazy } from "../core/lazy.ts";
import { createLazy } from "../core/lazy.ts";
import { createLogger } from "../core/log.ts";
import type { TextInput } from "../core/types.ts";
import type { PatternInput } from "../pattern/matcher.ts";
import type { GraphemeBoundaries } from "../segment/grapheme.ts";
import { intlGraphemeBoundaries } from "../segment/grapheme.ts";
import { Grapheme } from "./grapheme.ts";
import type { LocatorEntry } from "./locator.ts";
import { buildLocator, locateOffset } from "./locator.ts";
import { GraphemeMatch } from "./match.ts";
import { assertGraphemeRange, sliceGraphemes } from "./slice.ts";
import type { MatchIterable } from "./translate.ts";
import { findAllMatches, findFirstMatch } from "./translate.ts";

const log = createLogger("string");
const inspectCustom = Symbol.for("nodejs.util.inspect.custom");
const INT32_MIN = -2147483648;
const INT32_MAX = 2147483647;

/**
 * GraphemeStringOptions defines an exported structural contract.
 */
export interface GraphemeStringOptions {
  /** Segmentation collaborator; defaults to `Intl.Segmenter`. */
  boundaries?: GraphemeBoundaries;
}

/**
 * Values accepted by `GraphemeString.from`.
 */
export type GraphemeStringLike = TextInput | number | GraphemeString | GraphemeMatch;

/**
 * Immutable text indexed by extended grapheme clusters.
 *
 * Lengths, indices, slices and match positions count clusters. The cluster list and
 * the offset table are computed on first use and kept for the life of the instance.
 * Equality and hashing look at the raw text only.
 */
export class GraphemeString implements Iterable<Grapheme> {
  readonly text: string;
  private readonly boundaries: GraphemeBoundaries;
  private readonly graphemeCache: Lazy<readonly Grapheme[]>;
  private readonly locatorCache: Lazy<readonly LocatorEntry[]>;

  constructor(input: TextInput = "", options: GraphemeStringOptions = {}) {
    this.text = normalizeInput(input).text;
    this.boundaries = options.boundaries ?? intlGraphemeBoundaries;
    this.graphemeCache = createLazy(() => {
      const graphemes = Array.from(this.boundaries(this.text), (part) => new Grapheme(part.text));
      log("segmented %d code units into %d graphemes", this.text.length, graphemes.length);
      return Object.freeze(graphemes);
    });
    this.locatorCache = createLazy(() =>
      Object.freeze(
        buildLocator(this.graphemes().map((grapheme) => grapheme.value)).map((entry) =>
          Object.freeze(entry),
        ),
      ),
    );
  }

  static from(value: GraphemeStringLike, options: GraphemeStringOptions = {}): GraphemeString {
    if (value instanceof GraphemeString) return value;
    if (value instanceof GraphemeMatch) return value.text;
    if (typeof value === "number") return new GraphemeString(String(value), options);
    return new GraphemeString(value, options);
  }

  static empty(): GraphemeString {
    return new GraphemeString("");
  }

  /**
   * Clusters in order; computed once.
   */
  graphemes(): readonly Grapheme[] {
    return this.graphemeCache.get();
  }

  /**
   * One entry per cluster start, sorted; computed once.
   */
  locatorEntries(): readonly LocatorEntry[] {
    return this.locatorCache.get();
  }

  /**
   * Number of grapheme clusters.
   */
  get length(): number {
    return this.graphemes().length;
  }

  get codeUnitLength(): number {
    return this.text.length;
  }

  get byteLength(): number {
    return utf8Length(this.text);
  }

  isEmpty(): boolean {
    return this.text.length === 0;
  }

  graphemeAt(index: number): Grapheme | undefined {
    return this.graphemes()[index];
  }

  /**
   * Clusters `[start, end)` without negative-index remapping.
   */
  graphemeRange(start: number, end: number): readonly Grapheme[] {
    const graphemes = this.graphemes();
    assertGraphemeRange(start, end, graphemes.length);
    return graphemes.slice(start, end);
  }

  /**
   * Clusters `[start, end)` as a new string.
   *
   * A negative index `v` becomes `length + v + 1`: `slice(0, -1)` is the whole string
   * and `slice(-2, -1)` is the last cluster. Indices outside `[0, length]` after
   * remapping throw `SLICE_OUT_OF_RANGE`.
   */
  slice(start: number, end: number): GraphemeString {
    return this.derive(sliceGraphemes(this.graphemes(), start, end));
  }

  /**
   * Grapheme index for a UTF-16 code unit offset.
   * Offsets inside a cluster resolve to the following cluster.
   */
  locate(offsetCU: number): number {
    return locateOffset(this.locatorEntries(), offsetCU, "utf16-code-unit", this.length);
  }

  /**
   * Grapheme index for a UTF-8 byte offset.
   * Offsets inside a cluster resolve to the following cluster.
   */
  locateByte(offsetB: number): number {
    return locateOffset(this.locatorEntries(), offsetB, "utf8-byte", this.length);
  }

  /**
   * Raw substring test on code units; no grapheme alignment is involved.
   */
  contains(substring: string | GraphemeString): boolean {
    return this.text.includes(typeof substring === "string" ? substring : substring.text);
  }

  find(pattern: PatternInput): GraphemeMatch | undefined {
    return findFirstMatch(this, pattern);
  }

  findAll(pattern: PatternInput): MatchIterable {
    return findAllMatches(this, pattern);
  }

  concat(...parts: Array<string | GraphemeString>): GraphemeString {
    const tail = parts.map((part) => (typeof part === "string" ? part : part.text)).join("");
    return this.derive(this.text + tail);
  }

  equals(other: GraphemeString | string): boolean {
    return this.text === (typeof other === "string" ? other : other.text);
  }

  hashCode(): string {
    return fnv1a32(this.text);
  }

  /**
   * Parse the text as a signed 32-bit decimal integer.
   */
  toInteger(): number {
    const parsed = /^[+-]?\d+$/.test(this.text) ? Number.parseInt(this.text, 10) : Number.NaN;
    if (!Number.isSafeInteger(parsed) || parsed < INT32_MIN || parsed > INT32_MAX) {
      throw new GraphemeIndexError(
        "PARSE_INVALID_INTEGER",
        `Cannot parse ${JSON.stringify(this.text)} as a 32-bit integer`,
        { text: this.text },
      );
    }
    return parsed;
  }

  *[Symbol.iterator](): Iterator<Grapheme> {
    yield* this.graphemes();
  }

  toString(): string {
    return this.text;
  }

  toJSON(): string {
    return this.text;
  }

  [inspectCustom](): string {
    return JSON.stringify(this.text);
  }

  private derive(text: string): GraphemeString {
    return new GraphemeString(text, { boundaries: this.boundaries });
  }
}
