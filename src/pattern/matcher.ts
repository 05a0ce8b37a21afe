import type { Span } from "../core/types.ts";
import { escapePattern } from "./escape.ts";

/**
 * Pattern engine boundary.
 * Spans are left to right, non-overlapping, in UTF-16 code units.
 */
export interface PatternMatcher {
  findFirst(text: string): Span | undefined;
  findAll(text: string): Iterable<Span>;
}

/**
 * Anything the match APIs accept as a pattern.
 */
export type PatternInput = PatternMatcher | RegExp;

/**
 * RegexMatcherOptions defines an exported structural contract.
 */
export interface RegexMatcherOptions {
  /** Flags used when the pattern is given as source text. Defaults to `"u"`. */
  flags?: string;
}

const DEFAULT_FLAGS = "u";

/**
 * Global, never sticky: matches are searched for anywhere in the text.
 */
function withGlobalFlag(pattern: RegExp): RegExp {
  const flags = pattern.flags.replace("y", "");
  return new RegExp(pattern.source, flags.includes("g") ? flags : `${flags}g`);
}

function toSpan(match: RegExpExecArray | RegExpMatchArray): Span {
  const startCU = match.index ?? 0;
  return { startCU, endCU: startCU + (match[0] ?? "").length };
}

/**
 * Adapt a RegExp to the matcher boundary.
 * Source text is compiled here, so syntax errors surface as the engine's SyntaxError.
 */
export function regexMatcher(
  pattern: RegExp | string,
  options: RegexMatcherOptions = {},
): PatternMatcher {
  const compiled = withGlobalFlag(
    typeof pattern === "string" ? new RegExp(pattern, options.flags ?? DEFAULT_FLAGS) : pattern,
  );

  return {
    findFirst(text) {
      // fresh copy: lastIndex is shared state on a global RegExp
      const regex = new RegExp(compiled.source, compiled.flags);
      const match = regex.exec(text);
      return match ? toSpan(match) : undefined;
    },
    findAll(text) {
      return {
        [Symbol.iterator]: function* () {
          for (const match of text.matchAll(compiled)) {
            yield toSpan(match);
          }
        },
      };
    },
  };
}

/**
 * Matcher for the literal text.
 * Compiled without `u` so it compares code units, like `String.prototype.includes`;
 * a lone surrogate matches half of a pair.
 */
export function literalMatcher(text: string): PatternMatcher {
  return regexMatcher(escapePattern(text), { flags: "" });
}

export function isPatternMatcher(value: PatternInput): value is PatternMatcher {
  return !(value instanceof RegExp);
}

/**
 * Normalize a PatternInput into a matcher.
 */
export function toMatcher(pattern: PatternInput): PatternMatcher {
  return isPatternMatcher(pattern) ? pattern : regexMatcher(pattern);
}
