import { GraphemeIndexError } from "../core/error.ts";
import type { Grapheme } from "./grapheme.ts";

/**
 * Map a possibly negative slice index onto `[0, count]`.
 *
 * Negative values resolve to `count + value + 1`, so `-1` is `count` (one past the
 * last cluster) and `-2` is the last cluster. Out-of-range results throw instead of
 * being clamped.
 */
export function resolveSliceIndex(value: number, count: number): number {
  if (!Number.isInteger(value)) {
    throw new GraphemeIndexError(
      "SLICE_INVALID_INDEX",
      `Slice index must be an integer, got ${String(value)}`,
      { value },
    );
  }
  const resolved = value < 0 ? count + value + 1 : value;
  if (resolved < 0 || resolved > count) {
    throw new GraphemeIndexError(
      "SLICE_OUT_OF_RANGE",
      `Slice index ${value} resolves to ${resolved}, outside [0, ${count}]`,
      { value, resolved, length: count },
    );
  }
  return resolved;
}

/**
 * Check a non-negative `[start, end)` range against a cluster count.
 */
export function assertGraphemeRange(start: number, end: number, count: number): void {
  if (
    !Number.isInteger(start) ||
    !Number.isInteger(end) ||
    start < 0 ||
    start > end ||
    end > count
  ) {
    throw new GraphemeIndexError(
      "SLICE_OUT_OF_RANGE",
      `Range [${String(start)}, ${String(end)}) is outside [0, ${count}]`,
      { start, end, length: count },
    );
  }
}

/**
 * Concatenate clusters `[start, end)` after resolving negative indices.
 * A start past the end yields the empty string.
 */
export function sliceGraphemes(graphemes: readonly Grapheme[], start: number, end: number): string {
  const from = resolveSliceIndex(start, graphemes.length);
  const to = resolveSliceIndex(end, graphemes.length);
  let out = "";
  for (let index = from; index < to; index += 1) {
    out += graphemes[index]?.value ?? "";
  }
  return out;
}
