import { utf8Length } from "../core/codepoint.ts";
import { GraphemeIndexError } from "../core/error.ts";
import type { OffsetUnit } from "../core/types.ts";

/**
 * Start offsets of one cluster.
 * Units: UTF-16 code units (`startCU`), bytes (UTF-8) (`startB`), graphemes (`index`).
 */
export interface LocatorEntry {
  startCU: number;
  startB: number;
  index: number;
}

/**
 * Build the offset table from cluster texts given in order.
 * Entries are strictly increasing in every field.
 */
export function buildLocator(clusters: Iterable<string>): LocatorEntry[] {
  const entries: LocatorEntry[] = [];
  let startCU = 0;
  let startB = 0;
  for (const cluster of clusters) {
    entries.push({ startCU, startB, index: entries.length });
    startCU += cluster.length;
    startB += utf8Length(cluster);
  }
  return entries;
}

function entryOffset(entry: LocatorEntry, unit: OffsetUnit): number {
  return unit === "utf8-byte" ? entry.startB : entry.startCU;
}

/**
 * Resolve an offset to a grapheme index.
 *
 * An offset on a cluster start resolves to that cluster. Any other offset, including
 * one strictly inside a cluster, resolves to the next cluster, or to `count` past the
 * last one. The result never decreases as the offset grows.
 */
export function locateOffset(
  entries: readonly LocatorEntry[],
  offset: number,
  unit: OffsetUnit,
  count: number,
): number {
  if (!Number.isInteger(offset) || offset < 0) {
    throw new GraphemeIndexError(
      "OFFSET_INVALID",
      `Offset must be a non-negative integer, got ${String(offset)}`,
      { offset, unit },
    );
  }
  let low = 0;
  let high = entries.length;
  while (low < high) {
    const mid = (low + high) >>> 1;
    const entry = entries[mid];
    if (entry === undefined || entryOffset(entry, unit) >= offset) {
      high = mid;
    } else {
      low = mid + 1;
    }
  }
  return entries[low]?.index ?? count;
}
