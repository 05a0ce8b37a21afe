/**
 * TextInput defines an exported type contract.
 * Units: bytes (UTF-8) when given as a Uint8Array.
 */
export type TextInput = string | Uint8Array;

/**
 * Half-open span in UTF-16 code units.
 */
export interface Span {
  startCU: number;
  endCU: number;
}

/**
 * Half-open span in grapheme cluster indices.
 */
export interface GraphemeSpan {
  start: number;
  end: number;
}

/**
 * Offset unit accepted by the locator.
 */
export type OffsetUnit = "utf16-code-unit" | "utf8-byte";

/**
 * AlgorithmInfo defines an exported structural contract.
 */
export interface AlgorithmInfo {
  name: string;
  spec: string;
  revisionOrDate: string;
  implementationId: string;
}

/**
 * Provenance defines an exported structural contract.
 */
export interface Provenance {
  unicodeVersion: string;
  algorithm: AlgorithmInfo;
  configHash: string;
  units: {
    text: "utf16-code-unit";
    byte?: "utf8-byte";
    token?: string;
    grapheme?: "uax29-grapheme";
  };
}

/**
 * SegmentIterable defines an exported structural contract.
 */
export interface SegmentIterable extends Iterable<Span> {
  provenance: Provenance;
}
