import { fnv1a32 } from "./hash.ts";
import type { AlgorithmInfo, Provenance } from "./types.ts";
import { UNICODE_VERSION } from "./version.ts";

/**
 * createProvenance records which algorithm and options produced a result.
 * Options are hashed in insertion order, so callers build them with a fixed key order.
 */
export function createProvenance(
  algorithm: AlgorithmInfo,
  options: Record<string, string | number | boolean>,
  units: Provenance["units"],
): Provenance {
  const configHash = fnv1a32(JSON.stringify(options));
  return {
    unicodeVersion: UNICODE_VERSION,
    algorithm,
    configHash,
    units,
  };
}
