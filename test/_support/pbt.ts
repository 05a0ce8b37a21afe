import type { Rng } from "./prng.ts";
import { makeRng } from "./prng.ts";

export type Generator<T> = (rng: Rng, size: number) => T;
export type Property<T> = (value: T) => boolean | undefined;

export interface EvalPropertyConfig<T> {
  name: string;
  seed: string;
  runs: number;
  gen: Generator<T>;
  property: Property<T>;
  shrink?: (value: T) => T[];
}

export function getPbtRuns(defaultRuns = 100): number {
  const raw = process.env.GRAPHEME_INDEX_PBT_RUNS;
  if (!raw) return defaultRuns;
  const parsed = Number.parseInt(raw, 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : defaultRuns;
}

export function getPbtSeed(defaultSeed = "grapheme-index-pbt-v1"): string {
  return process.env.GRAPHEME_INDEX_PBT_SEED ?? defaultSeed;
}

function formatValue(value: unknown): string {
  if (typeof value === "string") {
    const codeUnits = Array.from(value, (char) =>
      char.charCodeAt(0).toString(16).padStart(4, "0"),
    );
    return `${JSON.stringify(value)} (cu=[${codeUnits.join(" ")}])`;
  }
  return JSON.stringify(value) ?? String(value);
}

/**
 * Smaller candidates for a string: halves, one code unit dropped at each end, then
 * one dropped at each of the first positions.
 */
export function shrinkString(value: string): string[] {
  const len = value.length;
  if (len === 0) return [];
  const half = Math.floor(len / 2);
  const candidates = [""];
  if (half > 0) candidates.push(value.slice(0, half), value.slice(len - half));
  if (len > 1) candidates.push(value.slice(0, len - 1), value.slice(1));
  for (let index = 0; index < Math.min(len, 16); index += 1) {
    candidates.push(value.slice(0, index) + value.slice(index + 1));
  }
  return candidates.filter((candidate) => candidate !== value);
}

function fails<T>(property: Property<T>, value: T): boolean {
  try {
    return property(value) === false;
  } catch {
    return true;
  }
}

function minimize<T>(value: T, property: Property<T>, shrink: (value: T) => T[]): T {
  let current = value;
  let changed = true;
  while (changed) {
    changed = false;
    for (const candidate of shrink(current)) {
      if (fails(property, candidate)) {
        current = candidate;
        changed = true;
        break;
      }
    }
  }
  return current;
}

export function evalProperty<T>({
  name,
  seed,
  runs,
  gen,
  property,
  shrink = () => [],
}: EvalPropertyConfig<T>): void {
  const rng = makeRng(seed);
  for (let runIndex = 0; runIndex < runs; runIndex += 1) {
    const size = Math.max(4, (runIndex % 64) + 1);
    const value = gen(rng, size);
    if (fails(property, value)) {
      const minimized = minimize(value, property, shrink);
      throw new Error(
        `[PBT] ${name} failed\nseed=${seed} run=${runIndex}\ncounterexample=${formatValue(minimized)}`,
      );
    }
  }
}
