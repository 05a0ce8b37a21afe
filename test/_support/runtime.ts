import type * as GraphemeIndex from "../../mod.ts";

export type GraphemeIndexModule = typeof GraphemeIndex;

/**
 * Load the library from its TypeScript sources.
 */
export async function importGraphemeIndex(): Promise<GraphemeIndexModule> {
  return import("../../mod.ts");
}
