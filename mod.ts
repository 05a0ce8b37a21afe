export * from "./src/core/mod.ts";
export * from "./src/segment/mod.ts";
export * from "./src/pattern/mod.ts";
export * from "./src/grapheme/mod.ts";
