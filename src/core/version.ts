/**
 * LIBRARY_VERSION is an exported constant used by public APIs.
 */
export const LIBRARY_VERSION = "0.1.0" as const;
/**
 * IMPLEMENTATION_ID is an exported constant used by public APIs.
 */
export const IMPLEMENTATION_ID: string = `grapheme-index@${LIBRARY_VERSION}`;
/**
 * Unicode version of the ICU data the runtime segments with.
 */
export const UNICODE_VERSION: string = process.versions.unicode ?? "unknown";
