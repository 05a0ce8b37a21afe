const PATTERN_SYNTAX = /[\\^$.*+?()[\]{}|/]/g;

/**
 * Escape pattern syntax so the text matches itself literally.
 * Only syntax characters are escaped, which keeps the result valid under the `u` flag.
 */
export function escapePattern(text: string): string {
  return text.replace(PATTERN_SYNTAX, "\\$&");
}
