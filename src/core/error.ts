/**
 * GraphemeIndexErrorCode defines an exported type contract.
 */
export type GraphemeIndexErrorCode =
  | "SLICE_INVALID_INDEX"
  | "SLICE_OUT_OF_RANGE"
  | "OFFSET_INVALID"
  | "MATCH_INVALID"
  | "PARSE_INVALID_INTEGER";

/**
 * GraphemeIndexError provides an exported class contract.
 */
export class GraphemeIndexError extends Error {
  readonly code: GraphemeIndexErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(code: GraphemeIndexErrorCode, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = "GraphemeIndexError";
    this.code = code;
    if (details) this.details = details;
  }
}

export function isGraphemeIndexError(
  value: unknown,
  code?: GraphemeIndexErrorCode,
): value is GraphemeIndexError {
  if (!(value instanceof GraphemeIndexError)) return false;
  return code === undefined || value.code === code;
}
