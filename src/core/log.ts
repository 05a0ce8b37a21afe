import createDebug from "debug";

const NAMESPACE = "grapheme-index";

/**
 * Namespaced debug logger; enable with `DEBUG=grapheme-index:*`.
 */
export function createLogger(component: string): createDebug.Debugger {
  return createDebug(`${NAMESPACE}:${component}`);
}
