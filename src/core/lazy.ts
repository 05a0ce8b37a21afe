/**
 * Write-once cell for data derived from immutable input.
 */
export interface Lazy<T> {
  get(): T;
  isInitialized(): boolean;
}

/**
 * createLazy runs `compute` on the first `get()` and returns the stored value afterwards.
 * A compute that throws leaves the cell empty.
 */
export function createLazy<T>(compute: () => T): Lazy<T> {
  let state: { value: T } | undefined;
  return {
    get() {
      if (state) return state.value;
      const value = compute();
      // a reentrant get() from inside compute may already have stored a value
      if (!state) state = { value };
      return state.value;
    },
    isInitialized() {
      return state !== undefined;
    },
  };
}
