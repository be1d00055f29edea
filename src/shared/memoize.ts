/**
 * Lazily runs `load` once and hands every later caller the same promise.
 * A rejected load is forgotten so the next call starts over.
 */
export const memoizeAsync = <T>(load: () => Promise<T>): (() => Promise<T>) => {
  let pending: Promise<T> | null = null;
  return () => {
    if (!pending) {
      pending = load().catch((error: unknown) => {
        pending = null;
        throw error;
      });
    }
    return pending;
  };
};
