// ═══════════════════════════════════════════════════════════════════════════════
// MEMOIZE — Process-Lifetime Cache for Async Functions
// ═══════════════════════════════════════════════════════════════════════════════

export interface MemoizeOptions<A extends unknown[], R> {
  /** Cache key for a call; JSON of the arguments by default */
  key?: (...args: A) => string;
  /** Keep a settled value only when this returns true */
  cacheIf?: (value: R) => boolean;
}

export interface Memoized<A extends unknown[], R> {
  (...args: A): Promise<R>;
  /** Number of keys currently held, pending calls included */
  size(): number;
  clear(): void;
}

/**
 * Wrap `fn` so each key is computed once for the life of the process.
 *
 * The pending promise is stored, so concurrent callers with the same key
 * share one call. Rejections and values refused by `cacheIf` are evicted
 * once settled; the next call computes again.
 */
export function memoizeByKey<A extends unknown[], R>(
  fn: (...args: A) => Promise<R>,
  options: MemoizeOptions<A, R> = {}
): Memoized<A, R> {
  const keyOf = options.key ?? ((...args: A) => JSON.stringify(args));
  const cacheIf = options.cacheIf ?? (() => true);
  const cache = new Map<string, Promise<R>>();

  const memoized = (...args: A): Promise<R> => {
    const key = keyOf(...args);
    const cached = cache.get(key);
    if (cached) return cached;

    // A call started before clear() must not evict the entry that replaced it.
    const evict = (): void => {
      if (cache.get(key) === pending) cache.delete(key);
    };
    const pending: Promise<R> = fn(...args).then(
      value => {
        if (!cacheIf(value)) evict();
        return value;
      },
      (error: unknown) => {
        evict();
        throw error;
      }
    );
    cache.set(key, pending);
    return pending;
  };

  return Object.assign(memoized, {
    size: () => cache.size,
    clear: () => cache.clear(),
  });
}
