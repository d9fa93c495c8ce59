import { hash } from 'ohash';
import { BoundedCache, type BoundedCacheOptions } from './bounded-cache';

export interface MemoizeOptions<A extends unknown[], R> extends BoundedCacheOptions<string, R> {
  /** Derives the cache key; defaults to a structural hash of the arguments */
  keyOf?: (...args: A) => string;
}

export type Memoized<A extends unknown[], R> = ((...args: A) => R) & {
  readonly cache: BoundedCache<string, R>;
};

/**
 * Wraps `fn` with a bounded LRU cache keyed by its arguments.
 *
 * Promise-returning functions cache the promise itself, so a rejection stays
 * cached until it is evicted or deleted from `cache`.
 */
export function memoize<A extends unknown[], R>(
  fn: (...args: A) => R,
  options: MemoizeOptions<A, R>,
): Memoized<A, R> {
  const { keyOf = (...args: A) => hash(args), ...cacheOptions } = options;
  const cache = new BoundedCache<string, R>(cacheOptions);

  const memoized = (...args: A): R => cache.getOrAdd(keyOf(...args), () => fn(...args));
  return Object.assign(memoized, { cache });
}
