export const name = '@recency-cache/cache';

export { RecencyList, RecencyNode } from './recency-list';
export { BoundedCache } from './bounded-cache';
export type { BoundedCacheOptions, CacheStats, TryGetResult } from './bounded-cache';
export { memoize } from './memoize';
export type { MemoizeOptions, Memoized } from './memoize';
