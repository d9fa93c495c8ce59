import {
  EVENT_SCHEMA_VERSION,
  InvalidStateError,
  formatKey,
  KeyNotFoundError,
  parseCacheConfig,
  type BoundedCacheConfigInput,
  type Logger,
} from '@recency-cache/shared';
import { RecencyList, RecencyNode } from './recency-list';

/**
 * Result of {@link BoundedCache.tryGet}. Distinguishes a miss from a stored
 * `undefined` value.
 */
export type TryGetResult<V> = { found: true; value: V } | { found: false };

export interface BoundedCacheOptions<K, V> extends BoundedCacheConfigInput {
  /** Receives `EntryEvicted` and `CacheCleared` events through a child bound to `{ cache: name }` */
  logger?: Logger;
  /** Called after a capacity eviction has completed */
  onEvict?: (key: K, value: V) => void;
}

export interface CacheStats {
  hits: number;
  misses: number;
  /** Capacity evictions only; overwrites, deletes and clears are not counted */
  evictions: number;
  size: number;
  maxSize: number;
}

interface CacheEntry<K, V> {
  value: V;
  node: RecencyNode<K>;
}

/**
 * Fixed-capacity key/value cache with least-recently-used eviction.
 *
 * Each map entry is paired with exactly one node of the recency list; the two
 * are created, moved and destroyed together. Lookups and writes are O(1).
 *
 * Not safe for concurrent mutation. Callers sharing an instance across async
 * tasks that interleave must serialize access themselves.
 *
 * @example
 * ```typescript
 * const cache = new BoundedCache<string, CompiledRule>({ maxSize: 100, name: 'rules' });
 * cache.set(fingerprint, compile(source));
 * const hit = cache.tryGet(fingerprint);
 * if (hit.found) run(hit.value);
 * ```
 */
export class BoundedCache<K, V> implements Iterable<[K, V]> {
  readonly maxSize: number;
  readonly name: string;

  private readonly map = new Map<K, CacheEntry<K, V>>();
  private readonly list = new RecencyList<K>();
  private readonly logger?: Logger;
  private readonly onEvict?: (key: K, value: V) => void;

  private hits = 0;
  private misses = 0;
  private evictions = 0;

  /**
   * @throws ConfigError if `maxSize` is not a non-negative integer
   */
  constructor(options: number | BoundedCacheOptions<K, V>) {
    const opts: BoundedCacheOptions<K, V> =
      typeof options === 'number' ? { maxSize: options } : options;
    const { logger, onEvict, ...config } = opts;
    const parsed = parseCacheConfig(config);

    this.maxSize = parsed.maxSize;
    this.name = parsed.name;
    this.logger = logger?.child({ cache: parsed.name });
    this.onEvict = onEvict;
  }

  get size(): number {
    return this.map.size;
  }

  /**
   * Looks up a key and promotes it to most-recently-used when present.
   */
  tryGet(key: K): TryGetResult<V> {
    const entry = this.map.get(key);
    if (!entry) {
      this.misses++;
      return { found: false };
    }

    this.hits++;
    this.promote(entry.node);
    return { found: true, value: entry.value };
  }

  /**
   * Indexed read: like {@link tryGet} but for call sites that expect the key.
   * @throws KeyNotFoundError if the key is absent
   */
  get(key: K): V {
    const result = this.tryGet(key);
    if (!result.found) {
      throw new KeyNotFoundError(key);
    }
    return result.value;
  }

  /**
   * Inserts or replaces a value and makes the key most-recently-used.
   * Inserting a new key into a full cache evicts the least-recently-used one.
   */
  set(key: K, value: V): this {
    const existing = this.map.get(key);
    if (existing) {
      // Replace in place: same node, new value, back at the head.
      existing.value = value;
      this.promote(existing.node);
      return this;
    }

    const node = new RecencyNode(key);
    this.list.addFirst(node);
    this.map.set(key, { value, node });

    if (this.map.size > this.maxSize) {
      this.evictLast();
    }
    return this;
  }

  /** Membership test that leaves recency untouched. */
  has(key: K): boolean {
    return this.map.has(key);
  }

  /**
   * Removes a key and its list node.
   * @returns true if the key was present
   */
  delete(key: K): boolean {
    const entry = this.map.get(key);
    if (!entry) {
      return false;
    }
    this.list.remove(entry.node);
    this.map.delete(key);
    return true;
  }

  clear(): void {
    const removed = this.map.size;
    while (this.list.count > 0) {
      this.list.removeLast();
    }
    this.map.clear();

    this.logger?.log({
      schemaVersion: EVENT_SCHEMA_VERSION,
      timestamp: new Date().toISOString(),
      type: 'CacheCleared',
      payload: { removed },
    });
  }

  /**
   * Returns the cached value for `key`, computing and storing it on a miss.
   * A throwing factory leaves the cache unchanged.
   */
  getOrAdd(key: K, factory: (key: K) => V): V {
    const hit = this.tryGet(key);
    if (hit.found) {
      return hit.value;
    }

    const value = factory(key);
    this.set(key, value);
    return value;
  }

  /** Keys from most- to least-recently-used. Does not promote. */
  keys(): Generator<K, void, undefined> {
    return this.list.keys();
  }

  /** Entries from most- to least-recently-used. Does not promote. */
  *entries(): Generator<[K, V], void, undefined> {
    for (const key of this.list) {
      const entry = this.map.get(key);
      if (!entry) {
        throw new InvalidStateError(`Recency list holds key with no cache entry: ${formatKey(key)}`);
      }
      yield [key, entry.value];
    }
  }

  [Symbol.iterator](): Generator<[K, V], void, undefined> {
    return this.entries();
  }

  stats(): CacheStats {
    return {
      hits: this.hits,
      misses: this.misses,
      evictions: this.evictions,
      size: this.map.size,
      maxSize: this.maxSize,
    };
  }

  private promote(node: RecencyNode<K>): void {
    if (node.previous === undefined) {
      return; // already the head
    }
    this.list.remove(node);
    this.list.addFirst(node);
  }

  private evictLast(): void {
    const node = this.list.removeLast();
    const entry = this.map.get(node.key);
    if (!entry) {
      throw new InvalidStateError(`Evicted key has no cache entry: ${formatKey(node.key)}`);
    }
    this.map.delete(node.key);
    this.evictions++;

    this.logger?.log({
      schemaVersion: EVENT_SCHEMA_VERSION,
      timestamp: new Date().toISOString(),
      type: 'EntryEvicted',
      payload: { key: formatKey(node.key), size: this.map.size, maxSize: this.maxSize },
    });
    this.onEvict?.(node.key, entry.value);
  }
}
