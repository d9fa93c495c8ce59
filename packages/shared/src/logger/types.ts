import type { CacheEvent } from '../types/events';

/**
 * Sink for structured cache events.
 *
 * @example
 * ```typescript
 * const cacheLogger = logger.child({ cache: 'artifacts' });
 * cacheLogger.log({ type: 'CacheCleared', ... });
 * ```
 */
export interface Logger {
  /** Record a structured cache event. */
  log(event: CacheEvent): void;

  /**
   * Create a child logger whose records carry these bindings.
   * Bindings from nested children are merged; event fields win on conflict.
   */
  child(bindings: Record<string, unknown>): Logger;
}
