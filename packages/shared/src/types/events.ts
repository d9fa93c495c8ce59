/**
 * Base interface for all cache events.
 * All events include common metadata fields.
 */
export interface BaseEvent {
  /** Schema version for event format compatibility */
  schemaVersion: number;
  /** ISO 8601 timestamp when the event occurred */
  timestamp: string;
  /** Event type discriminator */
  type: string;
}

/**
 * Emitted when the least-recently-used entry is dropped to stay within capacity.
 */
export interface EntryEvicted extends BaseEvent {
  type: 'EntryEvicted';
  payload: {
    /** The evicted key, stringified */
    key: string;
    /** Entry count after the eviction */
    size: number;
    maxSize: number;
  };
}

/** Emitted when every entry is removed at once */
export interface CacheCleared extends BaseEvent {
  type: 'CacheCleared';
  payload: {
    /** Number of entries that were dropped */
    removed: number;
  };
}

export type CacheEvent = EntryEvicted | CacheCleared;

export const EVENT_SCHEMA_VERSION = 1;
