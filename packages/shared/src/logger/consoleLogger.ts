import type { CacheEvent } from '../types/events';
import type { Logger } from './types';

/**
 * Writes each event as one JSON line to stdout, prefixed with the logger's
 * bindings.
 */
export class ConsoleLogger implements Logger {
  constructor(private readonly bindings: Record<string, unknown> = {}) {}

  log(event: CacheEvent): void {
    console.log(JSON.stringify({ ...this.bindings, ...event }));
  }

  child(bindings: Record<string, unknown>): Logger {
    return new ConsoleLogger({ ...this.bindings, ...bindings });
  }
}
