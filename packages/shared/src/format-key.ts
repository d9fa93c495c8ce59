/**
 * Renders a cache key for messages and events. Never throws: objects without
 * a usable `toString` (e.g. `Object.create(null)`) fall back to their tag.
 */
export function formatKey(key: unknown): string {
  if (typeof key === 'string') {
    return key;
  }
  if (key === null || (typeof key !== 'object' && typeof key !== 'function')) {
    return String(key);
  }
  return Object.prototype.toString.call(key);
}
