import { describe, it, expect } from 'vitest';
import { name, BoundedCache, RecencyList, memoize } from './index';

describe('cache package', () => {
  it('exports name', () => {
    expect(name).toBe('@recency-cache/cache');
  });

  it('exports the public surface', () => {
    expect(new BoundedCache<string, number>(1).maxSize).toBe(1);
    expect(new RecencyList<string>().count).toBe(0);
    expect(typeof memoize).toBe('function');
  });
});
