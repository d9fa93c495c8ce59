import { describe, it, expect, vi } from 'vitest';
import { memoize } from './memoize';

describe('memoize', () => {
  it('caches results for structurally identical arguments', () => {
    const compile = vi.fn((source: string, flags: { strict: boolean }) =>
      flags.strict ? `strict:${source}` : source,
    );
    const cached = memoize(compile, { maxSize: 10 });

    expect(cached('a + b', { strict: true })).toBe('strict:a + b');
    expect(cached('a + b', { strict: true })).toBe('strict:a + b');
    expect(compile).toHaveBeenCalledTimes(1);

    expect(cached('a + b', { strict: false })).toBe('a + b');
    expect(compile).toHaveBeenCalledTimes(2);
    expect(cached.cache.size).toBe(2);
  });

  it('uses keyOf when provided', () => {
    const fn = vi.fn((id: number) => ({ id }));
    const cached = memoize(fn, { maxSize: 2, keyOf: (id) => `artifact-${id}` });

    cached(7);

    expect([...cached.cache.keys()]).toEqual(['artifact-7']);
  });

  it('recomputes after the entry is evicted', () => {
    const fn = vi.fn((n: number) => n * 2);
    const cached = memoize(fn, { maxSize: 1, keyOf: (n) => String(n) });

    cached(1);
    cached(2);
    cached(1);

    expect(fn.mock.calls).toEqual([[1], [2], [1]]);
    expect(cached.cache.stats()).toMatchObject({ hits: 0, misses: 3, evictions: 2 });
  });

  it('passes cache options through', () => {
    const onEvict = vi.fn();
    const cached = memoize((n: number) => n, {
      maxSize: 1,
      name: 'numbers',
      keyOf: (n) => String(n),
      onEvict,
    });

    cached(1);
    cached(2);

    expect(cached.cache.name).toBe('numbers');
    expect(onEvict).toHaveBeenCalledWith('1', 1);
  });

  it('caches the promise of an async function', async () => {
    const load = vi.fn(async (id: string) => `loaded:${id}`);
    const cached = memoize(load, { maxSize: 4, keyOf: (id) => id });

    const first = cached('x');
    const second = cached('x');

    expect(second).toBe(first);
    await expect(first).resolves.toBe('loaded:x');
    expect(load).toHaveBeenCalledTimes(1);
  });
});
