import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { MemoryCache } from '../../services/cache/memory-cache.js';

describe('MemoryCache', () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(0);
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('returns stored values until their TTL passes', () => {
    const cache = new MemoryCache<string>(10);
    cache.set('a', 'alpha', 1000);

    vi.advanceTimersByTime(999);
    expect(cache.get('a')).toBe('alpha');

    vi.advanceTimersByTime(1);
    expect(cache.get('a')).toBeUndefined();
  });

  it('evicts the least recently used entry past maxEntries', () => {
    const cache = new MemoryCache<number>(2);
    cache.set('a', 1, 10_000);
    cache.set('b', 2, 10_000);
    cache.get('a');
    cache.set('c', 3, 10_000);

    expect(cache.get('b')).toBeUndefined();
    expect(cache.get('a')).toBe(1);
    expect(cache.get('c')).toBe(3);
    expect(cache.evicted()).toBe(1);
  });

  it('counts only live entries in size', () => {
    const cache = new MemoryCache<number>(10);
    cache.set('short', 1, 100);
    cache.set('long', 2, 10_000);

    vi.advanceTimersByTime(100);
    expect(cache.size()).toBe(1);
  });
});
