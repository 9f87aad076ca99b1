import { describe, expect, it } from 'vitest';
import { canonicalJson, LruCache } from '../src/lruCache.js';

describe('LruCache', () => {
  it('evicts the least recently used entry', () => {
    const cache = new LruCache<number>(2);
    cache.set('a', 1);
    cache.set('b', 2);
    expect(cache.get('a')).toBe(1);
    cache.set('c', 3);
    expect(cache.keys()).toEqual(['a', 'c']);
    expect(cache.has('b')).toBe(false);
    expect(cache.size).toBe(2);
  });

  it('refreshes recency when an existing key is overwritten', () => {
    const cache = new LruCache<string>(2);
    cache.set('a', 'first');
    cache.set('b', 'second');
    cache.set('a', 'again');
    cache.set('c', 'third');
    expect(cache.keys()).toEqual(['a', 'c']);
    expect(cache.get('a')).toBe('again');
  });

  it('clears everything', () => {
    const cache = new LruCache<number>();
    cache.set('a', 1);
    cache.clear();
    cache.clear();
    expect(cache.size).toBe(0);
    expect(cache.get('a')).toBeUndefined();
  });

  it('requires a positive integer capacity', () => {
    expect(() => new LruCache(0)).toThrow(RangeError);
    expect(() => new LruCache(1.5)).toThrow(RangeError);
  });
});

describe('canonicalJson', () => {
  it('sorts object keys at every depth', () => {
    expect(canonicalJson({ b: 1, a: { d: 2, c: [{ z: 1, y: 2 }] } })).toBe('{"a":{"c":[{"y":2,"z":1}],"d":2},"b":1}');
  });

  it('serializes equal values equally regardless of key order', () => {
    expect(canonicalJson({ q: 'x', page: 2 })).toBe(canonicalJson({ page: 2, q: 'x' }));
  });

  it('renders undefined as null', () => {
    expect(canonicalJson(undefined)).toBe('null');
  });
});
