import { describe, it, expect, vi } from 'vitest';
import { LoadingCache, Status } from '../src/index.js';

describe('LoadingCache — LRU eviction', () => {
  it('evicts least recently used when maxEntries is exceeded', async () => {
    const cache = new LoadingCache<string, number>({ maxEntries: 2 });
    cache.put('a', 1);
    cache.put('b', 2);
    cache.put('c', 3); // evicts 'a'

    expect((await cache.get('a')).error).toBe('not-found');
    expect((await cache.get('b')).value).toBe(2);
    expect((await cache.get('c')).value).toBe(3);
    expect(cache.len()).toBe(2);
    cache.dispose();
  });

  it('keeps exactly M entries after M+K inserts and drops the K oldest', () => {
    const cache = new LoadingCache<number, number>();
    cache.setMaxEntries(5);
    for (let i = 0; i < 8; i++) {
      cache.put(i, i);
    }

    expect(cache.len()).toBe(5);
    expect([...cache.keys()]).toEqual([7, 6, 5, 4, 3]);
    cache.dispose();
  });

  it('get() promotes entry to most recently used', async () => {
    const cache = new LoadingCache<string, number>({ maxEntries: 2 });
    cache.put('a', 1);
    cache.put('b', 2);
    await cache.get('a'); // promote 'a'
    cache.put('c', 3); // evicts 'b'

    expect([...cache.keys()]).toEqual(['c', 'a']);
    cache.dispose();
  });

  it('put() on existing key promotes it', () => {
    const cache = new LoadingCache<string, number>({ maxEntries: 2 });
    cache.put('a', 1);
    cache.put('b', 2);
    cache.put('a', 10);
    cache.put('c', 3); // evicts 'b'

    expect([...cache.keys()]).toEqual(['c', 'a']);
    expect(cache.peek('a')).toEqual({ value: 10, status: Status.Success });
    cache.dispose();
  });

  it('peek() does not promote', () => {
    const cache = new LoadingCache<string, number>({ maxEntries: 2 });
    cache.put('a', 1);
    cache.put('b', 2);
    cache.peek('a');
    cache.put('c', 3); // still evicts 'a'

    expect([...cache.keys()]).toEqual(['c', 'b']);
    cache.dispose();
  });

  it('does not reorder on reads without a size cap', async () => {
    const cache = new LoadingCache<string, number>();
    cache.put('a', 1);
    cache.put('b', 2);
    await cache.get('a');

    expect([...cache.keys()]).toEqual(['b', 'a']);
    cache.dispose();
  });

  it('evicts a single entry per put after the cap is lowered', () => {
    const cache = new LoadingCache<string, number>();
    cache.put('a', 1);
    cache.put('b', 2);
    cache.put('c', 3);
    cache.put('d', 4);
    cache.setMaxEntries(2);

    cache.put('e', 5); // 5 entries, one eviction
    expect([...cache.keys()]).toEqual(['e', 'd', 'c', 'b']);
    cache.put('f', 6);
    expect([...cache.keys()]).toEqual(['f', 'e', 'd', 'c']);
    cache.dispose();
  });

  it('loaded values count towards the cap', async () => {
    const cache = new LoadingCache<string, string>({
      maxEntries: 1,
      loader: (key) => ({ value: key.toUpperCase(), status: Status.Success }),
    });
    cache.put('a', 'A');

    expect(await cache.get('b')).toEqual({ value: 'B', status: Status.Success });
    expect([...cache.keys()]).toEqual(['b']);
    cache.dispose();
  });

  it('calls onEvict with reason "evicted"', () => {
    const onEvict = vi.fn();
    const cache = new LoadingCache<string, number>({ maxEntries: 1, onEvict });
    cache.put('a', 1);
    cache.put('b', 2);

    expect(onEvict).toHaveBeenCalledWith('a', 1, 'evicted');
    expect(cache.getStats().evictions).toBe(1);
    cache.dispose();
  });

  it('onEvict receives "manual" for delete()', () => {
    const onEvict = vi.fn();
    const cache = new LoadingCache<string, number>({ onEvict });
    cache.put('a', 1);
    cache.delete('a');
    expect(onEvict).toHaveBeenCalledWith('a', 1, 'manual');
    expect(cache.getStats().evictions).toBe(0);
    cache.dispose();
  });

  it('onEvict receives "clear" for clear()', () => {
    const onEvict = vi.fn();
    const cache = new LoadingCache<string, number>({ onEvict });
    cache.put('a', 1);
    cache.put('b', 2);
    cache.clear();
    expect(onEvict).toHaveBeenCalledTimes(2);
    expect(onEvict).toHaveBeenCalledWith('a', 1, 'clear');
    expect(onEvict).toHaveBeenCalledWith('b', 2, 'clear');
    cache.dispose();
  });
});
