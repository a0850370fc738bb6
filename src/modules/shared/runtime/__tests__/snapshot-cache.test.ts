import { describe, it, expect, beforeEach, vi } from 'vitest';
import { FakeClock, createMockLogger } from '../../../ratings/__tests__/fixtures.js';
import { SnapshotCache } from '../snapshot-cache.js';

interface Item {
  ticker: string;
  tags: string[];
}

function deferred<T>() {
  let resolve: (value: T) => void = () => undefined;
  let reject: (reason: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

const TTL = 60_000;

describe('SnapshotCache', () => {
  let clock: FakeClock;
  let cache: SnapshotCache<Item>;

  beforeEach(() => {
    clock = new FakeClock(Date.parse('2024-06-10T12:00:00Z'));
    cache = new SnapshotCache<Item>({ ttlMs: TTL, clock, logger: createMockLogger() });
  });

  it('computes on first read', async () => {
    const compute = vi.fn().mockResolvedValue([{ ticker: 'AAPL', tags: [] }]);

    expect(cache.state('all')).toBe('COLD');
    expect(await cache.get('all', compute)).toEqual([{ ticker: 'AAPL', tags: [] }]);
    expect(cache.state('all')).toBe('WARM');
    expect(cache.peek('all')?.generatedAt).toEqual(new Date('2024-06-10T12:00:00Z'));
  });

  it('serves reads within the TTL without recomputing', async () => {
    const compute = vi.fn().mockResolvedValue([{ ticker: 'AAPL', tags: [] }]);

    const first = await cache.get('all', compute);
    clock.advance(TTL - 1);
    const second = await cache.get('all', compute);

    expect(second).toEqual(first);
    expect(compute).toHaveBeenCalledTimes(1);
    expect(cache.stats()).toEqual({ scopes: 1, hits: 1, refreshes: 1, failures: 0 });
  });

  it('recomputes exactly once for concurrent readers after expiry', async () => {
    await cache.get('all', vi.fn().mockResolvedValue([{ ticker: 'OLD', tags: [] }]));
    clock.advance(TTL);
    expect(cache.state('all')).toBe('STALE');

    const gate = deferred<Item[]>();
    const compute = vi.fn().mockReturnValue(gate.promise);

    const reads = Promise.all([cache.get('all', compute), cache.get('all', compute), cache.get('all', compute)]);
    gate.resolve([{ ticker: 'NEW', tags: [] }]);
    const results = await reads;

    expect(compute).toHaveBeenCalledTimes(1);
    expect(results.map((r) => r[0].ticker)).toEqual(['NEW', 'NEW', 'NEW']);
    expect(cache.state('all')).toBe('WARM');
  });

  it('keeps the previous snapshot when a refresh fails', async () => {
    await cache.get('all', vi.fn().mockResolvedValue([{ ticker: 'OLD', tags: [] }]));
    clock.advance(TTL);

    const gate = deferred<Item[]>();
    const compute = vi.fn().mockReturnValue(gate.promise);
    const refresher = cache.get('all', compute);
    const waiter = cache.get('all', compute);
    gate.reject(new Error('store down'));

    await expect(refresher).rejects.toThrow('store down');
    expect(await waiter).toEqual([{ ticker: 'OLD', tags: [] }]);
    expect(cache.peek('all')?.items).toEqual([{ ticker: 'OLD', tags: [] }]);
    expect(cache.state('all')).toBe('STALE');
    expect(cache.stats().failures).toBe(1);
  });

  it('retries for waiters of a cold scope whose first refresh failed', async () => {
    const gate = deferred<Item[]>();
    const compute = vi.fn().mockReturnValueOnce(gate.promise).mockResolvedValueOnce([{ ticker: 'AAPL', tags: [] }]);

    const refresher = cache.get('all', compute);
    const waiter = cache.get('all', compute);
    gate.reject(new Error('store down'));

    await expect(refresher).rejects.toThrow('store down');
    expect(await waiter).toEqual([{ ticker: 'AAPL', tags: [] }]);
    expect(compute).toHaveBeenCalledTimes(2);
  });

  it('treats an empty list as a valid snapshot', async () => {
    const compute = vi.fn().mockResolvedValue([]);

    expect(await cache.get('all', compute)).toEqual([]);
    expect(await cache.get('all', compute)).toEqual([]);
    expect(compute).toHaveBeenCalledTimes(1);
  });

  it('recomputes after markStale', async () => {
    const compute = vi.fn().mockResolvedValue([{ ticker: 'AAPL', tags: [] }]);
    await cache.get('all', compute);

    cache.markStale('all');
    expect(cache.state('all')).toBe('STALE');
    await cache.get('all', compute);

    expect(compute).toHaveBeenCalledTimes(2);
  });

  it('does not treat a refresh that overlapped markStale as fresh', async () => {
    const gate = deferred<Item[]>();
    const pending = cache.get('all', vi.fn().mockReturnValue(gate.promise));

    cache.markStale('all');
    gate.resolve([{ ticker: 'BEFORE', tags: [] }]);

    expect(await pending).toEqual([{ ticker: 'BEFORE', tags: [] }]);
    expect(cache.state('all')).toBe('STALE');

    const compute = vi.fn().mockResolvedValue([{ ticker: 'AFTER', tags: [] }]);
    expect(await cache.get('all', compute)).toEqual([{ ticker: 'AFTER', tags: [] }]);
    expect(compute).toHaveBeenCalledTimes(1);
    expect(cache.state('all')).toBe('WARM');
  });

  it('peek returns a copy', async () => {
    const compute = vi.fn().mockResolvedValue([{ ticker: 'AAPL', tags: ['a'] }]);
    await cache.get('all', compute);

    const peeked = cache.peek('all');
    peeked?.items[0].tags.push('mutated');
    peeked?.generatedAt.setTime(0);

    expect(cache.peek('all')?.items).toEqual([{ ticker: 'AAPL', tags: ['a'] }]);
    expect(cache.peek('all')?.generatedAt).toEqual(new Date('2024-06-10T12:00:00Z'));
    expect(await cache.get('all', compute)).toEqual([{ ticker: 'AAPL', tags: ['a'] }]);
  });

  it('hands out copies that cannot change the snapshot', async () => {
    const compute = vi.fn().mockResolvedValue([{ ticker: 'AAPL', tags: ['a'] }]);

    const first = await cache.get('all', compute);
    first[0].tags.push('mutated');
    first.push({ ticker: 'EXTRA', tags: [] });

    expect(await cache.get('all', compute)).toEqual([{ ticker: 'AAPL', tags: ['a'] }]);
  });

  it('keeps scopes independent', async () => {
    await cache.get('tech', vi.fn().mockResolvedValue([{ ticker: 'AAPL', tags: [] }]));
    await cache.get('energy', vi.fn().mockResolvedValue([{ ticker: 'XOM', tags: [] }]));

    cache.markStale('tech');

    expect(cache.state('tech')).toBe('STALE');
    expect(cache.state('energy')).toBe('WARM');
  });
});
