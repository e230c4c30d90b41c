import { z } from 'zod';
import { Memoizer, deterministicEncode } from '../src/lib/memoize';
import { MemoryStore } from '../src/stores/memoryStore';
import { mockClock } from './support/clock';
import { recordingLogger } from './support/logger';

afterEach(() => {
  jest.restoreAllMocks();
});

describe('Memoizer.cached', () => {
  test('computes once for identical arguments within the ttl', async () => {
    const store = new MemoryStore();
    const memo = new Memoizer(store);
    let calls = 0;
    const salesReport = memo.cached(
      async (from: string, to: string) => {
        calls += 1;
        return { total: 42, from, to };
      },
      { prefix: 'analytics:sales', ttl: 3600 },
    );

    const first = await salesReport('2024-01-01', '2024-01-31');
    const second = await salesReport('2024-01-01', '2024-01-31');

    expect(calls).toBe(1);
    expect(second).toEqual(first);
    expect(await store.exists('analytics:sales:2024-01-01:2024-01-31')).toBe(true);
  });

  test('different arguments compute separately', async () => {
    const memo = new Memoizer(new MemoryStore());
    const fn = jest.fn(async (id: number) => id * 2);
    const double = memo.cached(fn, { prefix: 'double' });

    expect(await double(1)).toBe(2);
    expect(await double(2)).toBe(4);
    expect(fn).toHaveBeenCalledTimes(2);
  });

  test('object arguments with reordered keys share an entry', async () => {
    const store = new MemoryStore();
    const memo = new Memoizer(store);
    const fn = jest.fn(async (filters: { category: string; page: number }) => [filters.category, filters.page]);
    const listProducts = memo.cached(fn, { prefix: 'products:list' });

    await listProducts({ category: 'tea', page: 2 });
    await listProducts({ page: 2, category: 'tea' });

    expect(fn).toHaveBeenCalledTimes(1);
    expect(await store.get('products:list:{"category":"tea","page":2}')).toEqual(['tea', 2]);
  });

  test('uses the caller-supplied key builder', async () => {
    const store = new MemoryStore();
    const memo = new Memoizer(store);
    const product = memo.cached(async (id: number, _requestId: string) => ({ id }), {
      prefix: 'product',
      key: (id) => `id-${id}`,
    });

    await product(7, 'req-1');
    await product(7, 'req-2');

    expect(await store.get('product:id-7')).toEqual({ id: 7 });
  });

  test('recomputes after the ttl and falls back to the default ttl', async () => {
    const clock = mockClock();
    const store = new MemoryStore();
    const memo = new Memoizer(store, { defaultTtl: 120 });
    const fn = jest.fn(async () => 'fresh');
    const banner = memo.cached(fn, { prefix: 'banner' });

    await banner();
    expect(await store.ttl('banner:')).toBe(120);

    clock.advance(120_000);
    await banner();
    expect(fn).toHaveBeenCalledTimes(2);
  });

  test('recomputes when a hit fails schema validation', async () => {
    const store = new MemoryStore();
    const logger = recordingLogger();
    const memo = new Memoizer(store, { logger });
    await store.set('stats:daily', { count: 'stale' });

    const fn = jest.fn(async (_period: string) => ({ count: 3 }));
    const stats = memo.cached(fn, { prefix: 'stats', schema: z.object({ count: z.number() }) });

    expect(await stats('daily')).toEqual({ count: 3 });
    expect(await stats('daily')).toEqual({ count: 3 });
    expect(fn).toHaveBeenCalledTimes(1);
    expect(logger.entries).toEqual([
      { level: 'warn', message: 'Discarding cached value that failed validation', meta: { key: 'stats:daily' } },
    ]);
  });

  test('reports hits and misses through hooks', async () => {
    const events: string[] = [];
    const memo = new Memoizer(new MemoryStore(), {
      hooks: {
        onHit: ({ key }) => events.push(`hit:${key}`),
        onMiss: ({ key }) => events.push(`miss:${key}`),
      },
    });
    const top = memo.cached(async (n: number) => n, { prefix: 'top' });

    await top(5);
    await top(5);

    expect(events).toEqual(['miss:top:5', 'hit:top:5']);
  });

  test('caches null results', async () => {
    const memo = new Memoizer(new MemoryStore());
    const fn = jest.fn(async (_sku: string) => null);
    const lookup = memo.cached(fn, { prefix: 'sku' });

    expect(await lookup('missing')).toBeNull();
    expect(await lookup('missing')).toBeNull();
    expect(fn).toHaveBeenCalledTimes(1);
  });
});

describe('Memoizer.invalidate', () => {
  test('deletes matching keys after the operation completes', async () => {
    const store = new MemoryStore();
    const invalidated: Array<{ patterns: string[]; deleted: number }> = [];
    const memo = new Memoizer(store, { hooks: { onInvalidated: (info) => invalidated.push(info) } });
    await store.set('analytics:sales:a', 1);
    await store.set('analytics:sales:b', 2);
    await store.set('analytics:users', 3);

    const recordOrder = memo.invalidate(async (orderId: number) => `recorded-${orderId}`, 'analytics:sales:*');

    expect(await recordOrder(1)).toBe('recorded-1');
    expect(await store.exists('analytics:sales:a')).toBe(false);
    expect(await store.exists('analytics:sales:b')).toBe(false);
    expect(await store.exists('analytics:users')).toBe(true);
    expect(invalidated).toEqual([{ patterns: ['analytics:sales:*'], deleted: 2 }]);
  });

  test('resolves patterns from the call arguments', async () => {
    const store = new MemoryStore();
    const memo = new Memoizer(store);
    await store.set('product:9', { id: 9 });
    await store.set('product:10', { id: 10 });
    await store.set('products:list:1', [9, 10]);

    const updateProduct = memo.invalidate(
      async (productId: number) => productId,
      (productId) => [`product:${productId}`, 'products:list:*'],
    );
    await updateProduct(9);

    expect(await store.exists('product:9')).toBe(false);
    expect(await store.exists('product:10')).toBe(true);
    expect(await store.exists('products:list:1')).toBe(false);
  });

  test('leaves the cache alone when the operation rejects', async () => {
    const store = new MemoryStore();
    const memo = new Memoizer(store);
    await store.set('analytics:sales:a', 1);

    const failing = memo.invalidate(async () => {
      throw new Error('write failed');
    }, 'analytics:*');

    await expect(failing()).rejects.toThrow('write failed');
    expect(await store.exists('analytics:sales:a')).toBe(true);
  });
});

describe('deterministicEncode', () => {
  test('joins scalars and sorts object keys', () => {
    expect(
      deterministicEncode(['a', 1, true, null, undefined, new Date(Date.UTC(2024, 0, 2)), { b: 1, a: [2, 1] }]),
    ).toBe('a:1:true:null:undefined:2024-01-02T00:00:00.000Z:{"a":[2,1],"b":1}');
  });
});
