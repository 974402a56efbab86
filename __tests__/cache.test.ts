import { InMemoryLRUAdapter, createDefaultCache } from '../lib/cache';
import RedisCacheAdapter from '../lib/cache/redisAdapter';
import { CacheStats } from '../lib/cache/stats';

const asNumber = (stored: unknown) => (typeof stored === 'number' ? stored : undefined);

describe('cache adapters', () => {
  test('in-memory adapter set/get/del', async () => {
    const cache = new InMemoryLRUAdapter<{ records: string[] }>({ max: 10, ttl: 1000 });
    await cache.set('k1', { records: ['1.2.3.4'] }, 500);
    expect(await cache.get('k1')).toEqual({ records: ['1.2.3.4'] });
    await cache.del('k1');
    expect(await cache.get('k1')).toBeUndefined();
  });

  test('in-memory adapter evicts the least recently used entry', async () => {
    const cache = new InMemoryLRUAdapter<string>({ max: 2 });
    await cache.set('a', 'A');
    await cache.set('b', 'B');
    await cache.get('a');
    await cache.set('c', 'C');
    expect(await cache.get('b')).toBeUndefined();
    expect(await cache.get('a')).toBe('A');
    expect(cache.size).toBe(2);
  });

  test('lookups are counted', async () => {
    const cache = new InMemoryLRUAdapter<string>({ max: 2 });
    await cache.set('a', 'A');
    await cache.get('a');
    await cache.get('missing');
    await cache.get('a');
    expect(cache.stats.hits).toBe(2);
    expect(cache.stats.misses).toBe(1);
  });

  test('CacheStats ratio', () => {
    const stats = new CacheStats();
    expect(stats.ratio).toBe(0);
    stats.record(true);
    stats.record(false);
    stats.record(true);
    stats.record(true);
    expect(stats.ratio).toBe(0.75);
  });

  describe('createDefaultCache', () => {
    const orig = process.env.REDIS_URL;

    afterEach(() => {
      if (orig === undefined) delete process.env.REDIS_URL;
      else process.env.REDIS_URL = orig;
    });

    test('returns in-memory when REDIS_URL not set', async () => {
      delete process.env.REDIS_URL;
      const cache = createDefaultCache(asNumber);
      expect(cache).toBeInstanceOf(InMemoryLRUAdapter);
      await cache.set('x', 1, 1000);
      expect(await cache.get('x')).toBe(1);
    });

    test('returns the Redis adapter when REDIS_URL is set', () => {
      process.env.REDIS_URL = 'redis://127.0.0.1:6379';
      expect(createDefaultCache(asNumber)).toBeInstanceOf(RedisCacheAdapter);
    });
  });
});
