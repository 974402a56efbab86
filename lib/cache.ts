import { LRUCache } from 'lru-cache';
import RedisCacheAdapter from './cache/redisAdapter';
import { CacheStats } from './cache/stats';
import { CONFIG } from './config';

export interface CacheAdapter<V> {
  get(key: string): Promise<V | undefined>;
  set(key: string, value: V, ttlMillis?: number): Promise<void>;
  del(key: string): Promise<void>;
}

/** Turns a value read back from shared storage into `V`, or `undefined` if it no longer fits. */
export type CacheDecoder<V> = (stored: unknown) => V | undefined;

export interface CacheOptions {
  max?: number;
  ttl?: number;
}

/**
 * Bounded in-process LRU, entries expiring after `ttl`.
 */
export class InMemoryLRUAdapter<V extends {}> implements CacheAdapter<V> {
  readonly stats = new CacheStats();
  private readonly cache: LRUCache<string, V>;

  constructor(opts?: CacheOptions) {
    this.cache = new LRUCache<string, V>({
      max: opts?.max ?? CONFIG.DNS.CACHE_MAX,
      ttl: opts?.ttl ?? CONFIG.DNS.CACHE_TTL_MS,
    });
  }

  async get(key: string): Promise<V | undefined> {
    const val = this.cache.get(key);
    this.stats.record(val !== undefined);
    return val;
  }

  async set(key: string, value: V, ttlMillis?: number): Promise<void> {
    this.cache.set(key, value, ttlMillis === undefined ? undefined : { ttl: ttlMillis });
  }

  async del(key: string): Promise<void> {
    this.cache.delete(key);
  }

  get size(): number {
    return this.cache.size;
  }
}

/**
 * Redis when `REDIS_URL` is configured, so answers survive across runs;
 * otherwise the bounded in-memory LRU. `decode` validates what Redis hands back.
 */
export function createDefaultCache<V extends {}>(decode: CacheDecoder<V>, opts?: CacheOptions): CacheAdapter<V> {
  if (process.env.REDIS_URL) {
    return new RedisCacheAdapter<V>(decode, { ttl: opts?.ttl });
  }
  return new InMemoryLRUAdapter<V>(opts);
}
