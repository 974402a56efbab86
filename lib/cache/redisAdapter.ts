import type { CacheAdapter, CacheDecoder } from '../cache';
import { CacheStats } from './stats';
import { getRedisClient } from '../redisAdapter';
import logger from '../logger';
import { CONFIG } from '../config';

export interface RedisCacheOptions {
  prefix?: string;
  ttl?: number;
}

/**
 * JSON values under a key prefix with a millisecond TTL. Redis being down
 * degrades to cache misses.
 */
export class RedisCacheAdapter<V> implements CacheAdapter<V> {
  readonly stats = new CacheStats();
  private readonly prefix: string;
  private readonly ttlMs: number;

  constructor(private readonly decode: CacheDecoder<V>, opts?: RedisCacheOptions) {
    this.prefix = opts?.prefix ?? CONFIG.CACHE_KEY_PREFIX;
    this.ttlMs = opts?.ttl ?? CONFIG.DNS.CACHE_TTL_MS;
  }

  private key(k: string): string {
    return `${this.prefix}${k}`;
  }

  async get(key: string): Promise<V | undefined> {
    const r = await getRedisClient();
    if (!r) return undefined;

    let value: V | undefined;
    try {
      const raw = await r.get(this.key(key));
      value = raw === null ? undefined : this.decode(JSON.parse(raw));
    } catch (err) {
      logger.debug({ err, key }, 'cached value unreadable, treating as a miss');
      value = undefined;
    }
    this.stats.record(value !== undefined);
    return value;
  }

  async set(key: string, value: V, ttlMillis?: number): Promise<void> {
    const r = await getRedisClient();
    if (!r) return;
    const ttl = Math.max(1000, Math.floor(ttlMillis ?? this.ttlMs));
    try {
      await r.set(this.key(key), JSON.stringify(value), 'PX', ttl);
    } catch (err) {
      logger.warn({ err, key }, 'redis cache write failed');
    }
  }

  async del(key: string): Promise<void> {
    const r = await getRedisClient();
    if (!r) return;
    try {
      await r.del(this.key(key));
    } catch (err) {
      logger.warn({ err, key }, 'redis cache delete failed');
    }
  }
}

export default RedisCacheAdapter;
