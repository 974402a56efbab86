/**
 * Redis client using `ioredis`, shared by the resolver answer cache.
 *
 * `getRedisClient()` returns `null` when `REDIS_URL` is not set or the first
 * ping fails; callers then fall back to in-process caching.
 */

import Redis from 'ioredis';
import logger from './logger';

let client: Redis | null = null;
let unavailable = false;

/**
 * Get a Redis client if `REDIS_URL` is configured.
 * Uses a singleton Redis instance and performs a ping check on first initialization.
 */
export async function getRedisClient(): Promise<Redis | null> {
  if (client) return client;
  if (unavailable) return null;

  const url = process.env.REDIS_URL;
  if (!url) return null;

  const candidate = new Redis(url, {
    password: process.env.REDIS_PASSWORD || undefined,
    lazyConnect: true,
    maxRetriesPerRequest: 2,
  });

  try {
    await candidate.connect();
    await candidate.ping();
    client = candidate;
    return client;
  } catch (err) {
    candidate.disconnect();
    unavailable = true;
    logger.warn({ err }, 'Redis not available, falling back to in-process cache');
    return null;
  }
}

/**
 * Close the shared client so the process can exit.
 */
export async function disconnectRedis(): Promise<void> {
  if (!client) return;
  const c = client;
  client = null;
  try {
    await c.quit();
  } catch (err) {
    logger.debug({ err }, 'Redis quit failed, forcing disconnect');
    c.disconnect();
  }
}
