/**
 * Cache utilities: thin wrappers around Redis that never throw
 *
 * Every function accepts `Redis | null` and returns null / void when Redis
 * is unavailable, so the archive behaves the same with or without a cache.
 */

import type Redis from "ioredis";

/** GET: cached string, or null on miss or error */
export const cacheGet = async (redis: Redis | null, key: string): Promise<string | null> => {
  if (!redis) return null;
  try {
    return await redis.get(key);
  } catch {
    return null;
  }
};

/** SET with an optional TTL in seconds (0 / undefined = no expiry) */
export const cacheSet = async (
  redis: Redis | null,
  key: string,
  value: string,
  ttlSeconds?: number
): Promise<void> => {
  if (!redis) return;
  try {
    if (ttlSeconds && ttlSeconds > 0) {
      await redis.set(key, value, "EX", ttlSeconds);
    } else {
      await redis.set(key, value);
    }
  } catch {
    // a failed write only costs a future miss
  }
};

/** DEL */
export const cacheDel = async (redis: Redis | null, key: string): Promise<void> => {
  if (!redis) return;
  try {
    await redis.del(key);
  } catch {
    // entries expire by TTL
  }
};
