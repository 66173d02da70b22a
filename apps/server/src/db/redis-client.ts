/**
 * Redis client with graceful degradation
 *
 * Returns `null` when Redis is disabled or the client cannot be built.
 * Cache callers check for `null` and fall through to the backing store.
 */

import Redis from "ioredis";
import type { RedisConfig } from "../config.ts";
import type { Logger } from "../types.ts";

export const createRedisClient = (config: RedisConfig, logger: Logger = console): Redis | null => {
  if (!config.enabled) return null;

  try {
    const client = new Redis(config.url, {
      lazyConnect: true,
      maxRetriesPerRequest: 1,
      connectTimeout: config.connectTimeoutMs,
      commandTimeout: config.commandTimeoutMs,
      enableOfflineQueue: false,
      retryStrategy: (times) => {
        if (times > 3) return null; // stop retrying
        return Math.min(times * 200, 1000);
      },
    });

    // Connection errors surface as cache misses
    client.on("error", (error: Error) => {
      logger.warn("[redis] Connection error:", error.message);
    });

    return client;
  } catch (error) {
    logger.warn("[redis] Client init failed, caching disabled:", error);
    return null;
  }
};
