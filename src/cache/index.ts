/**
 * Cache store selection.
 */

import { ConfigError } from "../analysis/errors";
import { LoadedConfig } from "../config/loader";
import { logger } from "../logger";
import { getRedisClient } from "../redis";
import { DiskCacheStore } from "./disk";
import { MemoryCacheStore } from "./memory";
import { RedisCacheStore, fromIORedis } from "./redis";
import { CacheStore } from "./types";

export * from "./types";
export { DiskCacheStore } from "./disk";
export { MemoryCacheStore } from "./memory";
export { RedisCacheStore, fromIORedis } from "./redis";
export type { RedisCacheClient } from "./redis";
export { cacheKey, contentHash } from "./serialize";

/**
 * Build the store configured under `cache:`. A disabled cache gets a fresh
 * in-memory store, so nothing outlives the run.
 *
 * @throws ConfigError when the redis backend is chosen without REDIS_URL
 */
export function createCacheStore(config: LoadedConfig): CacheStore {
  if (!config.cache.enabled) {
    return new MemoryCacheStore();
  }

  switch (config.cache.backend) {
    case "memory":
      return new MemoryCacheStore();

    case "redis": {
      const client = getRedisClient();
      if (!client) {
        throw new ConfigError('cache.backend is "redis" but REDIS_URL is not set');
      }
      logger.debug("[Cache] Using redis backend", { keyPrefix: config.cache.key_prefix });
      return new RedisCacheStore(fromIORedis(client), { keyPrefix: config.cache.key_prefix });
    }

    case "disk":
      logger.debug("[Cache] Using disk backend", { dir: config.cache.dir });
      return new DiskCacheStore(config.cache.dir);
  }
}
