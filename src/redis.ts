/**
 * Redis client singleton for the shared cache backend.
 */

import Redis from "ioredis";
import { config } from "./env";
import { logger } from "./logger";

let redisClient: Redis | null = null;

/**
 * Get the Redis client singleton.
 * Returns null if REDIS_URL is not configured.
 */
export function getRedisClient(): Redis | null {
  if (!config.REDIS_URL) {
    return null;
  }

  if (!redisClient) {
    logger.debug("[Redis] Connecting to Redis...");

    redisClient = new Redis(config.REDIS_URL, {
      maxRetriesPerRequest: 3,
      retryStrategy: (times) => {
        if (times > 3) {
          logger.error("[Redis] Max retries reached");
          return null;
        }
        return Math.min(times * 1000, 5000);
      },
    });

    redisClient.on("connect", () => {
      logger.debug("[Redis] Connected");
    });

    redisClient.on("error", (err: Error) => {
      logger.error("[Redis] Error", { error: err.message });
    });
  }

  return redisClient;
}

/**
 * Close the Redis connection gracefully.
 */
export async function closeRedisConnection(): Promise<void> {
  if (redisClient) {
    await redisClient.quit();
    redisClient = null;
  }
}
