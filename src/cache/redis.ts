/**
 * Redis cache store, for CI runners that share one cache.
 *
 * Keys (all under the configured prefix):
 *   <prefix>entry:<key>           JSON record, written with SET NX
 *   <prefix>paths                 hash: path -> record key
 *   <prefix>seen                  hash: record key -> last-seen epoch ms
 */

import type Redis from "ioredis";

import { logger } from "../logger";
import { decodeCacheEntry, encodeCacheEntry } from "./serialize";
import { CacheEntry, CacheLookup, CacheStore, DAY_MS, PruneOptions } from "./types";

/**
 * The subset of the ioredis API the store uses.
 */
export interface RedisCacheClient {
  get(key: string): Promise<string | null>;
  setIfAbsent(key: string, value: string): Promise<boolean>;
  del(keys: string[]): Promise<number>;
  hget(key: string, field: string): Promise<string | null>;
  hset(key: string, field: string, value: string): Promise<void>;
  hdel(key: string, fields: string[]): Promise<void>;
  hgetall(key: string): Promise<Record<string, string>>;
}

/**
 * Adapt an ioredis connection.
 */
export function fromIORedis(redis: Redis): RedisCacheClient {
  return {
    get: (key) => redis.get(key),
    setIfAbsent: async (key, value) => (await redis.set(key, value, "NX")) === "OK",
    del: async (keys) => (keys.length === 0 ? 0 : redis.del(...keys)),
    hget: (key, field) => redis.hget(key, field),
    hset: async (key, field, value) => {
      await redis.hset(key, field, value);
    },
    hdel: async (key, fields) => {
      if (fields.length > 0) {
        await redis.hdel(key, ...fields);
      }
    },
    hgetall: (key) => redis.hgetall(key),
  };
}

export interface RedisCacheStoreOptions {
  keyPrefix: string;
  now?: () => number;
}

export class RedisCacheStore implements CacheStore {
  private readonly prefix: string;
  private readonly now: () => number;

  constructor(
    private readonly client: RedisCacheClient,
    options: RedisCacheStoreOptions
  ) {
    this.prefix = options.keyPrefix;
    this.now = options.now ?? Date.now;
  }

  private entryKey(contentHash: string): string {
    return `${this.prefix}entry:${contentHash}`;
  }

  private get pathsKey(): string {
    return `${this.prefix}paths`;
  }

  private get seenKey(): string {
    return `${this.prefix}seen`;
  }

  async get(contentHash: string): Promise<CacheLookup> {
    const json = await this.client.get(this.entryKey(contentHash));
    if (json === null) {
      return { status: "miss" };
    }

    const parsed = decodeCacheEntry(json);
    if (!parsed.ok) {
      logger.warn("[Cache] Discarding unusable record", { contentHash, reason: parsed.reason });
      await this.client.del([this.entryKey(contentHash)]);
      return { status: "corrupt", reason: parsed.reason };
    }
    return { status: "hit", entry: parsed.entry };
  }

  async put(contentHash: string, entry: CacheEntry): Promise<void> {
    const written = await this.client.setIfAbsent(this.entryKey(contentHash), encodeCacheEntry(entry));
    if (written) {
      await this.client.hset(this.seenKey, contentHash, String(this.now()));
    }
  }

  async invalidate(path: string): Promise<void> {
    const hash = await this.client.hget(this.pathsKey, path);
    if (hash === null) {
      return;
    }
    await this.client.hdel(this.pathsKey, [path]);

    const paths = await this.client.hgetall(this.pathsKey);
    if (Object.values(paths).includes(hash)) {
      return;
    }
    await this.client.del([this.entryKey(hash)]);
    await this.client.hdel(this.seenKey, [hash]);
  }

  async recordSeen(path: string, contentHash: string): Promise<void> {
    await this.client.hset(this.pathsKey, path, contentHash);
    await this.client.hset(this.seenKey, contentHash, String(this.now()));
  }

  async prune(options: PruneOptions): Promise<number> {
    const cutoff = this.now() - options.maxAgeDays * DAY_MS;
    const seen = await this.client.hgetall(this.seenKey);

    const dead = Object.entries(seen)
      .filter(([hash, at]) => !options.liveHashes.has(hash) && Number(at) <= cutoff)
      .map(([hash]) => hash);
    if (dead.length === 0) {
      return 0;
    }

    const deadSet = new Set(dead);
    const paths = await this.client.hgetall(this.pathsKey);
    const stalePaths = Object.entries(paths)
      .filter(([, hash]) => deadSet.has(hash))
      .map(([path]) => path);

    const removed = await this.client.del(dead.map((hash) => this.entryKey(hash)));
    await this.client.hdel(this.seenKey, dead);
    await this.client.hdel(this.pathsKey, stalePaths);
    return removed;
  }

  async flush(): Promise<void> {
    // Every write is sent immediately
  }

  async clear(): Promise<void> {
    const seen = await this.client.hgetall(this.seenKey);
    const keys = Object.keys(seen).map((hash) => this.entryKey(hash));
    await this.client.del([...keys, this.pathsKey, this.seenKey]);
  }
}
