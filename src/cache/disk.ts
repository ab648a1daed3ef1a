/**
 * File-system cache store.
 *
 * Layout under the cache directory:
 *   entries/<key>.json   one record per content hash and dialect (see cacheKey)
 *   index.json           path index (see PathIndex)
 *
 * Every write goes to a temp file in the same directory and is renamed into
 * place, so readers see either the old state or the new one.
 */

import { promises as fs } from "fs";
import * as path from "path";

import { CacheCorruptionError } from "../analysis/errors";
import { logger } from "../logger";
import { PathIndex, PathIndexSnapshot } from "./path-index";
import { decodeCacheEntry, encodeCacheEntry } from "./serialize";
import { CACHE_SCHEMA_VERSION, CacheEntry, CacheLookup, CacheStore, DAY_MS, PruneOptions } from "./types";

const KEY_PATTERN = /^[A-Za-z0-9_-]+$/;
const ENTRY_SUFFIX = ".json";

interface IndexFile extends PathIndexSnapshot {
  schemaVersion: number;
}

function errorCode(error: unknown): string | undefined {
  if (typeof error === "object" && error !== null && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function isStringRecord(value: unknown): value is Record<string, string> {
  return (
    typeof value === "object" &&
    value !== null &&
    !Array.isArray(value) &&
    Object.values(value).every((v) => typeof v === "string")
  );
}

function isNumberRecord(value: unknown): value is Record<string, number> {
  return (
    typeof value === "object" &&
    value !== null &&
    !Array.isArray(value) &&
    Object.values(value).every((v) => typeof v === "number")
  );
}

function parseIndexFile(json: string): PathIndexSnapshot | null {
  let value: unknown;
  try {
    value = JSON.parse(json);
  } catch {
    return null;
  }
  if (typeof value !== "object" || value === null || !("schemaVersion" in value)) {
    return null;
  }
  if (value.schemaVersion !== CACHE_SCHEMA_VERSION || !("paths" in value) || !("seen" in value)) {
    return null;
  }
  if (!isStringRecord(value.paths) || !isNumberRecord(value.seen)) {
    return null;
  }
  return { paths: value.paths, seen: value.seen };
}

export interface DiskCacheStoreOptions {
  /** Clock, for tests */
  now?: () => number;
}

export class DiskCacheStore implements CacheStore {
  private readonly entriesDir: string;
  private readonly indexPath: string;
  private readonly now: () => number;
  private indexLoad: Promise<PathIndex> | null = null;
  private dirty = false;

  constructor(
    private readonly dir: string,
    options: DiskCacheStoreOptions = {}
  ) {
    this.entriesDir = path.join(dir, "entries");
    this.indexPath = path.join(dir, "index.json");
    this.now = options.now ?? Date.now;
  }

  async get(contentHash: string): Promise<CacheLookup> {
    const file = this.entryPath(contentHash);

    let json: string;
    try {
      json = await fs.readFile(file, "utf8");
    } catch (error) {
      if (errorCode(error) === "ENOENT") {
        return { status: "miss" };
      }
      return this.discard(contentHash, `unreadable: ${errorMessage(error)}`);
    }

    const parsed = decodeCacheEntry(json);
    if (!parsed.ok) {
      return this.discard(contentHash, parsed.reason);
    }
    return { status: "hit", entry: parsed.entry };
  }

  async put(contentHash: string, entry: CacheEntry): Promise<void> {
    const file = this.entryPath(contentHash);
    const index = await this.loadIndex();

    if (await this.exists(file)) {
      return;
    }

    await fs.mkdir(this.entriesDir, { recursive: true });
    await this.writeAtomic(file, encodeCacheEntry(entry));
    index.touch(contentHash, this.now());
    this.dirty = true;
  }

  async invalidate(filePath: string): Promise<void> {
    const index = await this.loadIndex();
    const hash = index.removePath(filePath);
    if (hash === undefined) {
      return;
    }
    this.dirty = true;
    await this.removeEntry(hash);
  }

  async recordSeen(filePath: string, contentHash: string): Promise<void> {
    const index = await this.loadIndex();
    index.touch(contentHash, this.now(), filePath);
    this.dirty = true;
  }

  async prune(options: PruneOptions): Promise<number> {
    const index = await this.loadIndex();
    const now = this.now();
    const dead = index.takeDead(options, now);
    if (dead.length > 0) {
      this.dirty = true;
    }

    let removed = 0;
    for (const hash of dead) {
      if (await this.removeEntry(hash)) {
        removed++;
      }
    }

    // Records the index lost track of age by file mtime
    const tracked = new Set(index.hashes());
    const cutoff = now - options.maxAgeDays * DAY_MS;
    for (const hash of await this.listEntries()) {
      if (tracked.has(hash) || options.liveHashes.has(hash)) {
        continue;
      }
      const mtimeMs = await this.entryMtime(hash);
      if (mtimeMs !== undefined && mtimeMs <= cutoff && (await this.removeEntry(hash))) {
        removed++;
      }
    }

    return removed;
  }

  async flush(): Promise<void> {
    if (!this.dirty || !this.indexLoad) {
      return;
    }
    const index = await this.indexLoad;
    const file: IndexFile = { schemaVersion: CACHE_SCHEMA_VERSION, ...index.snapshot() };

    await fs.mkdir(this.dir, { recursive: true });
    await this.writeAtomic(this.indexPath, JSON.stringify(file));
    this.dirty = false;
  }

  async clear(): Promise<void> {
    await fs.rm(this.dir, { recursive: true, force: true });
    this.indexLoad = Promise.resolve(new PathIndex());
    this.dirty = false;
  }

  // ==========================================================================
  // Helpers
  // ==========================================================================

  private entryPath(contentHash: string): string {
    if (!KEY_PATTERN.test(contentHash)) {
      throw new CacheCorruptionError(contentHash, "cache key is not a valid file name");
    }
    return path.join(this.entriesDir, `${contentHash}${ENTRY_SUFFIX}`);
  }

  private loadIndex(): Promise<PathIndex> {
    if (!this.indexLoad) {
      this.indexLoad = this.readIndex();
    }
    return this.indexLoad;
  }

  private async readIndex(): Promise<PathIndex> {
    let json: string;
    try {
      json = await fs.readFile(this.indexPath, "utf8");
    } catch (error) {
      if (errorCode(error) !== "ENOENT") {
        logger.warn("[Cache] Could not read path index, starting empty", {
          path: this.indexPath,
          error: errorMessage(error),
        });
      }
      return new PathIndex();
    }

    const snapshot = parseIndexFile(json);
    if (!snapshot) {
      logger.warn("[Cache] Path index is corrupt or from another version, starting empty", {
        path: this.indexPath,
      });
      this.dirty = true;
      return new PathIndex();
    }
    return PathIndex.fromSnapshot(snapshot);
  }

  private async discard(contentHash: string, reason: string): Promise<CacheLookup> {
    logger.warn("[Cache] Discarding unusable record", { contentHash, reason });
    try {
      await this.removeEntry(contentHash);
    } catch (error) {
      // The record is rewritten by the next put anyway
      logger.warn("[Cache] Could not remove unusable record", { contentHash, error: errorMessage(error) });
    }
    return { status: "corrupt", reason };
  }

  private async removeEntry(contentHash: string): Promise<boolean> {
    try {
      await fs.unlink(this.entryPath(contentHash));
      return true;
    } catch (error) {
      if (errorCode(error) === "ENOENT") {
        return false;
      }
      throw error;
    }
  }

  /**
   * Undefined when the record was removed after it was listed.
   */
  private async entryMtime(contentHash: string): Promise<number | undefined> {
    try {
      const stat = await fs.stat(this.entryPath(contentHash));
      return stat.mtimeMs;
    } catch (error) {
      if (errorCode(error) === "ENOENT") {
        return undefined;
      }
      throw error;
    }
  }

  private async listEntries(): Promise<string[]> {
    let names: string[];
    try {
      names = await fs.readdir(this.entriesDir);
    } catch (error) {
      if (errorCode(error) === "ENOENT") {
        return [];
      }
      throw error;
    }
    return names
      .filter((name) => name.endsWith(ENTRY_SUFFIX))
      .map((name) => name.slice(0, -ENTRY_SUFFIX.length))
      .filter((hash) => KEY_PATTERN.test(hash));
  }

  private async exists(file: string): Promise<boolean> {
    try {
      await fs.access(file);
      return true;
    } catch (error) {
      if (errorCode(error) === "ENOENT") {
        return false;
      }
      throw error;
    }
  }

  private async writeAtomic(target: string, data: string): Promise<void> {
    const temp = `${target}.${process.pid}.${Math.random().toString(36).slice(2)}.tmp`;
    try {
      await fs.writeFile(temp, data, "utf8");
      await fs.rename(temp, target);
    } catch (error) {
      await fs.rm(temp, { force: true });
      throw error;
    }
  }
}
