/**
 * In-process cache store. Used when caching is disabled on disk and in tests.
 */

import { parseCacheEntry } from "./serialize";
import { PathIndex } from "./path-index";
import { CacheEntry, CacheLookup, CacheStore, PruneOptions } from "./types";

export class MemoryCacheStore implements CacheStore {
  private entries = new Map<string, CacheEntry>();
  private index = new PathIndex();

  constructor(private readonly now: () => number = Date.now) {}

  async get(contentHash: string): Promise<CacheLookup> {
    const stored = this.entries.get(contentHash);
    if (!stored) {
      return { status: "miss" };
    }

    // Same checks as records read back from disk
    const parsed = parseCacheEntry(stored);
    if (!parsed.ok) {
      this.entries.delete(contentHash);
      return { status: "corrupt", reason: parsed.reason };
    }
    return { status: "hit", entry: parsed.entry };
  }

  async put(contentHash: string, entry: CacheEntry): Promise<void> {
    if (this.entries.has(contentHash)) {
      return;
    }
    this.entries.set(contentHash, entry);
    this.index.touch(contentHash, this.now());
  }

  async invalidate(path: string): Promise<void> {
    const hash = this.index.removePath(path);
    if (hash !== undefined) {
      this.entries.delete(hash);
    }
  }

  async recordSeen(path: string, contentHash: string): Promise<void> {
    this.index.touch(contentHash, this.now(), path);
  }

  async prune(options: PruneOptions): Promise<number> {
    let removed = 0;
    for (const hash of this.index.takeDead(options, this.now())) {
      if (this.entries.delete(hash)) {
        removed++;
      }
    }
    return removed;
  }

  async flush(): Promise<void> {
    // Nothing buffered
  }

  async clear(): Promise<void> {
    this.entries.clear();
    this.index = new PathIndex();
  }

  /** Number of stored records. */
  get size(): number {
    return this.entries.size;
  }
}
