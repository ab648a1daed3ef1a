/**
 * Path index shared by the cache backends: which content hash each path had
 * last, and when each content hash was last seen.
 */

import { DAY_MS, PruneOptions } from "./types";

export interface PathIndexSnapshot {
  paths: Record<string, string>;
  seen: Record<string, number>;
}

export class PathIndex {
  private paths = new Map<string, string>();
  private seen = new Map<string, number>();

  static fromSnapshot(snapshot: PathIndexSnapshot): PathIndex {
    const index = new PathIndex();
    for (const [path, hash] of Object.entries(snapshot.paths)) {
      index.paths.set(path, hash);
    }
    for (const [hash, at] of Object.entries(snapshot.seen)) {
      index.seen.set(hash, at);
    }
    return index;
  }

  /**
   * Record a sighting of `hash`, optionally under `path`.
   */
  touch(hash: string, now: number, path?: string): void {
    if (path !== undefined) {
      this.paths.set(path, hash);
    }
    this.seen.set(hash, now);
  }

  /**
   * Forget `path`. Returns the hash it pointed at when no other path shares it.
   */
  removePath(path: string): string | undefined {
    const hash = this.paths.get(path);
    if (hash === undefined) {
      return undefined;
    }
    this.paths.delete(path);

    for (const other of this.paths.values()) {
      if (other === hash) {
        return undefined;
      }
    }
    this.seen.delete(hash);
    return hash;
  }

  /**
   * Remove and return hashes that are not live and were last seen at least
   * `maxAgeDays` ago. Paths pointing at them are dropped too.
   */
  takeDead(options: PruneOptions, now: number): string[] {
    const cutoff = now - options.maxAgeDays * DAY_MS;
    const dead: string[] = [];

    for (const [hash, at] of this.seen) {
      if (!options.liveHashes.has(hash) && at <= cutoff) {
        dead.push(hash);
      }
    }

    const deadSet = new Set(dead);
    for (const hash of dead) {
      this.seen.delete(hash);
    }
    for (const [path, hash] of this.paths) {
      if (deadSet.has(hash)) {
        this.paths.delete(path);
      }
    }
    return dead;
  }

  hashes(): string[] {
    return [...this.seen.keys()];
  }

  snapshot(): PathIndexSnapshot {
    return {
      paths: Object.fromEntries(this.paths),
      seen: Object.fromEntries(this.seen),
    };
  }
}
