/**
 * Types for the incremental fingerprint cache.
 *
 * Records are keyed by the SHA-256 of a file's raw bytes plus the tokenizer
 * dialect (see cacheKey), so a renamed but unchanged file still hits while
 * the same bytes under another grammar do not. A path index maps each
 * scanned path to the key it had last time, which is what
 * `invalidate(path)` and pruning work from.
 */

import { SupportedLanguage, TokenKind } from "../analysis/types";

/**
 * Cache format version. Bump on any change to CacheEntry or SerializedToken.
 */
export const CACHE_SCHEMA_VERSION = 2;

/**
 * Inputs that shaped a record. A record from another language or dialect is
 * never reused; one with another windowSize or normalize flag still has
 * valid tokens but its hashes must be recomputed.
 */
export interface CacheParams {
  language: SupportedLanguage;
  /** Tokenizer dialect, e.g. "tsx" or "python" */
  dialect: string;
  windowSize: number;
  normalize: boolean;
}

/**
 * [text, normalized, kind, startLine, startColumn, endLine, endColumn]
 */
export type SerializedToken = [string, string, TokenKind, number, number, number, number];

/**
 * Cached tokenization and fingerprint result for one content hash.
 */
export interface CacheEntry {
  schemaVersion: number;
  params: CacheParams;
  tokens: SerializedToken[];
  /** Window hash per start index, see toFingerprints */
  hashes: number[];
  /** Epoch milliseconds */
  createdAt: number;
}

export type CacheLookup =
  | { status: "hit"; entry: CacheEntry }
  | { status: "miss" }
  | { status: "corrupt"; reason: string };

export interface PruneOptions {
  /** Record keys referenced by the current run; never pruned */
  liveHashes: Set<string>;
  /** Records not seen for longer than this are removed (0 removes every dead record) */
  maxAgeDays: number;
}

/**
 * Storage backend for cache records. Implementations are injected into the
 * scanner; several may coexist in one process.
 */
export interface CacheStore {
  /**
   * Look up a record. Unreadable or version-mismatched records are removed
   * and reported as `corrupt`.
   */
  get(contentHash: string): Promise<CacheLookup>;

  /**
   * Store a record unless one already exists. A reader never observes a
   * partially written record.
   */
  put(contentHash: string, entry: CacheEntry): Promise<void>;

  /**
   * Drop the record last associated with `path`, if any.
   */
  invalidate(path: string): Promise<void>;

  /**
   * Associate `path` with `contentHash` and refresh its last-seen time.
   */
  recordSeen(path: string, contentHash: string): Promise<void>;

  /**
   * Remove dead records. Returns the number removed.
   */
  prune(options: PruneOptions): Promise<number>;

  /**
   * Persist buffered index state.
   */
  flush(): Promise<void>;

  /**
   * Remove every record and the path index.
   */
  clear(): Promise<void>;
}

export const DAY_MS = 24 * 60 * 60 * 1000;
