/**
 * Scan orchestration: per-file pipeline on a worker pool, then a single
 * global merge.
 *
 * Per file (concurrently, at most `scan.workers` at a time):
 *   read -> content hash + dialect -> cache lookup -> on miss tokenize + fingerprint + cache write
 *
 * After every task settles, the scanner alone builds the duplicate index and
 * reports violations. A file that cannot be read, has no tokenizer, or does
 * not parse becomes a warning and is left out of matching.
 */

import { promises as fs } from "fs";
import * as os from "os";
import * as path from "path";
import pLimit from "p-limit";

import { createCacheStore } from "../cache";
import {
  cacheKey,
  contentHash,
  createCacheEntry,
  deserializeTokens,
  sameDialect,
  sameParams,
} from "../cache/serialize";
import { CacheLookup, CacheParams, CacheStore } from "../cache/types";
import { LoadedConfig } from "../config/loader";
import { resolveSuppressedRanges } from "../config/suppression";
import { logger } from "../logger";
import { AnalyzedFile, BlockFilterRegistry, detectDuplicates } from "./duplicates";
import {
  FileReadError,
  ScanAbortedError,
  TokenizeError,
  TwinscanError,
  UnsupportedLanguageError,
  isFileError,
} from "./errors";
import { tokenKeys, windowHashes } from "./fingerprint";
import { isLanguageSupported, tokenize, tokenizerDialect } from "./tokenizers";
import { ScanInput, ScanWarning, SourceFile, SupportedLanguage, SuppressedRange, Token, Violation } from "./types";

export interface ScanOptions {
  /** Defaults to the store configured under `cache:` */
  cache?: CacheStore;
  /** Ranges resolved by an external suppression resolver */
  suppressedRanges?: SuppressedRange[];
  /** Stops scheduling new files; the scan then rejects with ScanAbortedError */
  signal?: AbortSignal;
  /** Block filters; defaults to the built-in filters switched per `duplicates.filters` */
  filters?: BlockFilterRegistry;
}

export interface ScanStats {
  filesTotal: number;
  filesScanned: number;
  filesIgnored: number;
  filesSkipped: number;
  cacheHits: number;
  cacheMisses: number;
  cacheCorrupt: number;
  cachePruned: number;
  tokens: number;
  durationMs: number;
}

export type ScanStatus = "pass" | "fail";

export interface ScanResult {
  violations: Violation[];
  warnings: ScanWarning[];
  stats: ScanStats;
  status: ScanStatus;
}

type CacheOutcome = "hit" | "miss" | "corrupt";

type FileOutcome =
  | {
      kind: "analyzed";
      file: AnalyzedFile;
      seen: SourceFile;
      cacheKey: string;
      cache: CacheOutcome;
      suppressed: SuppressedRange[];
    }
  | { kind: "skipped"; warning: ScanWarning }
  | { kind: "aborted" };

interface FileTaskContext {
  config: LoadedConfig;
  cache: CacheStore;
  signal?: AbortSignal;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Worker pool size; `scan.workers: 0` means one per available core.
 */
export function resolveWorkerCount(config: LoadedConfig): number {
  return config.scan.workers > 0 ? config.scan.workers : Math.max(1, os.availableParallelism());
}

function cacheParamsFor(config: LoadedConfig, input: { path: string; language: SupportedLanguage }): CacheParams {
  return {
    language: input.language,
    dialect: tokenizerDialect(input.language, input.path),
    windowSize: config.getThresholds(input.language).min_duplicate_tokens,
    normalize: config.duplicates.normalize,
  };
}

async function lookupCache(cache: CacheStore, key: string, params: CacheParams): Promise<CacheLookup> {
  let lookup: CacheLookup;
  try {
    lookup = await cache.get(key);
  } catch (error) {
    logger.warn("[Scan] Cache lookup failed, recomputing", { key, error: errorMessage(error) });
    return { status: "miss" };
  }
  if (lookup.status === "hit" && !sameDialect(lookup.entry.params, params)) {
    const { language, dialect } = lookup.entry.params;
    return { status: "corrupt", reason: `record was tokenized as ${language}/${dialect}` };
  }
  return lookup;
}

/**
 * Run a cache maintenance step; a failure is logged and never fails the scan.
 */
async function maintainCache<T>(step: string, run: () => Promise<T>, fallback: T): Promise<T> {
  try {
    return await run();
  } catch (error) {
    logger.warn(`[Scan] Cache ${step} failed`, { error: errorMessage(error) });
    return fallback;
  }
}

/**
 * Tokens and window hashes for one file, from the cache when possible.
 */
async function loadOrCompute(
  input: { path: string; language: SupportedLanguage },
  source: string,
  key: string,
  params: CacheParams,
  ctx: FileTaskContext
): Promise<{ tokens: Token[]; hashes: number[]; cache: CacheOutcome }> {
  const lookup = await lookupCache(ctx.cache, key, params);

  if (lookup.status === "hit") {
    const tokens = deserializeTokens(lookup.entry.tokens);
    const hashes = sameParams(lookup.entry.params, params)
      ? lookup.entry.hashes
      : windowHashes(tokenKeys(tokens, params.normalize), params.windowSize);
    return { tokens, hashes, cache: "hit" };
  }

  if (lookup.status === "corrupt") {
    logger.warn("[Scan] Cache record unusable, recomputing", { file: input.path, reason: lookup.reason });
  }

  let tokens: Token[];
  try {
    tokens = tokenize(source, input.language, input.path);
  } catch (error) {
    // Parser crashes count as malformed input for this file only
    throw error instanceof TwinscanError ? error : new TokenizeError(errorMessage(error));
  }
  const hashes = windowHashes(tokenKeys(tokens, params.normalize), params.windowSize);

  try {
    await ctx.cache.put(key, createCacheEntry(tokens, hashes, params, Date.now()));
  } catch (error) {
    logger.warn("[Scan] Cache write failed", { file: input.path, error: errorMessage(error) });
  }

  return { tokens, hashes, cache: lookup.status };
}

async function analyzeFile(input: ScanInput, ctx: FileTaskContext): Promise<FileOutcome> {
  if (ctx.signal?.aborted) {
    return { kind: "aborted" };
  }

  try {
    const language = input.language;
    if (!isLanguageSupported(language)) {
      throw new UnsupportedLanguageError(language, input.path);
    }

    const absolute = path.resolve(ctx.config.root, input.path);
    let bytes: Buffer;
    let mtimeMs: number;
    try {
      const [content, stat] = await Promise.all([fs.readFile(absolute), fs.stat(absolute)]);
      bytes = content;
      mtimeMs = stat.mtimeMs;
    } catch (error) {
      throw new FileReadError(input.path, error);
    }

    const seen: SourceFile = { path: input.path, language, contentHash: contentHash(bytes), mtimeMs };
    const params = cacheParamsFor(ctx.config, seen);
    const key = cacheKey(seen.contentHash, params.dialect);
    const source = bytes.toString("utf8");
    const { tokens, hashes, cache } = await loadOrCompute(seen, source, key, params, ctx);

    try {
      await ctx.cache.recordSeen(seen.path, key);
    } catch (error) {
      logger.warn("[Scan] Could not update cache index", { file: input.path, error: errorMessage(error) });
    }

    logger.debug(`[Scan] Analyzed ${input.path}`, { cache, tokens: tokens.length, mtimeMs: seen.mtimeMs });

    const suppressed =
      ctx.config.scan.inline_suppressions && source.includes("twinscan-ignore-")
        ? resolveSuppressedRanges(input.path, source, "DUPLICATE_CODE")
        : [];

    return {
      kind: "analyzed",
      file: { path: input.path, language, source, tokens, hashes },
      seen,
      cacheKey: key,
      cache,
      suppressed,
    };
  } catch (error) {
    if (isFileError(error)) {
      const warning: ScanWarning = { file: input.path, code: error.code, message: error.message };
      logger.warn(`[Scan] Skipping ${input.path}`, { code: error.code, error: error.message });
      return { kind: "skipped", warning };
    }
    throw error;
  }
}

/**
 * Scan files for duplicated code.
 *
 * @param inputs - (path, language) pairs; relative paths resolve against the config root
 * @param config - Resolved configuration
 * @param options - Cache store, external suppressions, cancellation
 * @throws ScanAbortedError when `options.signal` fires before all files are processed
 */
export async function scan(
  inputs: ScanInput[],
  config: LoadedConfig,
  options: ScanOptions = {}
): Promise<ScanResult> {
  const startedAt = Date.now();
  const cache = options.cache ?? createCacheStore(config);

  // The same path listed twice is scanned once
  const unique = [...new Map(inputs.map((input) => [input.path, input])).values()];
  const included = unique.filter((input) => !config.isFileIgnored(input.path));

  const limit = pLimit(resolveWorkerCount(config));
  const ctx: FileTaskContext = { config, cache, signal: options.signal };

  logger.debug("[Scan] Starting", {
    files: included.length,
    ignored: unique.length - included.length,
    workers: resolveWorkerCount(config),
  });

  // Barrier: nothing below runs until every file task has settled
  const outcomes = await Promise.all(included.map((input) => limit(() => analyzeFile(input, ctx))));

  const stats: ScanStats = {
    filesTotal: unique.length,
    filesScanned: 0,
    filesIgnored: unique.length - included.length,
    filesSkipped: 0,
    cacheHits: 0,
    cacheMisses: 0,
    cacheCorrupt: 0,
    cachePruned: 0,
    tokens: 0,
    durationMs: 0,
  };

  const analyzed: AnalyzedFile[] = [];
  const warnings: ScanWarning[] = [];
  const suppressedRanges: SuppressedRange[] = [...(options.suppressedRanges ?? [])];
  const liveHashes = new Set<string>();
  let aborted = 0;

  for (const outcome of outcomes) {
    switch (outcome.kind) {
      case "analyzed":
        analyzed.push(outcome.file);
        suppressedRanges.push(...outcome.suppressed);
        liveHashes.add(outcome.cacheKey);
        stats.filesScanned++;
        stats.tokens += outcome.file.tokens.length;
        if (outcome.cache === "hit") stats.cacheHits++;
        else if (outcome.cache === "miss") stats.cacheMisses++;
        else stats.cacheCorrupt++;
        break;
      case "skipped":
        warnings.push(outcome.warning);
        stats.filesSkipped++;
        break;
      case "aborted":
        aborted++;
        break;
    }
  }

  if (aborted > 0) {
    await maintainCache("flush", () => cache.flush(), undefined);
    throw new ScanAbortedError(included.length - aborted, included.length);
  }

  const violations = detectDuplicates(analyzed, config, {
    suppressedRanges,
    filters: options.filters,
  });

  if (config.cache.enabled) {
    const pruneOptions = { liveHashes, maxAgeDays: config.cache.max_age_days };
    stats.cachePruned = await maintainCache("prune", () => cache.prune(pruneOptions), 0);
  }
  await maintainCache("flush", () => cache.flush(), undefined);

  stats.durationMs = Date.now() - startedAt;
  const status: ScanStatus =
    violations.length > 0 || (config.scan.strict && warnings.length > 0) ? "fail" : "pass";

  logger.info("[Scan] Complete", {
    status,
    violations: violations.length,
    warnings: warnings.length,
    filesScanned: stats.filesScanned,
    cacheHits: stats.cacheHits,
    cacheMisses: stats.cacheMisses,
    durationMs: stats.durationMs,
  });

  return { violations, warnings, stats, status };
}

/**
 * Remove every record from the configured cache. Never changes scan output.
 */
export async function clearCache(config: LoadedConfig, cache: CacheStore = createCacheStore(config)): Promise<void> {
  await cache.clear();
  logger.info("[Cache] Cleared", { backend: config.cache.backend });
}
