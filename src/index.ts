/**
 * twinscan: duplicate-code detection across TypeScript, JavaScript, Python,
 * Go and Ruby sources, with an incremental fingerprint cache.
 *
 * Typical use:
 *
 *   const config = loadConfig(repoRoot);
 *   const result = await scan(files, config);
 *   // result.violations, result.warnings, result.status
 */

// Scanning
export { scan, clearCache, resolveWorkerCount } from "./analysis/scanner";
export type { ScanOptions, ScanResult, ScanStats, ScanStatus } from "./analysis/scanner";

// Building blocks
export {
  tokenize,
  tokenizerDialect,
  getTokenizer,
  detectLanguage,
  isLanguageSupported,
  SUPPORTED_LANGUAGES,
} from "./analysis/tokenizers";
export { fnv1a, generateFingerprints, rollingHashes, tokenKeys } from "./analysis/fingerprint";
export {
  BlockFilterRegistry,
  ImportGroupFilter,
  KeywordArgumentFilter,
  createDefaultRegistry,
  detectDuplicates,
  findDuplicateClusters,
  reportDuplicateConstants,
} from "./analysis/duplicates";
export type {
  AnalyzedFile,
  BlockFilter,
  BlockFilterContext,
  ConstantDefinition,
  IndexedFile,
} from "./analysis/duplicates";

// Cache
export {
  CACHE_SCHEMA_VERSION,
  DiskCacheStore,
  MemoryCacheStore,
  RedisCacheStore,
  createCacheStore,
  contentHash,
  fromIORedis,
} from "./cache";
export type { CacheEntry, CacheLookup, CacheParams, CacheStore, PruneOptions, RedisCacheClient } from "./cache";
export { closeRedisConnection } from "./redis";

// Configuration and suppressions
export { loadConfig, loadConfigFromString, createDefaultConfig, CONFIG_FILE_NAME } from "./config/loader";
export type { LoadedConfig } from "./config/loader";
export type { TwinscanConfig } from "./config/schema";
export { parseSuppressionDirectives, resolveSuppressedRanges, isSuppressed, isSpanSuppressed } from "./config/suppression";
export type { SuppressionDirective } from "./config/suppression";

// Errors and shared types
export {
  TwinscanError,
  UnsupportedLanguageError,
  TokenizeError,
  CacheCorruptionError,
  ConfigError,
  FileReadError,
  ScanAbortedError,
} from "./analysis/errors";
export type { RuleId, RuleLevel } from "./analysis/rules";
export type {
  DuplicateCluster,
  Fingerprint,
  Location,
  Occurrence,
  ScanInput,
  ScanWarning,
  SourceFile,
  SupportedLanguage,
  SuppressedRange,
  Token,
  TokenKind,
  Violation,
} from "./analysis/types";
