/**
 * Configuration schema types for .twinscan.yml files.
 *
 * This module defines the structure of the configuration file
 * that can be placed in repository roots to tune duplicate detection.
 */

import { RuleLevel } from "../analysis/rules";
import { SupportedLanguage } from "../analysis/types";

/**
 * Threshold overrides for one language.
 */
export interface LanguageThresholds {
  min_duplicate_lines?: number;
  min_duplicate_tokens?: number;
  min_occurrences?: number;
}

/**
 * Built-in block filters, by the name used under `duplicates.filters`.
 */
export const BLOCK_FILTER_NAMES = ["import_group_filter", "keyword_argument_filter"] as const;
export type BlockFilterName = (typeof BLOCK_FILTER_NAMES)[number];

/**
 * Duplicate detection options.
 */
export interface TwinscanDuplicatesConfig {
  /**
   * Whether the DUPLICATE_CODE rule runs at all.
   * Default: true
   */
  enabled?: boolean;

  /**
   * Minimum number of source lines a block must span in every occurrence.
   * Default: 3
   */
  min_duplicate_lines?: number;

  /**
   * Minimum number of significant tokens in a block. Also the fingerprint window size.
   * Default: 30
   */
  min_duplicate_tokens?: number;

  /**
   * Minimum number of occurrences before a block is reported (at least 2).
   * Default: 2
   */
  min_occurrences?: number;

  /**
   * Per-language overrides of the thresholds above.
   */
  languages?: Partial<Record<SupportedLanguage, LanguageThresholds>>;

  /**
   * Match on normalized identifiers and literals instead of exact token text.
   * Default: false
   */
  normalize?: boolean;

  /**
   * Level attached to emitted violations.
   * Default: "warning"
   */
  level?: RuleLevel;

  /**
   * Turn individual block filters on or off.
   * Default: every filter enabled
   */
  filters?: Partial<Record<BlockFilterName, boolean>>;

  /**
   * Also report UPPER_SNAKE constants defined in several files (Python,
   * TypeScript and JavaScript).
   * Default: true
   */
  detect_duplicate_constants?: boolean;

  /**
   * Number of distinct files a constant must be defined in (at least 2).
   * Default: 2
   */
  min_constant_occurrences?: number;
}

/**
 * File filtering configuration options.
 */
export interface TwinscanFilesConfig {
  /**
   * Glob patterns for files to leave out of duplicate detection entirely.
   * Example: ["tests/**", "**\/*.generated.ts"]
   */
  ignore?: string[];
}

export type CacheBackend = "disk" | "redis" | "memory";

/**
 * Incremental cache options.
 */
export interface TwinscanCacheConfig {
  /**
   * Default: true
   */
  enabled?: boolean;

  /**
   * Default: "disk"
   */
  backend?: CacheBackend;

  /**
   * Cache directory for the disk backend, relative to the repo root.
   * Default: ".twinscan-cache"
   */
  dir?: string;

  /**
   * Records not seen for this many days are pruned after a scan.
   * Default: 30
   */
  max_age_days?: number;

  /**
   * Key prefix for the redis backend.
   * Default: "twinscan:"
   */
  key_prefix?: string;
}

/**
 * Scanner options.
 */
export interface TwinscanScanConfig {
  /**
   * Worker pool size; 0 means available parallelism.
   * Default: 0
   */
  workers?: number;

  /**
   * Fail the run when any file was skipped, not only when violations exist.
   * Default: false
   */
  strict?: boolean;

  /**
   * Honor twinscan-ignore-* comments found while reading files.
   * Default: true
   */
  inline_suppressions?: boolean;
}

/**
 * Complete .twinscan.yml configuration schema.
 */
export interface TwinscanConfig {
  /**
   * Config file version. Currently only version 1 is supported.
   */
  version: number;

  duplicates?: TwinscanDuplicatesConfig;

  files?: TwinscanFilesConfig;

  cache?: TwinscanCacheConfig;

  scan?: TwinscanScanConfig;
}

/**
 * Required/complete versions of optional config interfaces.
 */
export interface RequiredThresholds {
  min_duplicate_lines: number;
  min_duplicate_tokens: number;
  min_occurrences: number;
}

export interface RequiredDuplicatesConfig extends RequiredThresholds {
  enabled: boolean;
  languages: Partial<Record<SupportedLanguage, LanguageThresholds>>;
  normalize: boolean;
  level: RuleLevel;
  filters: Record<BlockFilterName, boolean>;
  detect_duplicate_constants: boolean;
  min_constant_occurrences: number;
}

export interface RequiredFilesConfig {
  ignore: string[];
}

export interface RequiredCacheConfig {
  enabled: boolean;
  backend: CacheBackend;
  dir: string;
  max_age_days: number;
  key_prefix: string;
}

export interface RequiredScanConfig {
  workers: number;
  strict: boolean;
  inline_suppressions: boolean;
}

export const DEFAULT_DUPLICATES_CONFIG: RequiredDuplicatesConfig = {
  enabled: true,
  min_duplicate_lines: 3,
  min_duplicate_tokens: 30,
  min_occurrences: 2,
  languages: {},
  normalize: false,
  level: "warning",
  filters: { import_group_filter: true, keyword_argument_filter: true },
  detect_duplicate_constants: true,
  min_constant_occurrences: 2,
};

export const DEFAULT_FILES_CONFIG: RequiredFilesConfig = {
  ignore: [],
};

export const DEFAULT_CACHE_CONFIG: RequiredCacheConfig = {
  enabled: true,
  backend: "disk",
  dir: ".twinscan-cache",
  max_age_days: 30,
  key_prefix: "twinscan:",
};

export const DEFAULT_SCAN_CONFIG: RequiredScanConfig = {
  workers: 0,
  strict: false,
  inline_suppressions: true,
};
