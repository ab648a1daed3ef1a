/**
 * Configuration loader for twinscan.
 *
 * Loads and validates configuration from .twinscan.yml files, applying
 * defaults and environment overrides. Invalid values raise ConfigError
 * before any file is scanned.
 */

import * as fs from "fs";
import * as path from "path";
import * as yaml from "js-yaml";
import { minimatch } from "minimatch";
import { config as env } from "../env";
import { ConfigError } from "../analysis/errors";
import { RequiredRuleConfig, RuleId, isRuleLevel, DEFAULT_RULE_CONFIG } from "../analysis/rules";
import { SupportedLanguage } from "../analysis/types";
import {
  BLOCK_FILTER_NAMES,
  BlockFilterName,
  CacheBackend,
  LanguageThresholds,
  RequiredCacheConfig,
  RequiredDuplicatesConfig,
  RequiredFilesConfig,
  RequiredScanConfig,
  RequiredThresholds,
  TwinscanConfig,
  DEFAULT_CACHE_CONFIG,
  DEFAULT_DUPLICATES_CONFIG,
  DEFAULT_FILES_CONFIG,
  DEFAULT_SCAN_CONFIG,
} from "./schema";

/**
 * The loaded and resolved configuration with helper methods.
 */
export interface LoadedConfig {
  /**
   * The raw parsed configuration (or defaults if no file found).
   */
  raw: TwinscanConfig;

  /**
   * Absolute repository root. Relative paths are resolved against it.
   */
  root: string;

  duplicates: RequiredDuplicatesConfig;
  files: RequiredFilesConfig;

  /**
   * Resolved cache configuration; `dir` is absolute.
   */
  cache: RequiredCacheConfig;

  /**
   * Resolved scan configuration; `workers` is 0 when the pool should size itself.
   */
  scan: RequiredScanConfig;

  /**
   * Check if a file should be left out of duplicate detection.
   * @param filePath - Absolute path or path relative to the repo root
   */
  isFileIgnored(filePath: string): boolean;

  /**
   * Effective thresholds for a language (global values merged with `languages` overrides).
   */
  getThresholds(language: SupportedLanguage): RequiredThresholds;

  /**
   * Effective rule configuration, derived from `duplicates.enabled` and `duplicates.level`.
   */
  getRuleConfig(ruleId: RuleId): RequiredRuleConfig;
}

/**
 * Config file name to search for in repo root.
 */
export const CONFIG_FILE_NAME = ".twinscan.yml";

const CACHE_BACKENDS: readonly CacheBackend[] = ["disk", "redis", "memory"];

const THRESHOLD_LANGUAGES: readonly SupportedLanguage[] = [
  "typescript",
  "javascript",
  "python",
  "go",
  "ruby",
];

/**
 * Load configuration from a repository root directory.
 *
 * @param repoRoot - Path to the repository root directory
 * @returns LoadedConfig with resolved values and helper methods
 * @throws ConfigError when the file cannot be parsed or holds invalid values
 */
export function loadConfig(repoRoot: string): LoadedConfig {
  const configPath = path.join(repoRoot, CONFIG_FILE_NAME);

  if (!fs.existsSync(configPath)) {
    return buildLoadedConfig({ version: 1 }, repoRoot);
  }

  const fileContents = fs.readFileSync(configPath, "utf-8");
  return buildLoadedConfig(parseConfigYaml(fileContents, configPath), repoRoot);
}

/**
 * Load configuration from a YAML string (useful for testing or API usage).
 * This function does not touch the filesystem.
 *
 * @param yamlContent - The YAML content string
 * @param repoRoot - Root used to resolve relative paths (defaults to cwd)
 */
export function loadConfigFromString(yamlContent: string, repoRoot: string = process.cwd()): LoadedConfig {
  return buildLoadedConfig(parseConfigYaml(yamlContent, "<string>"), repoRoot);
}

/**
 * Create a default LoadedConfig without any file.
 */
export function createDefaultConfig(repoRoot: string = process.cwd()): LoadedConfig {
  return buildLoadedConfig({ version: 1 }, repoRoot);
}

// ============================================================================
// Parsing
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function parseConfigYaml(source: string, origin: string): TwinscanConfig {
  let parsed: unknown;
  try {
    parsed = yaml.load(source);
  } catch (err) {
    throw new ConfigError(`Failed to parse ${origin}: ${err instanceof Error ? err.message : String(err)}`);
  }

  // An empty file is the same as no file
  if (parsed === null || parsed === undefined) {
    return { version: 1 };
  }
  if (!isRecord(parsed)) {
    throw new ConfigError(`${origin} must contain a mapping at the top level`);
  }

  return {
    version: readNumber(parsed, "version", origin) ?? 1,
    duplicates: readSection(parsed, "duplicates", origin, (section, where) => ({
      enabled: readBoolean(section, "enabled", where),
      min_duplicate_lines: readNumber(section, "min_duplicate_lines", where),
      min_duplicate_tokens: readNumber(section, "min_duplicate_tokens", where),
      min_occurrences: readNumber(section, "min_occurrences", where),
      languages: readLanguages(section, where),
      normalize: readBoolean(section, "normalize", where),
      level: readLevel(section, where),
      filters: readFilters(section, where),
      detect_duplicate_constants: readBoolean(section, "detect_duplicate_constants", where),
      min_constant_occurrences: readNumber(section, "min_constant_occurrences", where),
    })),
    files: readSection(parsed, "files", origin, (section, where) => ({
      ignore: readStringList(section, "ignore", where),
    })),
    cache: readSection(parsed, "cache", origin, (section, where) => ({
      enabled: readBoolean(section, "enabled", where),
      backend: readBackend(section, where),
      dir: readString(section, "dir", where),
      max_age_days: readNumber(section, "max_age_days", where),
      key_prefix: readString(section, "key_prefix", where),
    })),
    scan: readSection(parsed, "scan", origin, (section, where) => ({
      workers: readNumber(section, "workers", where),
      strict: readBoolean(section, "strict", where),
      inline_suppressions: readBoolean(section, "inline_suppressions", where),
    })),
  };
}

function readSection<T>(
  parent: Record<string, unknown>,
  key: string,
  origin: string,
  read: (section: Record<string, unknown>, where: string) => T
): T | undefined {
  const value = parent[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (!isRecord(value)) {
    throw new ConfigError(`${origin}: "${key}" must be a mapping`);
  }
  return read(value, `${origin}: ${key}`);
}

function readNumber(section: Record<string, unknown>, key: string, where: string): number | undefined {
  const value = section[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "number" || Number.isNaN(value)) {
    throw new ConfigError(`${where}.${key} must be a number`, { value });
  }
  return value;
}

function readBoolean(section: Record<string, unknown>, key: string, where: string): boolean | undefined {
  const value = section[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "boolean") {
    throw new ConfigError(`${where}.${key} must be true or false`, { value });
  }
  return value;
}

function readString(section: Record<string, unknown>, key: string, where: string): string | undefined {
  const value = section[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "string") {
    throw new ConfigError(`${where}.${key} must be a string`, { value });
  }
  return value;
}

function readStringList(section: Record<string, unknown>, key: string, where: string): string[] | undefined {
  const value = section[key];
  if (value === undefined || value === null) return undefined;
  if (!Array.isArray(value) || !value.every((item): item is string => typeof item === "string")) {
    throw new ConfigError(`${where}.${key} must be a list of glob strings`, { value });
  }
  return value;
}

function readLevel(section: Record<string, unknown>, where: string) {
  const value = section.level;
  if (value === undefined || value === null) return undefined;
  if (!isRuleLevel(value)) {
    throw new ConfigError(`${where}.level must be one of error, warning, info, off`, { value });
  }
  return value;
}

function readBackend(section: Record<string, unknown>, where: string): CacheBackend | undefined {
  const value = section.backend;
  if (value === undefined || value === null) return undefined;
  const backend = CACHE_BACKENDS.find((candidate) => candidate === value);
  if (!backend) {
    throw new ConfigError(`${where}.backend must be one of ${CACHE_BACKENDS.join(", ")}`, { value });
  }
  return backend;
}

function readFilters(
  section: Record<string, unknown>,
  where: string
): Partial<Record<BlockFilterName, boolean>> | undefined {
  const value = section.filters;
  if (value === undefined || value === null) return undefined;
  if (!isRecord(value)) {
    throw new ConfigError(`${where}.filters must be a mapping`);
  }

  const result: Partial<Record<BlockFilterName, boolean>> = {};
  for (const name of Object.keys(value)) {
    const filter = BLOCK_FILTER_NAMES.find((candidate) => candidate === name);
    if (!filter) {
      throw new ConfigError(`${where}.filters: unknown filter "${name}"`);
    }
    result[filter] = readBoolean(value, name, `${where}.filters`);
  }
  return result;
}

function readLanguages(
  section: Record<string, unknown>,
  where: string
): Partial<Record<SupportedLanguage, LanguageThresholds>> | undefined {
  const value = section.languages;
  if (value === undefined || value === null) return undefined;
  if (!isRecord(value)) {
    throw new ConfigError(`${where}.languages must be a mapping`);
  }

  const result: Partial<Record<SupportedLanguage, LanguageThresholds>> = {};
  for (const [name, overrides] of Object.entries(value)) {
    const language = THRESHOLD_LANGUAGES.find((candidate) => candidate === name);
    if (!language) {
      throw new ConfigError(`${where}.languages: unknown language "${name}"`);
    }
    if (!isRecord(overrides)) {
      throw new ConfigError(`${where}.languages.${name} must be a mapping`);
    }
    const langWhere = `${where}.languages.${name}`;
    result[language] = {
      min_duplicate_lines: readNumber(overrides, "min_duplicate_lines", langWhere),
      min_duplicate_tokens: readNumber(overrides, "min_duplicate_tokens", langWhere),
      min_occurrences: readNumber(overrides, "min_occurrences", langWhere),
    };
  }
  return result;
}

// ============================================================================
// Resolution and validation
// ============================================================================

function requirePositiveInteger(value: number, name: string): void {
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigError(`${name} must be a positive integer, got ${value}`, { [name]: value });
  }
}

function requireOccurrences(value: number, name: string): void {
  if (!Number.isInteger(value) || value < 2) {
    throw new ConfigError(`${name} must be an integer of at least 2, got ${value}`, { [name]: value });
  }
}

function validateThresholds(thresholds: RequiredThresholds, prefix: string): void {
  requirePositiveInteger(thresholds.min_duplicate_lines, `${prefix}min_duplicate_lines`);
  requirePositiveInteger(thresholds.min_duplicate_tokens, `${prefix}min_duplicate_tokens`);
  requireOccurrences(thresholds.min_occurrences, `${prefix}min_occurrences`);
}

function mergeThresholds(base: RequiredThresholds, override: LanguageThresholds | undefined): RequiredThresholds {
  return {
    min_duplicate_lines: override?.min_duplicate_lines ?? base.min_duplicate_lines,
    min_duplicate_tokens: override?.min_duplicate_tokens ?? base.min_duplicate_tokens,
    min_occurrences: override?.min_occurrences ?? base.min_occurrences,
  };
}

/**
 * Build a LoadedConfig from a raw TwinscanConfig.
 */
function buildLoadedConfig(rawConfig: TwinscanConfig, repoRoot: string): LoadedConfig {
  const root = path.resolve(repoRoot);

  if (rawConfig.version !== 1) {
    throw new ConfigError(`Unsupported config version ${rawConfig.version}`, { version: rawConfig.version });
  }

  const duplicates: RequiredDuplicatesConfig = {
    enabled: rawConfig.duplicates?.enabled ?? DEFAULT_DUPLICATES_CONFIG.enabled,
    min_duplicate_lines:
      rawConfig.duplicates?.min_duplicate_lines ?? DEFAULT_DUPLICATES_CONFIG.min_duplicate_lines,
    min_duplicate_tokens:
      rawConfig.duplicates?.min_duplicate_tokens ?? DEFAULT_DUPLICATES_CONFIG.min_duplicate_tokens,
    min_occurrences: rawConfig.duplicates?.min_occurrences ?? DEFAULT_DUPLICATES_CONFIG.min_occurrences,
    languages: rawConfig.duplicates?.languages ?? {},
    normalize: rawConfig.duplicates?.normalize ?? DEFAULT_DUPLICATES_CONFIG.normalize,
    level: rawConfig.duplicates?.level ?? DEFAULT_DUPLICATES_CONFIG.level,
    filters: { ...DEFAULT_DUPLICATES_CONFIG.filters },
    detect_duplicate_constants:
      rawConfig.duplicates?.detect_duplicate_constants ?? DEFAULT_DUPLICATES_CONFIG.detect_duplicate_constants,
    min_constant_occurrences:
      rawConfig.duplicates?.min_constant_occurrences ?? DEFAULT_DUPLICATES_CONFIG.min_constant_occurrences,
  };
  for (const name of BLOCK_FILTER_NAMES) {
    duplicates.filters[name] = rawConfig.duplicates?.filters?.[name] ?? duplicates.filters[name];
  }

  validateThresholds(duplicates, "duplicates.");
  requireOccurrences(duplicates.min_constant_occurrences, "duplicates.min_constant_occurrences");
  for (const [language, overrides] of Object.entries(duplicates.languages)) {
    validateThresholds(mergeThresholds(duplicates, overrides), `duplicates.languages.${language}.`);
  }

  const files: RequiredFilesConfig = {
    ignore: rawConfig.files?.ignore ?? DEFAULT_FILES_CONFIG.ignore,
  };

  const cacheDir = env.TWINSCAN_CACHE_DIR ?? rawConfig.cache?.dir ?? DEFAULT_CACHE_CONFIG.dir;
  const cache: RequiredCacheConfig = {
    enabled: rawConfig.cache?.enabled ?? DEFAULT_CACHE_CONFIG.enabled,
    backend: rawConfig.cache?.backend ?? DEFAULT_CACHE_CONFIG.backend,
    dir: path.resolve(root, cacheDir),
    max_age_days: rawConfig.cache?.max_age_days ?? DEFAULT_CACHE_CONFIG.max_age_days,
    key_prefix: rawConfig.cache?.key_prefix ?? DEFAULT_CACHE_CONFIG.key_prefix,
  };

  if (cache.max_age_days < 0) {
    throw new ConfigError(`cache.max_age_days must not be negative, got ${cache.max_age_days}`);
  }

  const scan: RequiredScanConfig = {
    workers: env.TWINSCAN_WORKERS ?? rawConfig.scan?.workers ?? DEFAULT_SCAN_CONFIG.workers,
    strict: rawConfig.scan?.strict ?? DEFAULT_SCAN_CONFIG.strict,
    inline_suppressions: rawConfig.scan?.inline_suppressions ?? DEFAULT_SCAN_CONFIG.inline_suppressions,
  };

  if (!Number.isInteger(scan.workers) || scan.workers < 0) {
    throw new ConfigError(`scan.workers must be a non-negative integer, got ${scan.workers}`);
  }

  const ignorePatterns = files.ignore;

  /**
   * Check if a file matches any of the given glob patterns.
   */
  function matchesAnyPattern(filePath: string, patterns: string[]): boolean {
    const relative = path.isAbsolute(filePath) ? path.relative(root, filePath) : filePath;
    const normalizedPath = relative.replace(/\\/g, "/");
    return patterns.some((pattern) => minimatch(normalizedPath, pattern, { dot: true }));
  }

  function isFileIgnored(filePath: string): boolean {
    return matchesAnyPattern(filePath, ignorePatterns);
  }

  function getThresholds(language: SupportedLanguage): RequiredThresholds {
    return mergeThresholds(duplicates, duplicates.languages[language]);
  }

  function getRuleConfig(ruleId: RuleId): RequiredRuleConfig {
    const defaults = DEFAULT_RULE_CONFIG[ruleId];
    return {
      enabled: duplicates.enabled && defaults.enabled && duplicates.level !== "off",
      level: duplicates.level,
    };
  }

  return {
    raw: rawConfig,
    root,
    duplicates,
    files,
    cache,
    scan,
    isFileIgnored,
    getThresholds,
    getRuleConfig,
  };
}
