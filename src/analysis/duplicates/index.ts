/**
 * Duplicate detection over analyzed files: index, merge, report.
 *
 * Files are matched within their own language only; each language uses its
 * own `min_duplicate_tokens` as the window size. Duplicate constants are
 * reported alongside duplicated blocks when enabled.
 */

import { LoadedConfig } from "../../config/loader";
import { isSpanSuppressed } from "../../config/suppression";
import { tokenKeys } from "../fingerprint";
import { SupportedLanguage, SuppressedRange, Token, Violation } from "../types";
import { findDuplicateClusters, IndexedFile } from "./clusters";
import { reportDuplicateConstants } from "./constants";
import { BlockFilterRegistry, createDefaultRegistry } from "./filters";
import { groupSuppressedRanges, reportDuplicates, sortViolations } from "./reporter";

export { findDuplicateClusters } from "./clusters";
export type { IndexedFile } from "./clusters";
export { extractConstants, findConstantGroups, namesMatch, reportDuplicateConstants } from "./constants";
export type { ConstantDefinition } from "./constants";
export { BlockFilterRegistry, ImportGroupFilter, KeywordArgumentFilter, createDefaultRegistry } from "./filters";
export type { BlockFilter, BlockFilterContext } from "./filters";
export {
  applySuppressions,
  buildViolation,
  clusterLineCount,
  meetsThresholds,
  reportDuplicates,
  sortViolations,
} from "./reporter";

/**
 * A file after tokenizing and fingerprinting (fresh or from cache).
 */
export interface AnalyzedFile {
  path: string;
  language: SupportedLanguage;
  source: string;
  tokens: Token[];
  /** Window hashes computed with this language's window size */
  hashes: number[];
}

export interface DetectOptions {
  suppressedRanges?: SuppressedRange[];
  /** Defaults to the built-in filters switched per `duplicates.filters` */
  filters?: BlockFilterRegistry;
}

/**
 * Find duplicate blocks across `files` and report them as sorted violations.
 */
export function detectDuplicates(
  files: AnalyzedFile[],
  config: LoadedConfig,
  options: DetectOptions = {}
): Violation[] {
  const rule = config.getRuleConfig("DUPLICATE_CODE");
  if (!rule.enabled) {
    return [];
  }

  const byPath = new Map(files.map((f) => [f.path, f]));
  const suppressed = groupSuppressedRanges(options.suppressedRanges ?? []);
  const filters = options.filters ?? createDefaultRegistry(config.duplicates.filters);
  const unsuppressed = (occurrence: { file: string; startLine: number; endLine: number }) =>
    !isSpanSuppressed(occurrence, suppressed.get(occurrence.file) ?? []);

  const byLanguage = new Map<SupportedLanguage, AnalyzedFile[]>();
  for (const file of files) {
    const group = byLanguage.get(file.language);
    if (group) {
      group.push(file);
    } else {
      byLanguage.set(file.language, [file]);
    }
  }

  const violations: Violation[] = [];
  for (const [language, group] of byLanguage) {
    const thresholds = config.getThresholds(language);
    const indexed: IndexedFile[] = group.map((f) => ({
      file: f.path,
      tokens: f.tokens,
      keys: tokenKeys(f.tokens, config.duplicates.normalize),
      hashes: f.hashes,
    }));

    const clusters = findDuplicateClusters(indexed, thresholds.min_duplicate_tokens, unsuppressed);
    violations.push(
      ...reportDuplicates(clusters, {
        thresholds,
        rule,
        suppressed,
        filters,
        filterContext: {
          language,
          getSource: (path) => byPath.get(path)?.source,
          getTokens: (path) => byPath.get(path)?.tokens,
        },
      })
    );
  }

  if (config.duplicates.detect_duplicate_constants) {
    violations.push(
      ...reportDuplicateConstants(files, {
        minOccurrences: config.duplicates.min_constant_occurrences,
        rule,
        suppressed,
      })
    );
  }

  return sortViolations(violations);
}
