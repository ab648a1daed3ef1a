/**
 * Violation reporter: turns merged clusters into DUPLICATE_CODE violations.
 *
 * Per cluster: drop suppressed occurrences, enforce thresholds, run block
 * filters, then describe what is left. Suppressed occurrences normally never
 * reach this point (see findDuplicateClusters); external callers may still
 * pass raw clusters.
 */

import { RequiredRuleConfig } from "../rules";
import {
  DuplicateCluster,
  Location,
  Occurrence,
  Severity,
  SuppressedRange,
  Violation,
} from "../types";
import { RequiredThresholds } from "../../config/schema";
import { isSpanSuppressed } from "../../config/suppression";
import { BlockFilterContext, BlockFilterRegistry } from "./filters";

const DUPLICATE_SEVERITY: Severity = "medium";

export interface ReportOptions {
  thresholds: RequiredThresholds;
  rule: RequiredRuleConfig;
  /** Suppressed ranges grouped by file */
  suppressed: Map<string, SuppressedRange[]>;
  filters: BlockFilterRegistry;
  filterContext: BlockFilterContext;
}

function compareStrings(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

export function compareOccurrences(a: Location, b: Location): number {
  return compareStrings(a.file, b.file) || a.startLine - b.startLine || a.endLine - b.endLine;
}

/**
 * Group ranges by file for lookup.
 */
export function groupSuppressedRanges(ranges: SuppressedRange[]): Map<string, SuppressedRange[]> {
  const byFile = new Map<string, SuppressedRange[]>();
  for (const range of ranges) {
    const list = byFile.get(range.file);
    if (list) {
      list.push(range);
    } else {
      byFile.set(range.file, [range]);
    }
  }
  return byFile;
}

/**
 * Remove occurrences that share at least one line with a suppressed range.
 */
export function applySuppressions(
  cluster: DuplicateCluster,
  suppressed: Map<string, SuppressedRange[]>
): DuplicateCluster {
  const occurrences = cluster.occurrences.filter((occurrence) => {
    return !isSpanSuppressed(occurrence, suppressed.get(occurrence.file) ?? []);
  });
  return occurrences.length === cluster.occurrences.length ? cluster : { ...cluster, occurrences };
}

/**
 * Smallest line span among the occurrences.
 */
export function clusterLineCount(cluster: DuplicateCluster): number {
  return Math.min(...cluster.occurrences.map((o) => o.endLine - o.startLine + 1));
}

export function meetsThresholds(cluster: DuplicateCluster, thresholds: RequiredThresholds): boolean {
  if (cluster.occurrences.length < Math.max(2, thresholds.min_occurrences)) {
    return false;
  }
  if (cluster.tokenCount < thresholds.min_duplicate_tokens) {
    return false;
  }
  return clusterLineCount(cluster) >= thresholds.min_duplicate_lines;
}

function toLocation(occurrence: Occurrence): Location {
  return { file: occurrence.file, startLine: occurrence.startLine, endLine: occurrence.endLine };
}

/**
 * Describe one cluster. The primary location is the earliest occurrence by path, then line.
 */
export function buildViolation(cluster: DuplicateCluster, rule: RequiredRuleConfig): Violation {
  const ordered = [...cluster.occurrences].sort(compareOccurrences);
  const [primary, ...others] = ordered.map(toLocation);
  const lineCount = clusterLineCount(cluster);
  const also = others.map((o) => `${o.file}:${o.startLine}-${o.endLine}`).join(", ");

  return {
    ruleId: "DUPLICATE_CODE",
    location: primary,
    relatedLocations: others,
    lineCount,
    tokenCount: cluster.tokenCount,
    occurrenceCount: ordered.length,
    message: `Duplicate code (${lineCount} lines, ${ordered.length} occurrences). Also found in: ${also}`,
    severity: DUPLICATE_SEVERITY,
    level: rule.level,
  };
}

/**
 * Run the cluster-to-violation pipeline for one language group.
 */
export function reportDuplicates(clusters: DuplicateCluster[], options: ReportOptions): Violation[] {
  const violations: Violation[] = [];

  for (const raw of clusters) {
    const cluster = applySuppressions(raw, options.suppressed);
    if (!meetsThresholds(cluster, options.thresholds)) {
      continue;
    }
    if (options.filters.shouldFilterBlock(cluster, options.filterContext)) {
      continue;
    }
    violations.push(buildViolation(cluster, options.rule));
  }

  return violations;
}

/**
 * Output order: primary file, start line, end line, occurrence count.
 */
export function sortViolations(violations: Violation[]): Violation[] {
  return [...violations].sort(
    (a, b) =>
      compareStrings(a.location.file, b.location.file) ||
      a.location.startLine - b.location.startLine ||
      a.location.endLine - b.location.endLine ||
      a.occurrenceCount - b.occurrenceCount
  );
}
