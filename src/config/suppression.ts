/**
 * Inline suppression directive parsing for twinscan.
 *
 * Supports comment-based suppressions that work across languages:
 * - twinscan-ignore-file ALL|RULE_ID[,RULE_ID...]
 * - twinscan-ignore-line ALL|RULE_ID[,RULE_ID...]
 * - twinscan-ignore-next-line ALL|RULE_ID[,RULE_ID...]
 * - twinscan-ignore-start ALL|RULE_ID[,RULE_ID...] ... twinscan-ignore-end
 *
 * The engine itself only consumes SuppressedRange lists; this module is the
 * built-in way of producing them from source comments.
 */

import { RuleId, isValidRuleId } from "../analysis/rules";
import { SuppressedRange } from "../analysis/types";

/**
 * The scope of a suppression directive.
 */
export type SuppressionScope = "file" | "line" | "next-line" | "start" | "end";

/**
 * A parsed suppression directive.
 */
export interface SuppressionDirective {
  /**
   * The scope of suppression:
   * - "file": Suppress for the entire file
   * - "line": Suppress for the current line only
   * - "next-line": Suppress for the next line only
   * - "start"/"end": Suppress every line between the pair (inclusive)
   */
  scope: SuppressionScope;

  /**
   * If true, all rules are suppressed for this scope.
   */
  allRules: boolean;

  /**
   * Specific rule IDs to suppress (empty if allRules is true, or for "end").
   */
  rules: RuleId[];

  /**
   * The 1-based line number where this directive appears.
   */
  line: number;
}

const SCOPES: readonly SuppressionScope[] = ["file", "line", "next-line", "start", "end"];

/**
 * Parse all suppression directives from source code.
 *
 * @param source - The source code to parse
 * @returns Array of parsed suppression directives
 */
export function parseSuppressionDirectives(source: string): SuppressionDirective[] {
  const directives: SuppressionDirective[] = [];
  // Handle both LF and CRLF line endings
  const lines = source.split(/\r?\n/);

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i];
    const lineNumber = i + 1;

    // Cheap pre-check; most lines carry no directive
    if (!line.includes("twinscan-ignore-")) {
      continue;
    }

    // Create fresh regex per line to avoid global state issues
    const directiveRegex = /twinscan-ignore-(file|line|next-line|start|end)\b[ \t]*([A-Z0-9_, \t]*)/gi;

    let match: RegExpExecArray | null;
    while ((match = directiveRegex.exec(line)) !== null) {
      const scopeStr = match[1].toLowerCase();
      const rulesStr = match[2].trim();

      const scope = SCOPES.find((candidate) => candidate === scopeStr);
      if (!scope) {
        continue;
      }

      if (scope === "end") {
        directives.push({ scope, allRules: false, rules: [], line: lineNumber });
        continue;
      }

      if (rulesStr.toUpperCase() === "ALL" || rulesStr === "") {
        directives.push({
          scope,
          allRules: true,
          rules: [],
          line: lineNumber,
        });
        continue;
      }

      // Split by comma or whitespace, keep known rule IDs
      const ruleTokens = rulesStr
        .split(/[,\s]+/)
        .map((s) => s.trim())
        .filter((s) => s.length > 0);

      const validRules: RuleId[] = [];
      for (const token of ruleTokens) {
        if (token.toUpperCase() === "ALL") {
          validRules.length = 0;
          directives.push({ scope, allRules: true, rules: [], line: lineNumber });
          break;
        }
        if (isValidRuleId(token)) {
          validRules.push(token);
        }
      }

      if (validRules.length > 0) {
        directives.push({
          scope,
          allRules: false,
          rules: validRules,
          line: lineNumber,
        });
      }
    }
  }

  return directives;
}

function appliesTo(directive: SuppressionDirective, ruleId: RuleId): boolean {
  return directive.allRules || directive.rules.includes(ruleId);
}

/**
 * Check if a specific rule is suppressed at a given line.
 *
 * @param ruleId - The rule ID to check
 * @param line - The 1-based line number where the finding would be reported
 * @param directives - The parsed suppression directives for the file
 */
export function isSuppressed(ruleId: RuleId, line: number, directives: SuppressionDirective[]): boolean {
  return resolveRanges("", ruleId, directives, Number.MAX_SAFE_INTEGER).some(
    (range) => line >= range.startLine && line <= range.endLine
  );
}

/**
 * Convert the directives of one file into the line ranges the engine filters on.
 *
 * An unterminated `start` block runs to the end of the file; a stray `end` is ignored.
 *
 * @param file - Path the ranges belong to (as passed to the scanner)
 * @param source - Full file content
 * @param ruleId - Only directives naming this rule (or ALL) count
 */
export function resolveSuppressedRanges(file: string, source: string, ruleId: RuleId): SuppressedRange[] {
  const lineCount = source.split(/\r?\n/).length;
  return resolveRanges(file, ruleId, parseSuppressionDirectives(source), lineCount);
}

function resolveRanges(
  file: string,
  ruleId: RuleId,
  directives: SuppressionDirective[],
  lastLine: number
): SuppressedRange[] {
  const ranges: SuppressedRange[] = [];
  let openBlock: SuppressionDirective | null = null;

  for (const directive of directives) {
    if (directive.scope === "end") {
      if (openBlock) {
        ranges.push({ file, startLine: openBlock.line, endLine: directive.line });
        openBlock = null;
      }
      continue;
    }

    if (!appliesTo(directive, ruleId)) {
      continue;
    }

    switch (directive.scope) {
      case "file":
        return [{ file, startLine: 1, endLine: lastLine }];

      case "line":
        ranges.push({ file, startLine: directive.line, endLine: directive.line });
        break;

      case "next-line":
        ranges.push({ file, startLine: directive.line + 1, endLine: directive.line + 1 });
        break;

      case "start":
        // Nested starts extend the outer block
        openBlock = openBlock ?? directive;
        break;
    }
  }

  if (openBlock) {
    ranges.push({ file, startLine: openBlock.line, endLine: lastLine });
  }

  return ranges;
}

/**
 * Whether any line of `span` falls inside one of the ranges for its file.
 */
export function isSpanSuppressed(
  span: { file: string; startLine: number; endLine: number },
  ranges: SuppressedRange[]
): boolean {
  return ranges.some(
    (range) => range.file === span.file && span.startLine <= range.endLine && span.endLine >= range.startLine
  );
}
