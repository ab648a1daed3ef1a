/**
 * Shared types for the duplicate-code engine.
 */

import { RuleId, RuleLevel } from "./rules";
import { FileErrorCode } from "./errors";

export type Severity = "low" | "medium" | "high";

/**
 * Languages with a registered tokenizer.
 */
export type SupportedLanguage = "typescript" | "javascript" | "python" | "go" | "ruby";

/**
 * A file handed to the scanner by the orchestrator.
 * `language` is whatever the upstream detector produced; unknown values are
 * reported as UNSUPPORTED_LANGUAGE warnings.
 */
export interface ScanInput {
  path: string;
  language: string;
}

/**
 * A file as seen during one run.
 */
export interface SourceFile {
  readonly path: string;
  readonly language: SupportedLanguage;
  readonly contentHash: string;
  readonly mtimeMs: number;
}

export type TokenKind = "identifier" | "literal" | "keyword" | "symbol";

/**
 * Smallest meaningful unit after comment and whitespace stripping.
 * Lines and columns are 1-based; endColumn is exclusive.
 */
export interface Token {
  text: string;
  /** `$id`, `$str` or `$num` for identifiers and literals, `text` otherwise */
  normalized: string;
  kind: TokenKind;
  startLine: number;
  startColumn: number;
  endLine: number;
  endColumn: number;
}

export type TokenStream = Token[];

/**
 * Hash of `length` tokens starting at token index `start` of `file`.
 */
export interface Fingerprint {
  start: number;
  length: number;
  hash: number;
  file: string;
}

/**
 * One place a duplicated block appears. Token indices are inclusive.
 */
export interface Occurrence {
  file: string;
  startLine: number;
  endLine: number;
  startToken: number;
  endToken: number;
}

export interface DuplicateCluster {
  /** Representative slice, taken from the first occurrence */
  tokens: Token[];
  tokenCount: number;
  occurrences: Occurrence[];
}

export interface Location {
  file: string;
  startLine: number;
  endLine: number;
}

export interface Violation {
  ruleId: RuleId;
  location: Location;
  relatedLocations: Location[];
  lineCount: number;
  tokenCount: number;
  occurrenceCount: number;
  message: string;
  severity: Severity;
  level: RuleLevel;
}

/**
 * Lines of `file` whose duplicates should not be reported (1-based, inclusive).
 */
export interface SuppressedRange {
  file: string;
  startLine: number;
  endLine: number;
}

/**
 * A file that was skipped. The scan continues without it.
 */
export interface ScanWarning {
  file: string;
  code: FileErrorCode;
  message: string;
}
