/**
 * Duplicate constant detection.
 *
 * Module-level UPPER_SNAKE constants (Python assignments at column 1,
 * top-level `const` in TypeScript/JavaScript) are collected from every
 * scanned file. Definitions whose names match exactly, or fuzzily for
 * multi-word names, are grouped; a group defined in enough distinct files
 * becomes one DUPLICATE_CODE violation.
 */

import { isSpanSuppressed } from "../../config/suppression";
import { RequiredRuleConfig } from "../rules";
import { Location, SupportedLanguage, SuppressedRange, Token, Violation } from "../types";
import { compareOccurrences } from "./reporter";

export interface ConstantDefinition {
  name: string;
  /** Source text of the assigned value (first line only) */
  value: string;
  file: string;
  line: number;
  /** Tokens from the name through the end of the value */
  tokenCount: number;
}

/**
 * What the extractor needs from an analyzed file.
 */
export interface ConstantSource {
  path: string;
  language: SupportedLanguage;
  source: string;
  tokens: Token[];
}

export interface ConstantReportOptions {
  /** Distinct files a group must span */
  minOccurrences: number;
  rule: RequiredRuleConfig;
  /** Suppressed ranges grouped by file */
  suppressed: Map<string, SuppressedRange[]>;
}

const CONSTANT_NAME = /^[A-Z][A-Z0-9_]*$/;
const MAX_EDIT_DISTANCE = 2;

const OPENERS = new Set(["(", "[", "{"]);
const CLOSERS = new Set([")", "]", "}"]);

const ANTONYMS: ReadonlyArray<[string, string]> = [
  ["MAX", "MIN"],
  ["MAXIMUM", "MINIMUM"],
  ["START", "END"],
  ["BEGIN", "END"],
  ["FIRST", "LAST"],
  ["OPEN", "CLOSE"],
  ["ON", "OFF"],
  ["UP", "DOWN"],
  ["LEFT", "RIGHT"],
  ["TOP", "BOTTOM"],
  ["HIGH", "LOW"],
  ["UPPER", "LOWER"],
  ["IN", "OUT"],
  ["INPUT", "OUTPUT"],
  ["READ", "WRITE"],
  ["GET", "SET"],
  ["ENABLE", "DISABLE"],
  ["ENABLED", "DISABLED"],
  ["TRUE", "FALSE"],
  ["PREV", "NEXT"],
  ["OLD", "NEW"],
  ["SRC", "DST"],
  ["ALLOW", "DENY"],
];

export function isConstantName(name: string): boolean {
  return name.length >= 2 && CONSTANT_NAME.test(name);
}

// ============================================================================
// Extraction
// ============================================================================

/**
 * Index of the name token of a declaration starting at `i`, if any.
 */
function declarationName(tokens: Token[], i: number, language: SupportedLanguage): number | undefined {
  const token = tokens[i];
  switch (language) {
    case "python": {
      const previous = tokens[i - 1];
      const startsLine = previous === undefined || previous.endLine < token.startLine;
      return token.kind === "identifier" && token.startColumn === 1 && startsLine ? i : undefined;
    }
    case "typescript":
    case "javascript": {
      const next = tokens[i + 1];
      return token.kind === "keyword" && token.text === "const" && next?.kind === "identifier" ? i + 1 : undefined;
    }
    default:
      return undefined;
  }
}

function readDefinition(tokens: Token[], nameIndex: number, lines: string[], file: string): ConstantDefinition | undefined {
  const name = tokens[nameIndex];
  if (!isConstantName(name.text)) {
    return undefined;
  }
  const line = name.startLine;

  // Skip a type annotation up to "="
  let eq = nameIndex + 1;
  if (tokens[eq]?.text === ":") {
    while (eq < tokens.length && tokens[eq].startLine === line && tokens[eq].text !== "=") {
      eq++;
    }
  }
  if (tokens[eq]?.text !== "=" || tokens[eq].kind !== "symbol" || tokens[eq].startLine !== line) {
    return undefined;
  }

  let last = eq;
  while (last + 1 < tokens.length && tokens[last + 1].startLine === line && tokens[last + 1].text !== ";") {
    last++;
  }
  if (last === eq) {
    return undefined;
  }

  const text = lines[line - 1] ?? "";
  const first = tokens[eq + 1];
  const end = tokens[last].endLine === line ? tokens[last].endColumn - 1 : text.length;
  return {
    name: name.text,
    value: text.slice(first.startColumn - 1, end).trim(),
    file,
    line,
    tokenCount: last - nameIndex + 1,
  };
}

/**
 * Module-level constant definitions in one file. Languages without an
 * extractor yield nothing.
 */
export function extractConstants(file: ConstantSource): ConstantDefinition[] {
  const { tokens } = file;
  const lines = file.source.split(/\r?\n/);
  const found: ConstantDefinition[] = [];
  let depth = 0;

  for (let i = 0; i < tokens.length; i++) {
    const token = tokens[i];
    if (depth === 0) {
      const nameIndex = declarationName(tokens, i, file.language);
      const definition = nameIndex === undefined ? undefined : readDefinition(tokens, nameIndex, lines, file.path);
      if (definition) {
        found.push(definition);
      }
    }
    if (token.kind === "symbol") {
      if (OPENERS.has(token.text)) depth++;
      else if (CLOSERS.has(token.text)) depth = Math.max(0, depth - 1);
    }
  }

  return found;
}

// ============================================================================
// Matching
// ============================================================================

function words(name: string): string[] {
  return name.split("_").filter((word) => word !== "");
}

export function editDistance(a: string, b: string): number {
  let previous = Array.from({ length: b.length + 1 }, (_, j) => j);
  for (let i = 1; i <= a.length; i++) {
    const current = [i];
    for (let j = 1; j <= b.length; j++) {
      const substitution = previous[j - 1] + (a[i - 1] === b[j - 1] ? 0 : 1);
      current.push(Math.min(previous[j] + 1, current[j - 1] + 1, substitution));
    }
    previous = current;
  }
  return previous[b.length];
}

function areAntonyms(a: string, b: string): boolean {
  return ANTONYMS.some(([x, y]) => (a === x && b === y) || (a === y && b === x));
}

/**
 * Exact match, or for names of two or more words: the same words in another
 * order, or a spelling difference of at most two edits. Names that differ by
 * an antonym (MAX/MIN) or only in digits never match fuzzily.
 */
export function namesMatch(a: string, b: string): boolean {
  if (a === b) {
    return true;
  }
  const left = words(a);
  const right = words(b);
  if (left.length < 2 || right.length < 2) {
    return false;
  }
  if (a.replace(/[0-9]/g, "") === b.replace(/[0-9]/g, "")) {
    return false;
  }

  const onlyLeft = left.filter((word) => !right.includes(word));
  const onlyRight = right.filter((word) => !left.includes(word));
  if (onlyLeft.some((x) => onlyRight.some((y) => areAntonyms(x, y)))) {
    return false;
  }
  if (onlyLeft.length === 0 && onlyRight.length === 0) {
    return true;
  }
  return editDistance(a, b) <= MAX_EDIT_DISTANCE;
}

/**
 * Connected groups of definitions whose names match, in first-seen order.
 */
export function findConstantGroups(definitions: ConstantDefinition[]): ConstantDefinition[][] {
  const names = [...new Set(definitions.map((d) => d.name))];
  const parent = names.map((_, i) => i);
  const root = (i: number): number => {
    while (parent[i] !== i) {
      parent[i] = parent[parent[i]];
      i = parent[i];
    }
    return i;
  };

  for (let i = 0; i < names.length; i++) {
    for (let j = i + 1; j < names.length; j++) {
      if (namesMatch(names[i], names[j])) {
        parent[root(j)] = root(i);
      }
    }
  }

  const indexOf = new Map(names.map((name, i) => [name, i]));
  const groups = new Map<number, ConstantDefinition[]>();
  for (const definition of definitions) {
    const key = root(indexOf.get(definition.name) ?? 0);
    const group = groups.get(key);
    if (group) {
      group.push(definition);
    } else {
      groups.set(key, [definition]);
    }
  }
  return [...groups.values()];
}

// ============================================================================
// Reporting
// ============================================================================

function toLocation(definition: ConstantDefinition): Location {
  return { file: definition.file, startLine: definition.line, endLine: definition.line };
}

export function buildConstantViolation(group: ConstantDefinition[], rule: RequiredRuleConfig): Violation {
  const ordered = [...group].sort((a, b) => compareOccurrences(toLocation(a), toLocation(b)));
  const [primary, ...others] = ordered.map(toLocation);
  const names = [...new Set(ordered.map((d) => d.name))];
  const values = [...new Set(ordered.map((d) => d.value))];
  const fileCount = new Set(ordered.map((d) => d.file)).size;

  const subject = names.length === 1 ? `Duplicate constant ${names[0]}` : `Similar constants ${names.join(", ")}`;
  const also = others.map((o) => `${o.file}:${o.startLine}`).join(", ");

  return {
    ruleId: "DUPLICATE_CODE",
    location: primary,
    relatedLocations: others,
    lineCount: 1,
    tokenCount: Math.min(...ordered.map((d) => d.tokenCount)),
    occurrenceCount: ordered.length,
    message: `${subject} defined in ${fileCount} files (values: ${values.join(", ")}). Also found in: ${also}`,
    severity: "medium",
    level: rule.level,
  };
}

/**
 * Report constants defined in at least `minOccurrences` files. Files are
 * matched within their own language; suppressed definitions take no part.
 */
export function reportDuplicateConstants(files: ConstantSource[], options: ConstantReportOptions): Violation[] {
  const byLanguage = new Map<SupportedLanguage, ConstantDefinition[]>();
  for (const file of files) {
    const ranges = options.suppressed.get(file.path) ?? [];
    const definitions = extractConstants(file).filter((d) => !isSpanSuppressed(toLocation(d), ranges));
    const list = byLanguage.get(file.language);
    if (list) {
      list.push(...definitions);
    } else {
      byLanguage.set(file.language, definitions);
    }
  }

  const violations: Violation[] = [];
  for (const definitions of byLanguage.values()) {
    for (const group of findConstantGroups(definitions)) {
      const fileCount = new Set(group.map((d) => d.file)).size;
      if (fileCount >= Math.max(2, options.minOccurrences)) {
        violations.push(buildConstantViolation(group, options.rule));
      }
    }
  }
  return violations;
}
