/**
 * Block filters: duplicated blocks that are not worth reporting.
 *
 * Filters run after thresholds and see the surviving cluster plus the source
 * and tokens of the files it touches. Each filter has a name under which
 * `duplicates.filters` turns it off.
 */

import { BLOCK_FILTER_NAMES, BlockFilterName } from "../../config/schema";
import { DuplicateCluster, SupportedLanguage, Token } from "../types";

export interface BlockFilterContext {
  /** Source text of a scanned file, if still available */
  getSource(file: string): string | undefined;
  /** Token stream of a scanned file, if still available */
  getTokens(file: string): Token[] | undefined;
  language: SupportedLanguage;
}

export interface BlockFilter {
  name: BlockFilterName;
  /** True when the cluster should not be reported */
  shouldFilter(cluster: DuplicateCluster, context: BlockFilterContext): boolean;
}

// ============================================================================
// Import groups
// ============================================================================

/**
 * Line-based import classifier for one language. Stateful so multi-line
 * imports (`import {` ... `} from "x"`, Go `import (` groups) are followed.
 */
function importLines(source: string, language: SupportedLanguage): Set<number> {
  const lines = source.split(/\r?\n/);
  const result = new Set<number>();
  let open = false;

  lines.forEach((raw, i) => {
    const line = raw.trim();
    const lineNumber = i + 1;

    if (open) {
      result.add(lineNumber);
      open = !closesImport(line, language);
      return;
    }

    switch (language) {
      case "python":
        if (/^(import|from)\s/.test(line)) {
          result.add(lineNumber);
          open = line.endsWith("(") || (line.includes("(") && !line.includes(")"));
        }
        break;

      case "typescript":
      case "javascript":
        if (/^import\b/.test(line) || /^export\s+(\*|\{)[^;]*\bfrom\s/.test(line)) {
          result.add(lineNumber);
          open = line.includes("{") && !/\bfrom\s/.test(line) && !line.includes("}");
        }
        break;

      case "go":
        if (/^import\b/.test(line)) {
          result.add(lineNumber);
          open = /^import\s*\($/.test(line);
        }
        break;

      case "ruby":
        if (/^(require|require_relative|load)\b/.test(line)) {
          result.add(lineNumber);
        }
        break;
    }
  });

  return result;
}

function closesImport(line: string, language: SupportedLanguage): boolean {
  switch (language) {
    case "python":
    case "go":
      return line.includes(")");
    case "typescript":
    case "javascript":
      return /\bfrom\s/.test(line) || line.includes("}");
    default:
      return true;
  }
}

/**
 * Drops blocks made only of import statements. Import lists repeat across
 * files without being meaningful duplication.
 */
export class ImportGroupFilter implements BlockFilter {
  name: BlockFilterName = "import_group_filter";
  private cache = new Map<string, Set<number>>();

  shouldFilter(cluster: DuplicateCluster, context: BlockFilterContext): boolean {
    const primary = cluster.occurrences[0];
    const source = context.getSource(primary.file);
    if (source === undefined) {
      return false;
    }

    let imports = this.cache.get(primary.file);
    if (!imports) {
      imports = importLines(source, context.language);
      this.cache.set(primary.file, imports);
    }

    const lines = source.split(/\r?\n/);
    for (let line = primary.startLine; line <= primary.endLine; line++) {
      const text = lines[line - 1] ?? "";
      if (text.trim() === "") {
        continue;
      }
      if (!imports.has(line)) {
        return false;
      }
    }
    return true;
  }
}

// ============================================================================
// Keyword arguments
// ============================================================================

const KEYWORD_ARGUMENT_LINE = /^\s*\w+\s*=(?!=)\s*.+,?\s*$/;

interface LineSpan {
  startLine: number;
  endLine: number;
}

/**
 * Line spans of the multi-line calls in a token stream. A "(" opens a call
 * when it follows an identifier or the end of another expression.
 */
function multiLineCalls(tokens: Token[]): LineSpan[] {
  const calls: LineSpan[] = [];
  const open: Array<{ line: number; call: boolean }> = [];

  tokens.forEach((token, i) => {
    if (token.kind !== "symbol") {
      return;
    }
    if (token.text === "(") {
      const previous = tokens[i - 1];
      const call =
        previous !== undefined &&
        (previous.kind === "identifier" || previous.text === ")" || previous.text === "]");
      open.push({ line: token.startLine, call });
    } else if (token.text === ")") {
      const opener = open.pop();
      if (opener?.call && opener.line < token.endLine) {
        calls.push({ startLine: opener.line, endLine: token.endLine });
      }
    }
  });

  return calls;
}

/**
 * Drops blocks made mostly of `name=value` lines inside one multi-line call,
 * the shape of keyword arguments repeated across builder and constructor calls.
 */
export class KeywordArgumentFilter implements BlockFilter {
  name: BlockFilterName = "keyword_argument_filter";
  private calls = new Map<string, LineSpan[]>();

  /**
   * @param threshold - Share of block lines (0..1) that must look like keyword arguments
   */
  constructor(private threshold = 0.8) {}

  shouldFilter(cluster: DuplicateCluster, context: BlockFilterContext): boolean {
    const primary = cluster.occurrences[0];
    const source = context.getSource(primary.file);
    if (source === undefined) {
      return false;
    }

    const lines = source.split(/\r?\n/).slice(primary.startLine - 1, primary.endLine);
    if (lines.length === 0) {
      return false;
    }
    const keywordLines = lines.filter((line) => KEYWORD_ARGUMENT_LINE.test(line)).length;
    if (keywordLines / lines.length < this.threshold) {
      return false;
    }

    return this.callsIn(primary.file, context).some(
      (call) => call.startLine <= primary.startLine && call.endLine >= primary.endLine
    );
  }

  private callsIn(file: string, context: BlockFilterContext): LineSpan[] {
    let calls = this.calls.get(file);
    if (!calls) {
      calls = multiLineCalls(context.getTokens(file) ?? []);
      this.calls.set(file, calls);
    }
    return calls;
  }
}

// ============================================================================
// Registry
// ============================================================================

/**
 * Named block filters that can be switched on and off. A filter is enabled
 * when it is registered.
 */
export class BlockFilterRegistry {
  private filters: BlockFilter[] = [];
  private enabled = new Set<BlockFilterName>();

  register(filter: BlockFilter): void {
    this.filters.push(filter);
    this.enabled.add(filter.name);
  }

  enableFilter(name: BlockFilterName): void {
    this.enabled.add(name);
  }

  disableFilter(name: BlockFilterName): void {
    this.enabled.delete(name);
  }

  /**
   * Names of the enabled filters, sorted.
   */
  getEnabledFilters(): BlockFilterName[] {
    return [...this.enabled].sort();
  }

  shouldFilterBlock(cluster: DuplicateCluster, context: BlockFilterContext): boolean {
    return this.filters.some(
      (filter) => this.enabled.has(filter.name) && filter.shouldFilter(cluster, context)
    );
  }
}

/**
 * Registry with the built-in filters, switched per `duplicates.filters`.
 */
export function createDefaultRegistry(toggles?: Partial<Record<BlockFilterName, boolean>>): BlockFilterRegistry {
  const registry = new BlockFilterRegistry();
  registry.register(new KeywordArgumentFilter(0.8));
  registry.register(new ImportGroupFilter());

  for (const name of BLOCK_FILTER_NAMES) {
    if (toggles?.[name] === false) {
      registry.disableFilter(name);
    }
  }
  return registry;
}
