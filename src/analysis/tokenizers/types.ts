/**
 * Shared types for the language tokenizers.
 *
 * TypeScript/JavaScript go through ts-morph; Python, Go and Ruby through
 * tree-sitter. Every tokenizer yields the same Token shape.
 */

import { SupportedLanguage, Token, TokenKind, TokenStream } from "../types";

/**
 * Placeholders used for normalized matching.
 */
export const NORMALIZED_IDENTIFIER = "$id";
export const NORMALIZED_STRING = "$str";
export const NORMALIZED_NUMBER = "$num";

/**
 * Interface that all language-specific tokenizers must implement.
 */
export interface LanguageTokenizer {
  /** The language this tokenizer handles */
  language: SupportedLanguage;

  /**
   * Turn source text into significant tokens.
   *
   * @param content - The full source code content
   * @param filePath - Used for dialect selection (e.g. .tsx) only
   * @throws TokenizeError when the source cannot be parsed
   */
  tokenize(content: string, filePath?: string): TokenStream;

  /**
   * Name of the grammar variant `tokenize` would use for this path. The same
   * bytes under two dialects can yield different tokens.
   */
  dialect(filePath?: string): string;
}

/**
 * Detect the language from a file path. Returns "unknown" for unregistered extensions.
 */
export function detectLanguage(filePath: string): SupportedLanguage | "unknown" {
  const ext = fileExtension(filePath);

  switch (ext) {
    case "ts":
    case "tsx":
    case "mts":
    case "cts":
      return "typescript";
    case "js":
    case "jsx":
    case "mjs":
    case "cjs":
      return "javascript";
    case "py":
    case "pyw":
      return "python";
    case "go":
      return "go";
    case "rb":
    case "rake":
    case "ru":
      return "ruby";
    default:
      return "unknown";
  }
}

export function fileExtension(filePath: string): string {
  const base = filePath.split(/[\\/]/).pop() ?? "";
  const dot = base.lastIndexOf(".");
  return dot <= 0 ? "" : base.slice(dot + 1).toLowerCase();
}

export function normalizedText(kind: TokenKind, text: string, literal?: "string" | "number"): string {
  if (kind === "identifier") return NORMALIZED_IDENTIFIER;
  if (kind === "literal") return literal === "number" ? NORMALIZED_NUMBER : NORMALIZED_STRING;
  return text;
}

/**
 * Build a token from 0-based positions (the convention of both parsers).
 */
export function makeToken(
  text: string,
  kind: TokenKind,
  start: { line: number; column: number },
  end: { line: number; column: number },
  literal?: "string" | "number"
): Token {
  return {
    text,
    normalized: normalizedText(kind, text, literal),
    kind,
    startLine: start.line + 1,
    startColumn: start.column + 1,
    endLine: end.line + 1,
    endColumn: end.column + 1,
  };
}
