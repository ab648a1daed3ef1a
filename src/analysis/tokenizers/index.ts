/**
 * Tokenizer registry.
 *
 * Selects the tokenizer for a language and turns source text into the
 * significant-token stream consumed by fingerprinting. Parsers are created
 * on first use so a scan that only touches Go never loads ts-morph's
 * compiler host.
 */

import { TokenizeError, UnsupportedLanguageError } from "../errors";
import { SupportedLanguage, TokenStream } from "../types";
import { GoTokenizer } from "./go";
import { PythonTokenizer } from "./python";
import { RubyTokenizer } from "./ruby";
import { LanguageTokenizer, detectLanguage } from "./types";
import { TypeScriptTokenizer } from "./typescript";

export { detectLanguage };
export type { LanguageTokenizer };
export { NORMALIZED_IDENTIFIER, NORMALIZED_NUMBER, NORMALIZED_STRING } from "./types";

const factories: Record<SupportedLanguage, () => LanguageTokenizer> = {
  typescript: () => new TypeScriptTokenizer("typescript"),
  javascript: () => new TypeScriptTokenizer("javascript"),
  python: () => new PythonTokenizer(),
  go: () => new GoTokenizer(),
  ruby: () => new RubyTokenizer(),
};

const tokenizers = new Map<SupportedLanguage, LanguageTokenizer>();

export const SUPPORTED_LANGUAGES: readonly SupportedLanguage[] = ["typescript", "javascript", "python", "go", "ruby"];

export function isLanguageSupported(language: string): language is SupportedLanguage {
  return SUPPORTED_LANGUAGES.some((supported) => supported === language);
}

/**
 * Get the (cached) tokenizer for a language.
 *
 * @throws UnsupportedLanguageError
 */
export function getTokenizer(language: string): LanguageTokenizer {
  if (!isLanguageSupported(language)) {
    throw new UnsupportedLanguageError(language);
  }

  let tokenizer = tokenizers.get(language);
  if (!tokenizer) {
    tokenizer = factories[language]();
    tokenizers.set(language, tokenizer);
  }
  return tokenizer;
}

/**
 * Tokenize source text.
 *
 * Comments and whitespace never appear in the result. Each token keeps its
 * original text and its normalized form; which one is compared is decided
 * downstream.
 *
 * @param content - Decoded file content
 * @param language - Language tag (see SUPPORTED_LANGUAGES)
 * @param filePath - Optional path, used to pick dialects such as TSX
 * @throws UnsupportedLanguageError for unknown language tags
 * @throws TokenizeError for binary content or unparseable source
 */
export function tokenize(content: string, language: string, filePath?: string): TokenStream {
  const tokenizer = getTokenizer(language);

  if (content.includes("\u0000")) {
    throw new TokenizeError("Binary content cannot be tokenized");
  }

  return tokenizer.tokenize(content, filePath);
}

/**
 * Dialect the tokenizer for `language` would parse `filePath` as.
 *
 * @throws UnsupportedLanguageError for unknown language tags
 */
export function tokenizerDialect(language: string, filePath?: string): string {
  return getTokenizer(language).dialect(filePath);
}
