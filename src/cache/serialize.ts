/**
 * Conversion between in-memory tokens and cache records, plus validation of
 * records read back from storage.
 */

import { createHash } from "crypto";

import { SupportedLanguage, Token, TokenKind } from "../analysis/types";
import { CACHE_SCHEMA_VERSION, CacheEntry, CacheParams, SerializedToken } from "./types";

const TOKEN_KINDS: readonly TokenKind[] = ["identifier", "literal", "keyword", "symbol"];
const LANGUAGES: readonly SupportedLanguage[] = ["typescript", "javascript", "python", "go", "ruby"];
const DIALECT_PATTERN = /^[a-z]+$/;

/**
 * SHA-256 of the raw file bytes, hex encoded.
 */
export function contentHash(content: Buffer | string): string {
  return createHash("sha256").update(content).digest("hex");
}

/**
 * Store key for a file's record: its content hash plus the tokenizer dialect.
 */
export function cacheKey(hash: string, dialect: string): string {
  return `${hash}-${dialect}`;
}

export function serializeTokens(tokens: Token[]): SerializedToken[] {
  return tokens.map((t) => [t.text, t.normalized, t.kind, t.startLine, t.startColumn, t.endLine, t.endColumn]);
}

export function deserializeTokens(tokens: SerializedToken[]): Token[] {
  return tokens.map(([text, normalized, kind, startLine, startColumn, endLine, endColumn]) => ({
    text,
    normalized,
    kind,
    startLine,
    startColumn,
    endLine,
    endColumn,
  }));
}

export function createCacheEntry(tokens: Token[], hashes: number[], params: CacheParams, now: number): CacheEntry {
  return {
    schemaVersion: CACHE_SCHEMA_VERSION,
    params: { ...params },
    tokens: serializeTokens(tokens),
    hashes,
    createdAt: now,
  };
}

/**
 * True when a record's tokens were produced by the same grammar.
 */
export function sameDialect(a: CacheParams, b: CacheParams): boolean {
  return a.language === b.language && a.dialect === b.dialect;
}

export function sameParams(a: CacheParams, b: CacheParams): boolean {
  return sameDialect(a, b) && a.windowSize === b.windowSize && a.normalize === b.normalize;
}

// ============================================================================
// Validation
// ============================================================================

export type ParsedEntry = { ok: true; entry: CacheEntry } | { ok: false; reason: string };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isTokenKind(value: unknown): value is TokenKind {
  return TOKEN_KINDS.some((kind) => kind === value);
}

function isLanguage(value: unknown): value is SupportedLanguage {
  return LANGUAGES.some((language) => language === value);
}

function isCount(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value) && value >= 0;
}

function parseToken(value: unknown): SerializedToken | null {
  if (!Array.isArray(value) || value.length !== 7) {
    return null;
  }
  const fields: unknown[] = value;
  const [text, normalized, kind, startLine, startColumn, endLine, endColumn] = fields;
  if (typeof text !== "string" || typeof normalized !== "string" || !isTokenKind(kind)) {
    return null;
  }
  if (!isCount(startLine) || !isCount(startColumn) || !isCount(endLine) || !isCount(endColumn)) {
    return null;
  }
  return [text, normalized, kind, startLine, startColumn, endLine, endColumn];
}

/**
 * Validate a decoded record.
 */
export function parseCacheEntry(value: unknown): ParsedEntry {
  if (!isRecord(value)) {
    return { ok: false, reason: "record is not an object" };
  }
  if (value.schemaVersion !== CACHE_SCHEMA_VERSION) {
    return { ok: false, reason: `schema version ${String(value.schemaVersion)} != ${CACHE_SCHEMA_VERSION}` };
  }

  const params = value.params;
  if (!isRecord(params) || !isCount(params.windowSize) || typeof params.normalize !== "boolean") {
    return { ok: false, reason: "invalid params" };
  }
  const { language, dialect } = params;
  if (!isLanguage(language) || typeof dialect !== "string" || !DIALECT_PATTERN.test(dialect)) {
    return { ok: false, reason: "invalid language or dialect" };
  }
  if (!isCount(value.createdAt)) {
    return { ok: false, reason: "invalid createdAt" };
  }
  if (!Array.isArray(value.tokens) || !Array.isArray(value.hashes)) {
    return { ok: false, reason: "missing tokens or hashes" };
  }

  const rawTokens: unknown[] = value.tokens;
  const rawHashes: unknown[] = value.hashes;

  const tokens: SerializedToken[] = [];
  for (const raw of rawTokens) {
    const token = parseToken(raw);
    if (!token) {
      return { ok: false, reason: `invalid token at index ${tokens.length}` };
    }
    tokens.push(token);
  }

  const hashes: number[] = [];
  for (const raw of rawHashes) {
    if (!isCount(raw) || raw > 0xffffffff) {
      return { ok: false, reason: `invalid hash at index ${hashes.length}` };
    }
    hashes.push(raw);
  }

  const expected = Math.max(0, tokens.length - params.windowSize + 1);
  if (params.windowSize > 0 && hashes.length !== expected) {
    return { ok: false, reason: `expected ${expected} hashes, found ${hashes.length}` };
  }

  return {
    ok: true,
    entry: {
      schemaVersion: CACHE_SCHEMA_VERSION,
      params: { language, dialect, windowSize: params.windowSize, normalize: params.normalize },
      tokens,
      hashes,
      createdAt: value.createdAt,
    },
  };
}

/**
 * Decode and validate a JSON record.
 */
export function decodeCacheEntry(json: string): ParsedEntry {
  let value: unknown;
  try {
    value = JSON.parse(json);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return { ok: false, reason: `invalid JSON: ${message}` };
  }
  return parseCacheEntry(value);
}

export function encodeCacheEntry(entry: CacheEntry): string {
  return JSON.stringify(entry);
}
