/**
 * Sliding-window fingerprints over a token stream.
 *
 * Every window of `windowSize` consecutive tokens gets a polynomial rolling
 * hash (base 31, mod 2^32). Each token contributes the FNV-1a hash of its
 * compare key. Windows are updated in O(1), so a stream of n tokens costs O(n).
 */

import { Fingerprint, TokenStream } from "./types";

const FNV_OFFSET_BASIS = 0x811c9dc5;
const FNV_PRIME = 0x01000193;
const ROLLING_BASE = 31;

/**
 * 32-bit FNV-1a over the UTF-16 code units of `text`.
 */
export function fnv1a(text: string): number {
  let hash = FNV_OFFSET_BASIS;
  for (let i = 0; i < text.length; i++) {
    hash ^= text.charCodeAt(i);
    hash = Math.imul(hash, FNV_PRIME);
  }
  return hash >>> 0;
}

/**
 * The strings compared when matching: exact text, or the normalized form.
 */
export function tokenKeys(tokens: TokenStream, normalize: boolean): string[] {
  return tokens.map((token) => (normalize ? token.normalized : token.text));
}

/**
 * Rolling hash of every window over per-token hashes.
 * Returns `values.length - windowSize + 1` hashes, or none for short input.
 */
export function rollingHashes(values: number[], windowSize: number): number[] {
  if (windowSize <= 0 || values.length < windowSize) {
    return [];
  }

  // B^(W-1), the weight of the token leaving the window
  let outWeight = 1;
  for (let i = 1; i < windowSize; i++) {
    outWeight = Math.imul(outWeight, ROLLING_BASE);
  }

  let hash = 0;
  for (let i = 0; i < windowSize; i++) {
    hash = (Math.imul(hash, ROLLING_BASE) + values[i]) >>> 0;
  }

  const hashes = [hash];
  for (let i = windowSize; i < values.length; i++) {
    const withoutOldest = (hash - Math.imul(values[i - windowSize], outWeight)) | 0;
    hash = (Math.imul(withoutOldest, ROLLING_BASE) + values[i]) >>> 0;
    hashes.push(hash);
  }
  return hashes;
}

/**
 * Window hashes for a file's compare keys (see tokenKeys).
 */
export function windowHashes(keys: string[], windowSize: number): number[] {
  return rollingHashes(keys.map(fnv1a), windowSize);
}

/**
 * Attach positions to a list of window hashes (as stored in the cache).
 */
export function toFingerprints(hashes: number[], windowSize: number, file: string): Fingerprint[] {
  return hashes.map((hash, start) => ({ start, length: windowSize, hash, file }));
}

/**
 * One fingerprint per window start; streams shorter than the window yield none.
 *
 * Equal hashes only nominate candidates. Callers compare the token slices.
 */
export function generateFingerprints(keys: string[], windowSize: number, file: string): Fingerprint[] {
  return toFingerprints(windowHashes(keys, windowSize), windowSize, file);
}
