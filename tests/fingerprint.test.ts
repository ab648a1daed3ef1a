/**
 * Unit tests for rolling-hash fingerprints.
 */

import { fnv1a, rollingHashes, generateFingerprints, tokenKeys, windowHashes } from "../src/analysis/fingerprint";
import { Token } from "../src/analysis/types";

/** Direct (non-rolling) window hash for comparison */
function directHash(values: number[]): number {
  let hash = 0n;
  for (const value of values) {
    hash = (hash * 31n + BigInt(value)) % 2n ** 32n;
  }
  return Number(hash);
}

function token(text: string, normalized: string): Token {
  return { text, normalized, kind: "identifier", startLine: 1, startColumn: 1, endLine: 1, endColumn: 2 };
}

describe("fnv1a", () => {
  it("should return the offset basis for empty input", () => {
    expect(fnv1a("")).toBe(0x811c9dc5);
  });

  it("should match the reference value for a single character", () => {
    expect(fnv1a("a")).toBe(0xe40c292c);
  });

  it("should always be an unsigned 32-bit integer", () => {
    for (const text of ["return", "const", "$id", "}", "a much longer token text"]) {
      const hash = fnv1a(text);
      expect(Number.isInteger(hash)).toBe(true);
      expect(hash).toBeGreaterThanOrEqual(0);
      expect(hash).toBeLessThanOrEqual(0xffffffff);
    }
  });
});

describe("rollingHashes", () => {
  it("should compute base-31 window hashes", () => {
    expect(rollingHashes([1, 2, 3, 4], 2)).toEqual([33, 65, 97]);
    expect(rollingHashes([1, 2, 3, 4], 3)).toEqual([1026, 2019]);
  });

  it("should agree with direct computation when values wrap around 2^32", () => {
    const values = [0xffffffff, 0x811c9dc5, 7, 0xdeadbeef, 123456789, 0x80000000, 42, 0xfffffffe];
    const windowSize = 5;

    const rolling = rollingHashes(values, windowSize);

    expect(rolling).toHaveLength(values.length - windowSize + 1);
    rolling.forEach((hash, start) => {
      expect(hash).toBe(directHash(values.slice(start, start + windowSize)));
    });
  });

  it("should yield nothing for streams shorter than the window", () => {
    expect(rollingHashes([1, 2], 3)).toEqual([]);
    expect(rollingHashes([], 1)).toEqual([]);
  });

  it("should yield one hash when the stream equals the window", () => {
    expect(rollingHashes([5, 6, 7], 3)).toHaveLength(1);
  });
});

describe("generateFingerprints", () => {
  it("should emit one fingerprint per window start", () => {
    const fingerprints = generateFingerprints(["a", "b", "c", "d"], 2, "src/a.ts");

    expect(fingerprints.map((f) => [f.start, f.length, f.file])).toEqual([
      [0, 2, "src/a.ts"],
      [1, 2, "src/a.ts"],
      [2, 2, "src/a.ts"],
    ]);
  });

  it("should give equal windows equal hashes", () => {
    const fingerprints = generateFingerprints(["x", "y", "z", "x", "y"], 2, "f.py");

    expect(fingerprints[0].hash).toBe(fingerprints[3].hash);
    expect(fingerprints[0].hash).not.toBe(fingerprints[1].hash);
  });

  it("should hash each key with FNV-1a before rolling", () => {
    expect(windowHashes(["a"], 1)).toEqual([fnv1a("a")]);
  });
});

describe("tokenKeys", () => {
  const tokens = [token("total", "$id"), token("=", "="), token("42", "$num")];

  it("should use exact text by default", () => {
    expect(tokenKeys(tokens, false)).toEqual(["total", "=", "42"]);
  });

  it("should use normalized forms when asked", () => {
    expect(tokenKeys(tokens, true)).toEqual(["$id", "=", "$num"]);
  });
});
