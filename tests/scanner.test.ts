/**
 * End-to-end tests for the scanner: real files in a temp directory, an
 * in-memory cache store and small thresholds.
 */

import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { clearCache, resolveWorkerCount, scan } from "../src/analysis/scanner";
import { ScanAbortedError } from "../src/analysis/errors";
import { DiskCacheStore } from "../src/cache/disk";
import { MemoryCacheStore } from "../src/cache/memory";
import { PruneOptions } from "../src/cache/types";
import { LoadedConfig, loadConfigFromString } from "../src/config/loader";
import { ScanInput } from "../src/analysis/types";

const CONFIG_YAML = `
duplicates:
  min_duplicate_lines: 5
  min_duplicate_tokens: 20
cache:
  backend: memory
scan:
  workers: 2
`;

/** 32 tokens from "(" to the closing brace, spanning lines 1-7 */
function doubler(name: string, factor = 2): string {
  return [
    `export function ${name}(items: number[]) {`,
    "  let total = 0;",
    "  for (const item of items) {",
    `    total += item * ${factor};`,
    "  }",
    "  return total;",
    "}",
    "",
  ].join("\n");
}

function ts(...paths: string[]): ScanInput[] {
  return paths.map((p) => ({ path: p, language: "typescript" }));
}

/** A Python module longer than tree-sitter's default 32 KiB input buffer */
function largePythonModule(): string {
  let source = "";
  for (let i = 0; source.length < 40000; i++) {
    source += `def handler_${i}(value):\n    return value + ${i}\n\n`;
  }
  return source;
}

/**
 * Memory store whose maintenance calls fail, like a cache on a full or
 * read-only disk.
 */
class FailingMaintenanceStore extends MemoryCacheStore {
  async prune(_options: PruneOptions): Promise<number> {
    throw new Error("prune failed");
  }

  async flush(): Promise<void> {
    throw new Error("flush failed");
  }
}

describe("scan", () => {
  let root: string;
  let config: LoadedConfig;
  let cache: MemoryCacheStore;

  const write = (relative: string, content: string) => {
    const file = path.join(root, relative);
    fs.mkdirSync(path.dirname(file), { recursive: true });
    fs.writeFileSync(file, content);
  };

  beforeEach(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), "twinscan-scan-"));
    config = loadConfigFromString(CONFIG_YAML, root);
    cache = new MemoryCacheStore();
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  it("should report a body shared by two files", async () => {
    write("a.ts", doubler("alpha"));
    write("b.ts", doubler("beta"));

    const result = await scan(ts("a.ts", "b.ts"), config, { cache });

    expect(result.violations).toEqual([
      {
        ruleId: "DUPLICATE_CODE",
        location: { file: "a.ts", startLine: 1, endLine: 7 },
        relatedLocations: [{ file: "b.ts", startLine: 1, endLine: 7 }],
        lineCount: 7,
        tokenCount: 32,
        occurrenceCount: 2,
        message: "Duplicate code (7 lines, 2 occurrences). Also found in: b.ts:1-7",
        severity: "medium",
        level: "warning",
      },
    ]);
    expect(result.warnings).toEqual([]);
    expect(result.status).toBe("fail");
    expect(result.stats.filesScanned).toBe(2);
  });

  it("should report one violation for a block in four files", async () => {
    write("a.ts", doubler("alpha"));
    write("b.ts", doubler("beta"));
    write("c.ts", doubler("gamma"));
    write("d.ts", doubler("delta"));

    const result = await scan(ts("d.ts", "c.ts", "b.ts", "a.ts"), config, { cache });

    expect(result.violations).toHaveLength(1);
    expect(result.violations[0].occurrenceCount).toBe(4);
    expect(result.violations[0].location).toEqual({ file: "a.ts", startLine: 1, endLine: 7 });
    expect(result.violations[0].message).toBe(
      "Duplicate code (7 lines, 4 occurrences). Also found in: b.ts:1-7, c.ts:1-7, d.ts:1-7"
    );
  });

  it("should reuse cached fingerprints for unchanged files", async () => {
    write("a.ts", doubler("alpha"));
    write("b.ts", doubler("beta"));

    const first = await scan(ts("a.ts", "b.ts"), config, { cache });
    expect(first.stats.cacheMisses).toBe(2);
    expect(first.stats.cacheHits).toBe(0);

    // Break the shared block in the middle: neither half is long enough
    write("b.ts", doubler("beta", 3));
    const second = await scan(ts("a.ts", "b.ts"), config, { cache });

    expect(second.stats.cacheHits).toBe(1);
    expect(second.stats.cacheMisses).toBe(1);
    expect(second.violations).toEqual([]);
    expect(second.status).toBe("pass");

    write("b.ts", doubler("beta"));
    const third = await scan(ts("a.ts", "b.ts"), config, { cache });

    expect(third.stats.cacheHits).toBe(2);
    expect(third.violations).toEqual(first.violations);
  });

  it("should leave ignored files out of matching", async () => {
    const ignoring = loadConfigFromString(`${CONFIG_YAML}files:\n  ignore:\n    - "generated/**"\n`, root);
    write("a.ts", doubler("alpha"));
    write("b.ts", doubler("beta"));
    write("generated/c.ts", doubler("gamma"));

    const result = await scan(ts("a.ts", "b.ts", "generated/c.ts"), ignoring, { cache });

    expect(result.violations).toHaveLength(1);
    expect(result.violations[0].relatedLocations).toEqual([{ file: "b.ts", startLine: 1, endLine: 7 }]);
    expect(result.stats.filesTotal).toBe(3);
    expect(result.stats.filesIgnored).toBe(1);
    expect(result.stats.filesScanned).toBe(2);
  });

  it("should produce the same output on a repeated scan", async () => {
    write("a.ts", doubler("alpha"));
    write("b.ts", doubler("beta"));
    write("c.ts", doubler("gamma", 5));

    const first = await scan(ts("a.ts", "b.ts", "c.ts"), config, { cache });
    const second = await scan(ts("a.ts", "b.ts", "c.ts"), config, { cache });

    expect(second.violations).toEqual(first.violations);
    expect(second.warnings).toEqual(first.warnings);
  });

  it("should produce the same output after the cache is cleared", async () => {
    write("a.ts", doubler("alpha"));
    write("b.ts", doubler("beta"));

    const warm = await scan(ts("a.ts", "b.ts"), config, { cache });
    await clearCache(config, cache);
    const cold = await scan(ts("a.ts", "b.ts"), config, { cache });

    expect(cold.stats.cacheMisses).toBe(2);
    expect(cold.violations).toEqual(warm.violations);
  });

  it("should scan a path listed twice once", async () => {
    write("a.ts", doubler("alpha"));
    write("b.ts", doubler("beta"));

    const result = await scan(ts("a.ts", "a.ts", "b.ts"), config, { cache });

    expect(result.stats.filesTotal).toBe(2);
    expect(result.violations).toHaveLength(1);
    expect(result.violations[0].occurrenceCount).toBe(2);
  });

  it("should warn about files it cannot process and keep going", async () => {
    write("a.ts", doubler("alpha"));
    write("b.ts", doubler("beta"));
    write("broken.ts", "const x = (1 + ;\n");
    write("notes.txt", "plain text\n");

    const result = await scan(
      [...ts("a.ts", "b.ts", "broken.ts", "missing.ts"), { path: "notes.txt", language: "unknown" }],
      config,
      { cache }
    );

    expect(result.violations).toHaveLength(1);
    expect(result.warnings.map((w) => [w.file, w.code])).toEqual([
      ["broken.ts", "TOKENIZE_ERROR"],
      ["missing.ts", "IO_ERROR"],
      ["notes.txt", "UNSUPPORTED_LANGUAGE"],
    ]);
    expect(result.stats.filesSkipped).toBe(3);
    expect(result.stats.filesScanned).toBe(2);
  });

  it("should fail on warnings in strict mode only", async () => {
    write("a.ts", "export const a = 1;\n");
    const inputs: ScanInput[] = [...ts("a.ts"), { path: "notes.txt", language: "unknown" }];

    const lenient = await scan(inputs, config, { cache });
    const strict = await scan(inputs, loadConfigFromString(`${CONFIG_YAML}  strict: true\n`, root), { cache });

    expect(lenient.status).toBe("pass");
    expect(strict.status).toBe("fail");
    expect(strict.violations).toEqual([]);
  });

  it("should honor inline suppression comments", async () => {
    write("a.ts", doubler("alpha"));
    write("b.ts", `// twinscan-ignore-file DUPLICATE_CODE\n${doubler("beta")}`);
    write("c.ts", doubler("gamma"));

    const result = await scan(ts("a.ts", "b.ts", "c.ts"), config, { cache });

    expect(result.violations).toHaveLength(1);
    expect(result.violations[0].relatedLocations).toEqual([{ file: "c.ts", startLine: 1, endLine: 7 }]);
  });

  it("should honor suppressed ranges passed in by the caller", async () => {
    write("a.ts", doubler("alpha"));
    write("b.ts", doubler("beta"));

    const result = await scan(ts("a.ts", "b.ts"), config, {
      cache,
      suppressedRanges: [{ file: "a.ts", startLine: 1, endLine: 1 }],
    });

    expect(result.violations).toEqual([]);
  });

  it("should not report the tail of a shared block whose third copy is suppressed", async () => {
    const shared = `${doubler("alpha")}${doubler("omega", 3)}`;
    write("a.ts", shared);
    write("b.ts", shared);
    write("c.ts", `// twinscan-ignore-file ALL\n${doubler("omega", 3)}`);

    const result = await scan(ts("a.ts", "b.ts", "c.ts"), config, { cache });

    expect(result.violations.map((v) => v.message)).toEqual([
      "Duplicate code (14 lines, 2 occurrences). Also found in: b.ts:1-14",
    ]);
  });

  it("should tokenize python files larger than 32 KiB", async () => {
    const source = largePythonModule();
    expect(source.length).toBeGreaterThan(32 * 1024);
    write("a.py", source);
    write("b.py", source);

    const result = await scan(
      [
        { path: "a.py", language: "python" },
        { path: "b.py", language: "python" },
      ],
      config,
      { cache }
    );

    expect(result.warnings).toEqual([]);
    expect(result.violations).toHaveLength(1);
    expect(result.violations[0].location.startLine).toBe(1);
    expect(result.violations[0].relatedLocations.map((l) => l.file)).toEqual(["b.py"]);
  });

  it("should finish the scan when the cache directory cannot be created", async () => {
    write("a.ts", doubler("alpha"));
    write("b.ts", doubler("beta"));
    write("blocker", "a regular file where a directory is expected\n");
    const disk = new DiskCacheStore(path.join(root, "blocker", "cache"));

    const result = await scan(ts("a.ts", "b.ts"), config, { cache: disk });

    expect(result.violations.map((v) => v.message)).toEqual([
      "Duplicate code (7 lines, 2 occurrences). Also found in: b.ts:1-7",
    ]);
    expect(result.warnings).toEqual([]);
  });

  it("should finish the scan when cache prune and flush fail", async () => {
    write("a.ts", doubler("alpha"));
    write("b.ts", doubler("beta"));

    const result = await scan(ts("a.ts", "b.ts"), config, { cache: new FailingMaintenanceStore() });

    expect(result.violations).toHaveLength(1);
    expect(result.stats.cachePruned).toBe(0);
  });

  it("should reject with ScanAbortedError even when the final flush fails", async () => {
    write("a.ts", doubler("alpha"));
    const controller = new AbortController();
    controller.abort();

    const run = scan(ts("a.ts"), config, { cache: new FailingMaintenanceStore(), signal: controller.signal });

    await expect(run).rejects.toThrow(ScanAbortedError);
  });

  it("should not reuse tokens cached for the same bytes in another language", async () => {
    const bytes = "x = [i for i in y]\n";
    write("a.py", bytes);
    write("b.rb", bytes);
    const ruby: ScanInput[] = [{ path: "b.rb", language: "ruby" }];

    const cold = await scan(ruby, config, { cache });
    const python = await scan([{ path: "a.py", language: "python" }], config, { cache });
    const warm = await scan(ruby, config, { cache });

    expect(cold.warnings.map((w) => w.code)).toEqual(["TOKENIZE_ERROR"]);
    expect(python.warnings).toEqual([]);
    expect(warm.warnings.map((w) => w.code)).toEqual(["TOKENIZE_ERROR"]);
    expect(warm.stats.cacheHits).toBe(0);
  });

  it("should reject with ScanAbortedError when cancelled", async () => {
    write("a.ts", doubler("alpha"));
    write("b.ts", doubler("beta"));
    const controller = new AbortController();
    controller.abort();

    const run = scan(ts("a.ts", "b.ts"), config, { cache, signal: controller.signal });

    await expect(run).rejects.toThrow(ScanAbortedError);
    await expect(run).rejects.toThrow("Scan aborted after 0 of 2 files");
  });
});

describe("resolveWorkerCount", () => {
  it("should use the configured pool size", () => {
    expect(resolveWorkerCount(loadConfigFromString("scan:\n  workers: 3\n"))).toBe(3);
  });

  it("should size the pool from the machine when workers is 0", () => {
    expect(resolveWorkerCount(loadConfigFromString("scan:\n  workers: 0\n"))).toBe(os.availableParallelism());
  });
});
