/**
 * Tests for twinscan configuration and suppression system.
 */

import * as path from "path";
import { loadConfig, loadConfigFromString, createDefaultConfig } from "../src/config/loader";
import {
  parseSuppressionDirectives,
  isSuppressed,
  resolveSuppressedRanges,
  isSpanSuppressed,
} from "../src/config/suppression";
import { ConfigError } from "../src/analysis/errors";
import { DEFAULT_DUPLICATES_CONFIG } from "../src/config/schema";

const FIXTURES_DIR = path.join(__dirname, "fixtures/twinscan-config");

describe("Config Loading", () => {
  describe("loadConfig", () => {
    it("should load config from .twinscan.yml file", () => {
      const config = loadConfig(FIXTURES_DIR);

      expect(config.raw.version).toBe(1);
      expect(config.duplicates.min_duplicate_lines).toBe(4);
      expect(config.duplicates.min_duplicate_tokens).toBe(40);
      expect(config.duplicates.level).toBe("error");
      expect(config.cache.backend).toBe("memory");
      expect(config.scan.workers).toBe(2);
      expect(config.scan.strict).toBe(true);
    });

    it("should resolve the cache dir against the repo root", () => {
      const config = loadConfig(FIXTURES_DIR);

      expect(config.cache.dir).toBe(path.join(FIXTURES_DIR, "build/twinscan-cache"));
    });

    it("should return defaults when no config file exists", () => {
      const config = loadConfig("/nonexistent/path");

      expect(config.raw.version).toBe(1);
      expect(config.duplicates.min_duplicate_lines).toBe(3);
      expect(config.duplicates.min_duplicate_tokens).toBe(30);
      expect(config.duplicates.min_occurrences).toBe(2);
      expect(config.duplicates.normalize).toBe(false);
      expect(config.cache.backend).toBe("disk");
      expect(config.cache.max_age_days).toBe(30);
    });

    it("should merge defaults with config file values", () => {
      const config = loadConfig(FIXTURES_DIR);

      // Not set in the fixture
      expect(config.duplicates.min_occurrences).toBe(DEFAULT_DUPLICATES_CONFIG.min_occurrences);
      expect(config.duplicates.normalize).toBe(DEFAULT_DUPLICATES_CONFIG.normalize);
      expect(config.scan.inline_suppressions).toBe(true);
      expect(config.cache.key_prefix).toBe("twinscan:");
    });
  });

  describe("createDefaultConfig", () => {
    it("should return default configuration", () => {
      const config = createDefaultConfig("/repo");

      expect(config.raw.version).toBe(1);
      expect(config.root).toBe(path.resolve("/repo"));
      expect(config.cache.dir).toBe(path.resolve("/repo", ".twinscan-cache"));
      expect(config.scan.workers).toBe(0);
    });
  });

  describe("loadConfigFromString", () => {
    it("should parse YAML config string", () => {
      const yaml = `
version: 1
duplicates:
  min_duplicate_lines: 5
  normalize: true
cache:
  enabled: false
`;
      const config = loadConfigFromString(yaml);

      expect(config.duplicates.min_duplicate_lines).toBe(5);
      expect(config.duplicates.normalize).toBe(true);
      expect(config.cache.enabled).toBe(false);
    });

    it("should treat an empty document as defaults", () => {
      const config = loadConfigFromString("");

      expect(config.duplicates.min_duplicate_tokens).toBe(30);
    });

    it("should reject malformed YAML", () => {
      expect(() => loadConfigFromString("duplicates: [unclosed")).toThrow(ConfigError);
    });

    it("should reject values of the wrong type", () => {
      expect(() => loadConfigFromString("duplicates:\n  min_duplicate_lines: many\n")).toThrow(
        "<string>: duplicates.min_duplicate_lines must be a number"
      );
    });

    it("should reject unsupported versions", () => {
      expect(() => loadConfigFromString("version: 2\n")).toThrow("Unsupported config version 2");
    });
  });
});

describe("Threshold Validation", () => {
  it("should reject non-positive minimum lines", () => {
    expect(() => loadConfigFromString("duplicates:\n  min_duplicate_lines: 0\n")).toThrow(ConfigError);
  });

  it("should reject non-integer minimum tokens", () => {
    expect(() => loadConfigFromString("duplicates:\n  min_duplicate_tokens: 2.5\n")).toThrow(
      "duplicates.min_duplicate_tokens must be a positive integer, got 2.5"
    );
  });

  it("should reject min_occurrences below 2", () => {
    expect(() => loadConfigFromString("duplicates:\n  min_occurrences: 1\n")).toThrow(
      "duplicates.min_occurrences must be an integer of at least 2, got 1"
    );
  });

  it("should validate per-language overrides", () => {
    const yaml = "duplicates:\n  languages:\n    go:\n      min_duplicate_tokens: -3\n";
    expect(() => loadConfigFromString(yaml)).toThrow(
      "duplicates.languages.go.min_duplicate_tokens must be a positive integer, got -3"
    );
  });

  it("should reject unknown languages in overrides", () => {
    const yaml = "duplicates:\n  languages:\n    cobol:\n      min_occurrences: 3\n";
    expect(() => loadConfigFromString(yaml)).toThrow('unknown language "cobol"');
  });

  it("should reject an unknown cache backend", () => {
    expect(() => loadConfigFromString("cache:\n  backend: s3\n")).toThrow(ConfigError);
  });

  it("should reject min_constant_occurrences below 2", () => {
    expect(() => loadConfigFromString("duplicates:\n  min_constant_occurrences: 1\n")).toThrow(
      "duplicates.min_constant_occurrences must be an integer of at least 2, got 1"
    );
  });

  it("should reject unknown block filters", () => {
    expect(() => loadConfigFromString("duplicates:\n  filters:\n    magic_filter: false\n")).toThrow(
      'unknown filter "magic_filter"'
    );
  });

  it("should reject non-boolean filter toggles", () => {
    expect(() => loadConfigFromString("duplicates:\n  filters:\n    import_group_filter: sometimes\n")).toThrow(
      "<string>: duplicates.filters.import_group_filter must be true or false"
    );
  });

  it("should reject a negative worker count", () => {
    expect(() => loadConfigFromString("scan:\n  workers: -1\n")).toThrow(
      "scan.workers must be a non-negative integer, got -1"
    );
  });

  it("should expose the error code", () => {
    let caught: unknown;
    try {
      loadConfigFromString("duplicates:\n  min_duplicate_lines: 0\n");
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigError);
    expect(caught instanceof ConfigError && caught.code).toBe("CONFIG_ERROR");
  });
});

describe("Duplicate options", () => {
  it("should enable every filter and constant detection by default", () => {
    const config = createDefaultConfig();

    expect(config.duplicates.filters).toEqual({ import_group_filter: true, keyword_argument_filter: true });
    expect(config.duplicates.detect_duplicate_constants).toBe(true);
    expect(config.duplicates.min_constant_occurrences).toBe(2);
  });

  it("should read filter toggles and constant options", () => {
    const config = loadConfigFromString(
      [
        "duplicates:",
        "  filters:",
        "    keyword_argument_filter: false",
        "  detect_duplicate_constants: false",
        "  min_constant_occurrences: 3",
        "",
      ].join("\n")
    );

    expect(config.duplicates.filters).toEqual({ import_group_filter: true, keyword_argument_filter: false });
    expect(config.duplicates.detect_duplicate_constants).toBe(false);
    expect(config.duplicates.min_constant_occurrences).toBe(3);
  });
});

describe("Language Thresholds", () => {
  it("should merge language overrides over global values", () => {
    const config = loadConfig(FIXTURES_DIR);

    expect(config.getThresholds("python")).toEqual({
      min_duplicate_lines: 4,
      min_duplicate_tokens: 40,
      min_occurrences: 3,
    });
    expect(config.getThresholds("go")).toEqual({
      min_duplicate_lines: 4,
      min_duplicate_tokens: 40,
      min_occurrences: 2,
    });
  });
});

describe("File Filtering", () => {
  describe("isFileIgnored", () => {
    it("should match ignore patterns", () => {
      const config = loadConfig(FIXTURES_DIR);

      expect(config.isFileIgnored("vendor/lib/index.ts")).toBe(true);
      expect(config.isFileIgnored("src/api.generated.ts")).toBe(true);
      expect(config.isFileIgnored("src/api.ts")).toBe(false);
    });

    it("should match absolute paths relative to the root", () => {
      const config = loadConfig(FIXTURES_DIR);

      expect(config.isFileIgnored(path.join(FIXTURES_DIR, "vendor/a.py"))).toBe(true);
    });

    it("should work with default config (no ignores)", () => {
      const config = createDefaultConfig();

      expect(config.isFileIgnored("vendor/lib/index.ts")).toBe(false);
    });
  });
});

describe("Rule Configuration", () => {
  it("should enable DUPLICATE_CODE at warning level by default", () => {
    const config = createDefaultConfig();

    expect(config.getRuleConfig("DUPLICATE_CODE")).toEqual({ enabled: true, level: "warning" });
  });

  it("should disable the rule when level is off", () => {
    const config = loadConfigFromString("duplicates:\n  level: off\n");

    expect(config.getRuleConfig("DUPLICATE_CODE").enabled).toBe(false);
  });

  it("should disable the rule when duplicates.enabled is false", () => {
    const config = loadConfigFromString("duplicates:\n  enabled: false\n");

    expect(config.getRuleConfig("DUPLICATE_CODE")).toEqual({ enabled: false, level: "warning" });
  });
});

describe("Suppression Directives", () => {
  describe("parseSuppressionDirectives", () => {
    it("should parse file-level ALL suppression", () => {
      const source = `// twinscan-ignore-file ALL
const x = 1;`;

      const directives = parseSuppressionDirectives(source);
      expect(directives).toEqual([{ scope: "file", allRules: true, rules: [], line: 1 }]);
    });

    it("should treat a bare directive as ALL", () => {
      const directives = parseSuppressionDirectives("# twinscan-ignore-next-line");

      expect(directives).toEqual([{ scope: "next-line", allRules: true, rules: [], line: 1 }]);
    });

    it("should parse rule lists", () => {
      const directives = parseSuppressionDirectives("x = 1  # twinscan-ignore-line DUPLICATE_CODE");

      expect(directives).toEqual([{ scope: "line", allRules: false, rules: ["DUPLICATE_CODE"], line: 1 }]);
    });

    it("should ignore invalid rule IDs", () => {
      const source = `// twinscan-ignore-line MAGIC_NUMBER,DUPLICATE_CODE`;

      const directives = parseSuppressionDirectives(source);
      expect(directives).toHaveLength(1);
      expect(directives[0].rules).toEqual(["DUPLICATE_CODE"]);
    });

    it("should drop directives naming only unknown rules", () => {
      expect(parseSuppressionDirectives("// twinscan-ignore-line MAGIC_NUMBER")).toEqual([]);
    });

    it("should parse start and end markers", () => {
      const source = `// twinscan-ignore-start
a();
// twinscan-ignore-end`;

      const directives = parseSuppressionDirectives(source);
      expect(directives.map((d) => [d.scope, d.line])).toEqual([
        ["start", 1],
        ["end", 3],
      ]);
    });
  });

  describe("isSuppressed", () => {
    it("should suppress with file-level ALL directive", () => {
      const directives = parseSuppressionDirectives(`/* twinscan-ignore-file ALL */`);

      expect(isSuppressed("DUPLICATE_CODE", 5, directives)).toBe(true);
      expect(isSuppressed("DUPLICATE_CODE", 500, directives)).toBe(true);
    });

    it("should suppress next line with next-line directive", () => {
      const source = `// twinscan-ignore-next-line DUPLICATE_CODE
copy();`;
      const directives = parseSuppressionDirectives(source);

      expect(isSuppressed("DUPLICATE_CODE", 1, directives)).toBe(false);
      expect(isSuppressed("DUPLICATE_CODE", 2, directives)).toBe(true);
      expect(isSuppressed("DUPLICATE_CODE", 3, directives)).toBe(false);
    });
  });

  describe("resolveSuppressedRanges", () => {
    it("should cover the whole file for a file directive", () => {
      const source = "// twinscan-ignore-file\na();\nb();\n";

      expect(resolveSuppressedRanges("a.ts", source, "DUPLICATE_CODE")).toEqual([
        { file: "a.ts", startLine: 1, endLine: 4 },
      ]);
    });

    it("should turn start/end pairs into inclusive ranges", () => {
      const source = ["a();", "// twinscan-ignore-start", "b();", "c();", "// twinscan-ignore-end", "d();"].join("\n");

      expect(resolveSuppressedRanges("a.ts", source, "DUPLICATE_CODE")).toEqual([
        { file: "a.ts", startLine: 2, endLine: 5 },
      ]);
    });

    it("should run an unterminated block to the end of the file", () => {
      const source = ["a();", "# twinscan-ignore-start", "b()", "c()"].join("\n");

      expect(resolveSuppressedRanges("a.py", source, "DUPLICATE_CODE")).toEqual([
        { file: "a.py", startLine: 2, endLine: 4 },
      ]);
    });

    it("should ignore a stray end marker", () => {
      const source = ["a();", "// twinscan-ignore-end", "b();"].join("\n");

      expect(resolveSuppressedRanges("a.ts", source, "DUPLICATE_CODE")).toEqual([]);
    });

    it("should map line and next-line directives to single lines", () => {
      const source = ["a(); // twinscan-ignore-line", "// twinscan-ignore-next-line", "b();"].join("\n");

      expect(resolveSuppressedRanges("a.ts", source, "DUPLICATE_CODE")).toEqual([
        { file: "a.ts", startLine: 1, endLine: 1 },
        { file: "a.ts", startLine: 3, endLine: 3 },
      ]);
    });
  });

  describe("isSpanSuppressed", () => {
    const ranges = [{ file: "a.ts", startLine: 5, endLine: 8 }];

    it("should match spans that share any line with a range", () => {
      expect(isSpanSuppressed({ file: "a.ts", startLine: 6, endLine: 7 }, ranges)).toBe(true);
      expect(isSpanSuppressed({ file: "a.ts", startLine: 4, endLine: 8 }, ranges)).toBe(true);
      expect(isSpanSuppressed({ file: "a.ts", startLine: 8, endLine: 12 }, ranges)).toBe(true);
      expect(isSpanSuppressed({ file: "a.ts", startLine: 1, endLine: 20 }, ranges)).toBe(true);
    });

    it("should not match spans beside a range or in another file", () => {
      expect(isSpanSuppressed({ file: "a.ts", startLine: 1, endLine: 4 }, ranges)).toBe(false);
      expect(isSpanSuppressed({ file: "a.ts", startLine: 9, endLine: 10 }, ranges)).toBe(false);
      expect(isSpanSuppressed({ file: "b.ts", startLine: 6, endLine: 7 }, ranges)).toBe(false);
    });
  });
});
