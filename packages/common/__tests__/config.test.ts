import * as os from "node:os";
import * as path from "node:path";
import {
  ConfigurationError,
  DEFAULT_EXCLUDE_PATTERNS,
  DEFAULT_MAX_FILE_SIZE_BYTES,
  DEFAULT_PARSE_TIMEOUT_MS,
  createAnalysisConfig,
  resolveCacheDir,
} from "../src";

describe("createAnalysisConfig", () => {
  test("fills in defaults", () => {
    const config = createAnalysisConfig();

    expect(config).toEqual({
      excludePatterns: [...DEFAULT_EXCLUDE_PATTERNS],
      useCache: true,
      respectGitignore: true,
      maxFileSizeBytes: DEFAULT_MAX_FILE_SIZE_BYTES,
      parseTimeoutMs: DEFAULT_PARSE_TIMEOUT_MS,
      concurrency: Math.max(1, os.availableParallelism()),
    });
    expect(config.excludePatterns).toContain("**/node_modules/**");
    expect(config.cacheDir).toBeUndefined();
  });

  test("keeps caller values", () => {
    const config = createAnalysisConfig({
      excludePatterns: ["vendor/**"],
      useCache: false,
      cacheDir: "/tmp/codeviz-cache",
      concurrency: 2,
      parseTimeoutMs: 250,
    });

    expect(config).toMatchObject({
      excludePatterns: ["vendor/**"],
      useCache: false,
      cacheDir: "/tmp/codeviz-cache",
      concurrency: 2,
      parseTimeoutMs: 250,
    });
  });

  test("returns a frozen value", () => {
    const config = createAnalysisConfig();

    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.excludePatterns)).toBe(true);
  });

  test("rejects malformed options with every issue listed", () => {
    expect(() => createAnalysisConfig({ concurrency: 0, maxFileSizeBytes: -1 })).toThrow(ConfigurationError);
    expect(() => createAnalysisConfig({ concurrency: 1.5 })).toThrow(/^Invalid analysis config: concurrency: /);
  });
});

describe("resolveCacheDir", () => {
  test("defaults to .codeviz/cache under the root", () => {
    expect(resolveCacheDir("/repo", {})).toBe(path.join(path.resolve("/repo"), ".codeviz", "cache"));
  });

  test("prefers the configured directory", () => {
    expect(resolveCacheDir("/repo", { cacheDir: "/elsewhere/cache" })).toBe(path.resolve("/elsewhere/cache"));
  });
});
