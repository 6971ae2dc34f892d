import * as fs from "node:fs";
import * as path from "node:path";
import Database from "better-sqlite3";
import { CacheError, type FileMetrics } from "@codeviz/common";
import { DiskMetricsCache, cacheKey, CACHE_FILE_NAME } from "../src/services/cache/MetricsCacheService";
import { makeTempDir, removeDir, writeTree } from "./helpers/fixtures";

describe("DiskMetricsCache", () => {
  let root: string;
  let cacheDir: string;
  let cache: DiskMetricsCache;

  function metricsFor(relPath: string, overrides: Partial<FileMetrics> = {}): FileMetrics {
    return {
      path: relPath,
      language: "typescript",
      loc: 3,
      sizeBytes: 42,
      functionCount: 1,
      lastModified: fs.statSync(path.join(root, relPath)).mtimeMs,
      ...overrides,
    };
  }

  beforeEach(() => {
    root = makeTempDir("codeviz-cache-root-");
    cacheDir = path.join(makeTempDir("codeviz-cache-"), "nested", "cache");
    writeTree(root, { "src/a.ts": "let a = 1;", "b.ts": "let b = 2;" });
    cache = DiskMetricsCache.open(root, cacheDir);
  });

  afterEach(() => {
    cache.close();
    removeDir(root);
    removeDir(path.dirname(path.dirname(cacheDir)));
  });

  test("creates the database file inside the cache directory", () => {
    expect(fs.existsSync(path.join(cacheDir, CACHE_FILE_NAME))).toBe(true);
    expect(cache.stats()).toEqual({ entries: 0, location: path.join(cacheDir, CACHE_FILE_NAME) });
  });

  test("misses for unknown paths", async () => {
    await expect(cache.get("src/a.ts")).resolves.toBeNull();
  });

  test("returns stored metrics while the file is unchanged", async () => {
    const metrics = metricsFor("src/a.ts");

    await cache.set(metrics);

    await expect(cache.get("src/a.ts")).resolves.toEqual(metrics);
    await expect(cache.get("b.ts")).resolves.toBeNull();
  });

  test("misses once the file's mtime changes", async () => {
    await cache.set(metricsFor("src/a.ts"));
    const later = new Date(Date.now() + 60_000);
    fs.utimesSync(path.join(root, "src/a.ts"), later, later);

    await expect(cache.get("src/a.ts")).resolves.toBeNull();
  });

  test("misses when the file is gone", async () => {
    await cache.set(metricsFor("b.ts"));
    fs.rmSync(path.join(root, "b.ts"));

    await expect(cache.get("b.ts")).resolves.toBeNull();
  });

  test("overwrites the entry for the same path", async () => {
    await cache.set(metricsFor("b.ts", { loc: 1 }));
    await cache.set(metricsFor("b.ts", { loc: 9 }));

    await expect(cache.get("b.ts")).resolves.toMatchObject({ loc: 9 });
    expect(cache.stats().entries).toBe(1);
  });

  test("invalidate and clear drop entries", async () => {
    await cache.set(metricsFor("src/a.ts"));
    await cache.set(metricsFor("b.ts"));

    await cache.invalidate("src/a.ts");
    await expect(cache.get("src/a.ts")).resolves.toBeNull();
    expect(cache.stats().entries).toBe(1);

    cache.clear();
    expect(cache.stats().entries).toBe(0);
  });

  test("persists across connections", async () => {
    const metrics = metricsFor("src/a.ts");
    await cache.set(metrics);
    cache.close();

    cache = DiskMetricsCache.open(root, cacheDir);

    await expect(cache.get("src/a.ts")).resolves.toEqual(metrics);
  });

  test("treats an undecodable payload as a miss", async () => {
    await cache.set(metricsFor("b.ts"));
    const sqlite = new Database(path.join(cacheDir, CACHE_FILE_NAME));
    sqlite
      .prepare("UPDATE file_metrics_cache SET payload = ? WHERE key = ?")
      .run(Buffer.from("{not json", "utf8"), cacheKey("b.ts"));
    sqlite.close();

    await expect(cache.get("b.ts")).resolves.toBeNull();
  });

  test("set fails with CacheError once the connection is closed", async () => {
    cache.close();

    await expect(cache.set(metricsFor("b.ts"))).rejects.toBeInstanceOf(CacheError);

    cache = DiskMetricsCache.open(root, cacheDir);
  });

  test("a lookup on a closed connection is a miss", async () => {
    await cache.set(metricsFor("b.ts"));
    cache.close();

    await expect(cache.get("b.ts")).resolves.toBeNull();

    cache = DiskMetricsCache.open(root, cacheDir);
  });

  test("invalidate fails with CacheError once the connection is closed", async () => {
    cache.close();

    await expect(cache.invalidate("b.ts")).rejects.toBeInstanceOf(CacheError);
    await expect(cache.invalidate("b.ts")).rejects.toThrow(/^Cannot invalidate cache entry for b\.ts: /);

    cache = DiskMetricsCache.open(root, cacheDir);
  });

  test("open fails with CacheError when the directory cannot be created", () => {
    const blocker = path.join(root, "blocker");
    fs.writeFileSync(blocker, "");

    expect(() => DiskMetricsCache.open(root, path.join(blocker, "cache"))).toThrow(CacheError);
  });
});

describe("cacheKey", () => {
  test("is a stable sha256 hex digest of the path", () => {
    expect(cacheKey("src/a.ts")).toMatch(/^[0-9a-f]{64}$/);
    expect(cacheKey("src/a.ts")).toBe(cacheKey("src/a.ts"));
    expect(cacheKey("src/a.ts")).not.toBe(cacheKey("src/b.ts"));
  });
});
