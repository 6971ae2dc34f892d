import { createHash } from "node:crypto";
import { mkdirSync } from "node:fs";
import { stat } from "node:fs/promises";
import { join, resolve } from "node:path";
import Database from "better-sqlite3";
import { drizzle } from "drizzle-orm/better-sqlite3";
import { count, eq } from "drizzle-orm";
import {
  CacheError,
  FileMetricsSchema,
  createSilentLogger,
  describeError,
  fileMetricsCache,
  type FileMetrics,
  type Logger,
  type MetricsCacheEntry,
  type NewMetricsCacheEntry,
} from "@codeviz/common";

export const CACHE_FILE_NAME = "metrics-cache.sqlite";

/**
 * Per-file metrics keyed by root-relative path and validated against the
 * file's current mtime.
 */
export interface MetricsCache {
  /** Cached metrics, or null unless the file is unchanged since they were stored. */
  get(relativePath: string): Promise<FileMetrics | null>;
  /** @throws {CacheError} when the entry cannot be written */
  set(metrics: FileMetrics): Promise<void>;
  /** @throws {CacheError} when the entry cannot be removed */
  invalidate(relativePath: string): Promise<void>;
}

export interface MetricsCacheStats {
  entries: number;
  location: string;
}

export function cacheKey(relativePath: string): string {
  return createHash("sha256").update(relativePath).digest("hex");
}

/**
 * SQLite-backed MetricsCache stored in `<cacheDir>/metrics-cache.sqlite`.
 *
 * better-sqlite3 is synchronous, so concurrent `set` calls from the worker
 * lanes run one after another on the single connection.
 */
export class DiskMetricsCache implements MetricsCache {
  private readonly db: ReturnType<typeof drizzle>;

  private constructor(
    private readonly root: string,
    private readonly sqlite: Database.Database,
    private readonly location: string,
    private readonly logger: Logger,
  ) {
    this.db = drizzle(sqlite);
  }

  /**
   * Open (creating if needed) the cache for an analysis root.
   * @throws {CacheError} when the directory or database cannot be opened
   */
  static open(root: string, cacheDir: string, logger: Logger = createSilentLogger()): DiskMetricsCache {
    const location = join(cacheDir, CACHE_FILE_NAME);
    let sqlite: Database.Database | undefined;
    try {
      mkdirSync(cacheDir, { recursive: true });
      sqlite = new Database(location);
      sqlite.pragma("journal_mode = WAL");
      sqlite.pragma("busy_timeout = 5000");
      sqlite.exec(
        `CREATE TABLE IF NOT EXISTS file_metrics_cache (
          key TEXT PRIMARY KEY NOT NULL,
          path TEXT NOT NULL,
          last_modified REAL NOT NULL,
          payload BLOB NOT NULL
        )`,
      );
    } catch (error) {
      sqlite?.close();
      throw new CacheError(`Cannot open metrics cache at ${location}: ${describeError(error)}`, { cause: error });
    }

    logger.debug(`Metrics cache opened at ${location}`);
    return new DiskMetricsCache(resolve(root), sqlite, location, logger);
  }

  async get(relativePath: string): Promise<FileMetrics | null> {
    let row: MetricsCacheEntry | undefined;
    try {
      row = this.db
        .select()
        .from(fileMetricsCache)
        .where(eq(fileMetricsCache.key, cacheKey(relativePath)))
        .get();
    } catch (error) {
      this.logger.debug(`Cache read failed for ${relativePath}: ${describeError(error)}`);
      return null;
    }
    if (!row) return null;

    let mtimeMs: number;
    try {
      mtimeMs = (await stat(join(this.root, relativePath))).mtimeMs;
    } catch {
      return null;
    }
    if (mtimeMs !== row.lastModified) {
      this.logger.debug(`Cache stale for ${relativePath}`);
      return null;
    }

    let decoded: unknown;
    try {
      decoded = JSON.parse(row.payload.toString("utf8"));
    } catch {
      this.logger.debug(`Cache payload unreadable for ${relativePath}`);
      return null;
    }
    const parsed = FileMetricsSchema.safeParse(decoded);
    if (!parsed.success) return null;

    const metrics = parsed.data;
    if (metrics.path !== relativePath || metrics.lastModified !== row.lastModified) {
      return null;
    }
    return metrics;
  }

  async set(metrics: FileMetrics): Promise<void> {
    const entry: NewMetricsCacheEntry = {
      key: cacheKey(metrics.path),
      path: metrics.path,
      lastModified: metrics.lastModified,
      payload: Buffer.from(JSON.stringify(metrics), "utf8"),
    };

    try {
      this.db
        .insert(fileMetricsCache)
        .values(entry)
        .onConflictDoUpdate({
          target: fileMetricsCache.key,
          set: {
            path: entry.path,
            lastModified: entry.lastModified,
            payload: entry.payload,
          },
        })
        .run();
    } catch (error) {
      throw new CacheError(`Cannot write cache entry for ${metrics.path}: ${describeError(error)}`, {
        cause: error,
      });
    }
  }

  /** @throws {CacheError} when the entry cannot be removed */
  async invalidate(relativePath: string): Promise<void> {
    try {
      this.db.delete(fileMetricsCache).where(eq(fileMetricsCache.key, cacheKey(relativePath))).run();
    } catch (error) {
      throw new CacheError(`Cannot invalidate cache entry for ${relativePath}: ${describeError(error)}`, {
        cause: error,
      });
    }
  }

  stats(): MetricsCacheStats {
    const row = this.db.select({ value: count() }).from(fileMetricsCache).get();
    return { entries: row?.value ?? 0, location: this.location };
  }

  clear(): void {
    this.db.delete(fileMetricsCache).run();
  }

  close(): void {
    this.sqlite.close();
  }
}
