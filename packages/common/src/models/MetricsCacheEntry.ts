import { sqliteTable, text, blob, real } from "drizzle-orm/sqlite-core";

/**
 * file_metrics_cache
 * ------------------
 * One row per analysed file, reused while the file's mtime is unchanged.
 *
 * key          – sha256 of the root-relative path
 * path         – root-relative path, kept for `invalidate` and debugging
 * lastModified – mtimeMs the metrics were computed against
 * payload      – serialized FileMetrics (opaque to everything but the cache)
 */
export const fileMetricsCache = sqliteTable("file_metrics_cache", {
  key: text("key").primaryKey().notNull(),
  path: text("path").notNull(),
  lastModified: real("last_modified").notNull(),
  payload: blob("payload", { mode: "buffer" }).notNull(),
});

export type MetricsCacheEntry = typeof fileMetricsCache.$inferSelect;
export type NewMetricsCacheEntry = typeof fileMetricsCache.$inferInsert;
