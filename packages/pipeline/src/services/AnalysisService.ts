import { join, resolve } from "node:path";
import {
  DEFAULT_PARSE_TIMEOUT_MS,
  MetricsError,
  UnsupportedLanguageError,
  createAnalysisConfig,
  createLogger,
  describeError,
  isPermissionError,
  resolveCacheDir,
  resolveLogLevel,
  type AnalysisConfig,
  type AnalysisResult,
  type AnalysisWarning,
  type FileMetrics,
  type Logger,
  type Summary,
  type WarningKind,
} from "@codeviz/common";
import { DiskMetricsCache, type MetricsCache } from "./cache/MetricsCacheService";
import { InProcessMeasurer, type FileMeasurer } from "./metrics/FileMeasurer";
import { ParserRegistry, getDefaultRegistry } from "./parsers/ParserRegistry";
import { comparePaths, scanDirectory } from "./scanner/fileScanner";
import { MetricsWorkerPool } from "./workers/MetricsWorkerPool";
import { mapWithConcurrency } from "../utils/concurrency";
import { nodeFileSystem, type FileSystem } from "../utils/fileSystem";

export const LARGEST_FILES_LIMIT = 10;

export interface AnalyzeOptions {
  logger?: Logger;
  /** Parsers to use; defaults to the process-wide registry. */
  registry?: ParserRegistry;
  /**
   * Cache to read and write. When omitted and `config.useCache` is set, the
   * on-disk cache under the configured directory is opened for the run.
   */
  cache?: MetricsCache;
  /**
   * Measure files on worker threads. Defaults to true unless `registry` is
   * given, since custom parsers live on the calling thread.
   */
  workers?: boolean;
  fileSystem?: FileSystem;
}

export interface AnalysisServiceOptions {
  /** Measure on worker threads, each with its own built-in parsers. */
  workers?: boolean;
  fileSystem?: FileSystem;
}

interface FileOutcome {
  metrics: FileMetrics | null;
  warnings: AnalysisWarning[];
}

const skip = (path: string, kind: WarningKind, message: string): FileOutcome => ({
  metrics: null,
  warnings: [{ path, kind, message }],
});

/**
 * Runs the scan, measure and summarise stages over one repository.
 */
export class AnalysisService {
  private readonly fileSystem: FileSystem;

  constructor(
    private readonly registry: ParserRegistry,
    private readonly logger: Logger,
    private readonly options: AnalysisServiceOptions = {},
  ) {
    this.fileSystem = options.fileSystem ?? nodeFileSystem;
  }

  /**
   * @throws {ConfigurationError} for a bad root or exclude pattern; nothing
   *   that goes wrong with a single file rejects
   */
  async analyze(root: string, config: AnalysisConfig, cache?: MetricsCache): Promise<AnalysisResult> {
    const rootPath = resolve(root);
    const startedAt = Date.now();

    const scan = await scanDirectory(rootPath, {
      excludePatterns: config.excludePatterns,
      extensions: this.registry.supportedExtensions(),
      maxFileSizeBytes: config.maxFileSizeBytes,
      respectGitignore: config.respectGitignore,
      logger: this.logger,
      fileSystem: this.fileSystem,
    });

    let ownedCache: DiskMetricsCache | undefined;
    let activeCache = cache;
    if (!activeCache && config.useCache) {
      try {
        ownedCache = DiskMetricsCache.open(rootPath, resolveCacheDir(rootPath, config), this.logger);
        activeCache = ownedCache;
      } catch (error) {
        this.logger.warn(`Caching disabled for this run: ${describeError(error)}`);
      }
    }

    let measurer: FileMeasurer | undefined;
    try {
      const activeMeasurer = await this.createMeasurer(config, scan.files.length);
      measurer = activeMeasurer;
      const outcomes = await mapWithConcurrency(scan.files, config.concurrency, (relPath) =>
        this.processFile(rootPath, relPath, config, activeCache, activeMeasurer),
      );

      // reduce in scan order; the lanes may finish in any order
      const files: FileMetrics[] = [];
      const warnings: AnalysisWarning[] = [...scan.warnings];
      for (const outcome of outcomes) {
        if (outcome.metrics) files.push(outcome.metrics);
        warnings.push(...outcome.warnings);
      }

      const summary = calculateSummary(files);
      this.logger.info(
        `Analysed ${summary.totalFiles} files (${summary.totalLoc} LOC, ${summary.totalFunctions} functions, ` +
          `${warnings.length} warnings) in ${Date.now() - startedAt}ms`,
      );

      return { summary, files, warnings, timestamp: Date.now() };
    } finally {
      await measurer?.close();
      ownedCache?.close();
    }
  }

  /**
   * A worker pool sized to the lanes that will feed it, or the calling
   * thread when there is nothing to run in parallel or the pool cannot start.
   */
  private async createMeasurer(config: AnalysisConfig, fileCount: number): Promise<FileMeasurer> {
    const size = Math.min(config.concurrency, fileCount);
    if (!this.options.workers || size < 2) {
      return new InProcessMeasurer(this.registry);
    }
    try {
      const pool = await MetricsWorkerPool.start({ size, parseTimeoutMs: config.parseTimeoutMs, logger: this.logger });
      this.logger.debug(`Started ${pool.size} metrics workers`);
      return pool;
    } catch (error) {
      this.logger.warn(`Measuring on the main thread: ${describeError(error)}`);
      return new InProcessMeasurer(this.registry);
    }
  }

  /**
   * Every failure here becomes a warning for this file. Parse time is bounded
   * by the engine timeout, so no file is dropped for waiting on other lanes.
   */
  private async processFile(
    root: string,
    relPath: string,
    config: AnalysisConfig,
    cache: MetricsCache | undefined,
    measurer: FileMeasurer,
  ): Promise<FileOutcome> {
    if (cache) {
      try {
        const cached = await cache.get(relPath);
        if (cached) {
          this.logger.debug(`Cache hit ${relPath}`);
          return { metrics: cached, warnings: [] };
        }
      } catch (error) {
        this.logger.debug(`Cache lookup failed for ${relPath}: ${describeError(error)}`);
      }
    }

    let contents: Buffer;
    let mtimeMs: number;
    try {
      ({ contents, mtimeMs } = await this.fileSystem.readFile(join(root, relPath)));
    } catch (error) {
      const kind = isPermissionError(error) ? "permission_denied" : "read_failed";
      this.logger.warn(`Cannot read ${relPath}: ${describeError(error)}`);
      return skip(relPath, kind, `Cannot read file: ${describeError(error)}`);
    }

    // the file may have grown since the scan
    if (contents.byteLength > config.maxFileSizeBytes) {
      return skip(
        relPath,
        "file_too_large",
        `File is ${contents.byteLength} bytes, limit ${config.maxFileSizeBytes} bytes`,
      );
    }

    let source: string;
    try {
      source = new TextDecoder("utf-8", { fatal: true, ignoreBOM: true }).decode(contents);
    } catch {
      this.logger.warn(`Skipping ${relPath}: not valid UTF-8`);
      return skip(relPath, "invalid_encoding", "File is not valid UTF-8");
    }

    const language = this.registry.detectLanguage(relPath);
    if (!language) {
      return skip(relPath, "unsupported_language", "No parser for this file extension");
    }

    let metrics: FileMetrics;
    try {
      metrics = await measurer.measure({ path: relPath, source, language, lastModified: mtimeMs });
    } catch (error) {
      if (error instanceof UnsupportedLanguageError) {
        return skip(relPath, "unsupported_language", error.message);
      }
      if (error instanceof MetricsError) {
        this.logger.warn(error.message);
        return skip(relPath, error.reason, error.message);
      }
      this.logger.warn(`Cannot measure ${relPath}: ${describeError(error)}`);
      return skip(relPath, "parse_failed", describeError(error));
    }

    const warnings: AnalysisWarning[] = [];
    if (cache) {
      try {
        await cache.set(metrics);
      } catch (error) {
        this.logger.warn(`Cache write failed for ${relPath}: ${describeError(error)}`);
        warnings.push({ path: relPath, kind: "cache_write_failed", message: describeError(error) });
      }
    }
    return { metrics, warnings };
  }
}

/**
 * Totals over `files` plus the `limit` largest paths by LOC, ties broken by
 * path.
 */
export function calculateSummary(files: readonly FileMetrics[], limit = LARGEST_FILES_LIMIT): Summary {
  const largestFiles = [...files]
    .sort((a, b) => b.loc - a.loc || comparePaths(a.path, b.path))
    .slice(0, limit)
    .map((file) => file.path);

  return {
    totalFiles: files.length,
    totalLoc: files.reduce((sum, file) => sum + file.loc, 0),
    totalFunctions: files.reduce((sum, file) => sum + file.functionCount, 0),
    largestFiles,
  };
}

/**
 * Analyse the repository at `root`.
 *
 * @example
 * const result = await analyze("./my-repo", createAnalysisConfig({ useCache: false }));
 * console.log(result.summary.totalLoc);
 */
export async function analyze(
  root: string,
  config: AnalysisConfig = createAnalysisConfig(),
  options: AnalyzeOptions = {},
): Promise<AnalysisResult> {
  const logger = options.logger ?? createLogger(resolveLogLevel());
  const registry =
    options.registry ??
    (config.parseTimeoutMs === DEFAULT_PARSE_TIMEOUT_MS
      ? getDefaultRegistry()
      : new ParserRegistry({ parseTimeoutMs: config.parseTimeoutMs }));

  const service = new AnalysisService(registry, logger, {
    workers: options.workers ?? options.registry === undefined,
    fileSystem: options.fileSystem,
  });
  return service.analyze(root, config, options.cache);
}
