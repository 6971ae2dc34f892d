/**
 * @codeviz/pipeline main entry point
 * Scans a repository, measures every supported source file and summarises
 * the result.
 */

export { analyze, AnalysisService, calculateSummary, LARGEST_FILES_LIMIT } from "./services/AnalysisService";
export { scanDirectory, comparePaths } from "./services/scanner/fileScanner";
export { compileGlob, compileGlobs, matchesAny } from "./services/scanner/globPattern";
export { GitignoreRules, isGitignored } from "./services/scanner/gitignore";
export { ParserRegistry, getDefaultRegistry } from "./services/parsers/ParserRegistry";
export { TreeSitterLanguageParser } from "./services/parsers/LanguageParser";
export { BUILTIN_LANGUAGES } from "./services/parsers/languages";
export { calculateMetrics, countLinesOfCode } from "./services/metrics/MetricsCalculator";
export { DiskMetricsCache, cacheKey, CACHE_FILE_NAME } from "./services/cache/MetricsCacheService";
export { DirectoryTreeService } from "./services/DirectoryTreeService";
export { InProcessMeasurer } from "./services/metrics/FileMeasurer";
export { MetricsWorkerPool } from "./services/workers/MetricsWorkerPool";
export { mapWithConcurrency } from "./utils/concurrency";
export { nodeFileSystem } from "./utils/fileSystem";

export type { AnalyzeOptions } from "./services/AnalysisService";
export type { ScanOptions, ScanResult } from "./services/scanner/fileScanner";
export type { CompiledGlob } from "./services/scanner/globPattern";
export type { ParserRegistryOptions } from "./services/parsers/ParserRegistry";
export type {
  CommentRange,
  LanguageDescriptor,
  LanguageParser,
  SyntaxTree,
  TreeSitterParserOptions,
} from "./services/parsers/LanguageParser";
export type { MetricsCache, MetricsCacheStats } from "./services/cache/MetricsCacheService";
export type { FileMeasurer, MeasureRequest } from "./services/metrics/FileMeasurer";
export type { MetricsWorkerPoolOptions } from "./services/workers/MetricsWorkerPool";
export type { FileContents, FileSystem } from "./utils/fileSystem";
