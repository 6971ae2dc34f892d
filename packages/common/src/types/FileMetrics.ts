/**
 * Result types produced by the analysis engine and consumed by formatters,
 * diff tooling and visualisation front ends.
 */

export interface FileMetrics {
  /** Path relative to the analysis root, always `/`-separated. */
  readonly path: string;
  /** Language tag of the parser that measured the file, e.g. "typescript". */
  readonly language: string;
  /** Lines holding at least one character of code (comments and blanks excluded). */
  readonly loc: number;
  readonly sizeBytes: number;
  readonly functionCount: number;
  /** `mtimeMs` of the file when its contents were read. */
  readonly lastModified: number;
}

export interface Summary {
  readonly totalFiles: number;
  readonly totalLoc: number;
  readonly totalFunctions: number;
  /**
   * Up to ten paths ordered by LOC descending; equal LOC falls back to path order.
   */
  readonly largestFiles: readonly string[];
}

export type WarningKind =
  | "permission_denied"
  | "file_too_large"
  | "read_failed"
  | "invalid_encoding"
  | "unsupported_language"
  | "parse_failed"
  | "parse_timeout"
  | "cache_write_failed";

export interface AnalysisWarning {
  readonly path: string;
  readonly kind: WarningKind;
  readonly message: string;
}

export interface AnalysisResult {
  readonly summary: Summary;
  /** Sorted by path. */
  readonly files: readonly FileMetrics[];
  /** Files skipped or degraded during the run, in scan order. */
  readonly warnings: readonly AnalysisWarning[];
  /** Epoch milliseconds at which the run finished. */
  readonly timestamp: number;
}
