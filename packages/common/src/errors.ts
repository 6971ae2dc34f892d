/**
 * Error taxonomy for the engine.
 *
 * Only ConfigurationError and its subclasses ever reach the caller of
 * `analyze`; everything else is caught per file and turned into a warning.
 */

export class CodeVizError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ConfigurationError extends CodeVizError {}

export class InvalidPatternError extends ConfigurationError {
  readonly pattern: string;

  constructor(pattern: string, reason: string) {
    super(`Invalid exclude pattern "${pattern}": ${reason}`);
    this.pattern = pattern;
  }
}

export class RootNotFoundError extends ConfigurationError {
  readonly root: string;

  constructor(root: string) {
    super(`Path not found: ${root}`);
    this.root = root;
  }
}

export class NotADirectoryError extends ConfigurationError {
  readonly root: string;

  constructor(root: string) {
    super(`Path is not a directory: ${root}`);
    this.root = root;
  }
}

export class UnsupportedLanguageError extends CodeVizError {
  readonly language: string;

  constructor(language: string) {
    super(`Unsupported language: ${language}`);
    this.language = language;
  }
}

export class ParseError extends CodeVizError {
  readonly language: string;

  constructor(language: string, message: string, options?: { cause?: unknown }) {
    super(`Tree-sitter parse failed (${language}): ${message}`, options);
    this.language = language;
  }
}

export class ParseTimeoutError extends ParseError {
  readonly timeoutMs: number;

  constructor(language: string, timeoutMs: number) {
    super(language, `parse cancelled after ${timeoutMs}ms`);
    this.timeoutMs = timeoutMs;
  }
}

export type MetricsFailureReason = "parse_failed" | "parse_timeout";

export class MetricsError extends CodeVizError {
  readonly path: string;
  readonly reason: MetricsFailureReason;

  constructor(path: string, reason: MetricsFailureReason, options?: { cause?: unknown }) {
    super(`Metrics calculation failed for ${path}: ${describeError(options?.cause)}`, options);
    this.path = path;
    this.reason = reason;
  }
}

export class CacheError extends CodeVizError {}

export class TimeoutError extends CodeVizError {
  readonly timeoutMs: number;

  constructor(label: string, timeoutMs: number) {
    super(`${label} timed out after ${timeoutMs}ms`);
    this.timeoutMs = timeoutMs;
  }
}

/**
 * One-line description of anything thrown, for log lines and warnings.
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (error === undefined) return "unknown error";
  return String(error);
}

/** Node system error code (`ENOENT`, `EACCES`, ...) if present. */
export function errorCode(error: unknown): string | undefined {
  if (typeof error === "object" && error !== null && "code" in error) {
    const { code } = error;
    return typeof code === "string" ? code : undefined;
  }
  return undefined;
}

export function isPermissionError(error: unknown): boolean {
  const code = errorCode(error);
  return code === "EACCES" || code === "EPERM";
}
