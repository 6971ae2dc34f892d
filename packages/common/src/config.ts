/**
 * Analysis configuration
 * Builds and validates the value passed to `analyze`; there is no config file
 * and no global state, every run gets its own frozen config.
 */

import path from "node:path";
import os from "node:os";
import { z } from "zod";
import { ConfigurationError } from "./errors";

/** Directory name holding engine state inside an analysed repository. */
export const STATE_DIR_NAME = ".codeviz";

export const DEFAULT_EXCLUDE_PATTERNS: readonly string[] = [
  "**/node_modules/**",
  "**/.git/**",
  "**/target/**",
  "**/dist/**",
  "**/build/**",
  "**/coverage/**",
  "**/__pycache__/**",
  "**/.next/**",
  "**/.turbo/**",
];

export const DEFAULT_MAX_FILE_SIZE_BYTES = 10 * 1024 * 1024;
export const DEFAULT_PARSE_TIMEOUT_MS = 5_000;

export const AnalysisConfigSchema = z.object({
  excludePatterns: z.array(z.string()).default([...DEFAULT_EXCLUDE_PATTERNS]),
  useCache: z.boolean().default(true),
  cacheDir: z.string().min(1).optional(),
  respectGitignore: z.boolean().default(true),
  maxFileSizeBytes: z.number().int().positive().default(DEFAULT_MAX_FILE_SIZE_BYTES),
  parseTimeoutMs: z.number().int().positive().default(DEFAULT_PARSE_TIMEOUT_MS),
  concurrency: z.number().int().positive().optional(),
});

export type AnalysisConfigInput = z.input<typeof AnalysisConfigSchema>;

export interface AnalysisConfig {
  readonly excludePatterns: readonly string[];
  readonly useCache: boolean;
  /** Overrides `<root>/.codeviz/cache`. */
  readonly cacheDir?: string;
  readonly respectGitignore: boolean;
  readonly maxFileSizeBytes: number;
  readonly parseTimeoutMs: number;
  /** Number of files processed at once. */
  readonly concurrency: number;
}

/**
 * Validate caller input and fill in defaults.
 * @throws {ConfigurationError} if any option has the wrong shape
 */
export function createAnalysisConfig(input: AnalysisConfigInput = {}): AnalysisConfig {
  const result = AnalysisConfigSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".") || "config"}: ${issue.message}`)
      .join("; ");
    throw new ConfigurationError(`Invalid analysis config: ${issues}`);
  }

  const { concurrency, cacheDir, excludePatterns, ...rest } = result.data;
  return Object.freeze({
    ...rest,
    ...(cacheDir !== undefined ? { cacheDir } : {}),
    excludePatterns: Object.freeze([...excludePatterns]),
    concurrency: concurrency ?? defaultConcurrency(),
  });
}

export function defaultConcurrency(): number {
  return Math.max(1, os.availableParallelism());
}

/**
 * Cache directory for a run: the configured one, or `<root>/.codeviz/cache`.
 */
export function resolveCacheDir(root: string, config: Pick<AnalysisConfig, "cacheDir">): string {
  return config.cacheDir !== undefined
    ? path.resolve(config.cacheDir)
    : path.join(path.resolve(root), STATE_DIR_NAME, "cache");
}
