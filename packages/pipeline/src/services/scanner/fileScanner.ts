import type { Dirent, Stats } from "node:fs";
import { join, extname, resolve } from "node:path";
import {
  DEFAULT_MAX_FILE_SIZE_BYTES,
  NotADirectoryError,
  RootNotFoundError,
  createSilentLogger,
  describeError,
  isPermissionError,
  type AnalysisWarning,
  type Logger,
} from "@codeviz/common";
import { compileGlobs, matchesAny } from "./globPattern";
import { GitignoreRules, isGitignored } from "./gitignore";
import { nodeFileSystem, type FileSystem } from "../../utils/fileSystem";

export interface ScanOptions {
  excludePatterns: readonly string[];
  /** Lower-case extensions, dot included, e.g. ".ts". */
  extensions: ReadonlySet<string>;
  maxFileSizeBytes?: number;
  respectGitignore?: boolean;
  logger?: Logger;
  fileSystem?: FileSystem;
}

export interface ScanResult {
  /** Root-relative, `/`-separated, sorted. */
  files: string[];
  warnings: AnalysisWarning[];
  skipped: {
    excluded: number;
    gitignored: number;
    tooLarge: number;
    unreadable: number;
  };
}

/**
 * Recursively collect source files under `root`.
 *
 * Excluded and gitignored directories are pruned before they are opened.
 * Symlinks and hidden entries are never followed. Unreadable entries and
 * oversized files become warnings; only configuration problems reject.
 *
 * @throws {InvalidPatternError} for a malformed exclude pattern
 * @throws {RootNotFoundError | NotADirectoryError} for a bad root
 */
export async function scanDirectory(root: string, options: ScanOptions): Promise<ScanResult> {
  const {
    extensions,
    maxFileSizeBytes = DEFAULT_MAX_FILE_SIZE_BYTES,
    respectGitignore = true,
    logger = createSilentLogger(),
    fileSystem = nodeFileSystem,
  } = options;

  const excludeGlobs = compileGlobs(options.excludePatterns);
  const rootPath = resolve(root);
  await assertDirectory(fileSystem, rootPath);

  logger.info(`Scanning ${rootPath} (${excludeGlobs.length} exclude patterns)`);

  const files: string[] = [];
  const warnings: AnalysisWarning[] = [];
  const skipped = { excluded: 0, gitignored: 0, tooLarge: 0, unreadable: 0 };

  async function walk(absDir: string, relDir: string, ignoreStack: readonly GitignoreRules[]): Promise<void> {
    let entries: Dirent[];
    try {
      entries = await fileSystem.readdir(absDir);
    } catch (error) {
      skipped.unreadable++;
      warnings.push({
        path: relDir || ".",
        kind: isPermissionError(error) ? "permission_denied" : "read_failed",
        message: `Cannot read directory: ${describeError(error)}`,
      });
      logger.warn(`Cannot read directory ${relDir || "."}: ${describeError(error)}`);
      return;
    }

    let stack = ignoreStack;
    if (respectGitignore && entries.some((entry) => entry.name === ".gitignore" && entry.isFile())) {
      const rules = await GitignoreRules.load(absDir, relDir, logger);
      if (rules && rules.size > 0) stack = [...ignoreStack, rules];
    }

    for (const entry of entries) {
      // hidden files and directories, .gitignore included
      if (entry.name.startsWith(".")) continue;
      if (entry.isSymbolicLink()) continue;

      const relPath = relDir ? `${relDir}/${entry.name}` : entry.name;
      const absPath = join(absDir, entry.name);

      if (entry.isDirectory()) {
        if (matchesAny(excludeGlobs, relPath)) {
          logger.debug(`Excluded directory ${relPath}`);
          skipped.excluded++;
          continue;
        }
        if (isGitignored(stack, relPath, true)) {
          logger.debug(`Gitignored directory ${relPath}`);
          skipped.gitignored++;
          continue;
        }
        await walk(absPath, relPath, stack);
        continue;
      }

      if (!entry.isFile()) continue;
      if (!extensions.has(extname(entry.name).toLowerCase())) continue;

      if (matchesAny(excludeGlobs, relPath)) {
        skipped.excluded++;
        continue;
      }
      if (isGitignored(stack, relPath, false)) {
        skipped.gitignored++;
        continue;
      }

      try {
        const stats = await fileSystem.stat(absPath);
        if (stats.size > maxFileSizeBytes) {
          skipped.tooLarge++;
          const sizeMb = (stats.size / (1024 * 1024)).toFixed(1);
          warnings.push({
            path: relPath,
            kind: "file_too_large",
            message: `Skipping large file (${sizeMb}MB, limit ${maxFileSizeBytes} bytes)`,
          });
          logger.warn(`Skipping large file: ${relPath} (${sizeMb}MB)`);
          continue;
        }
      } catch (error) {
        skipped.unreadable++;
        warnings.push({
          path: relPath,
          kind: isPermissionError(error) ? "permission_denied" : "read_failed",
          message: `Cannot stat file: ${describeError(error)}`,
        });
        logger.warn(`Cannot stat ${relPath}: ${describeError(error)}`);
        continue;
      }

      files.push(relPath);
    }
  }

  await walk(rootPath, "", []);

  // parallel processing downstream relies on this order
  files.sort(comparePaths);

  logger.info(
    `Scan completed: ${files.length} files (excluded ${skipped.excluded}, gitignored ${skipped.gitignored}, ` +
      `too large ${skipped.tooLarge}, unreadable ${skipped.unreadable})`,
  );

  return { files, warnings, skipped };
}

/** Code-unit order, independent of locale. */
export function comparePaths(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

async function assertDirectory(fileSystem: FileSystem, rootPath: string): Promise<void> {
  let stats: Stats;
  try {
    stats = await fileSystem.stat(rootPath);
  } catch {
    throw new RootNotFoundError(rootPath);
  }
  if (!stats.isDirectory()) {
    throw new NotADirectoryError(rootPath);
  }
}
