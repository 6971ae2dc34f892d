import { readFile } from "node:fs/promises";
import { join } from "node:path";
import { describeError, errorCode, type Logger } from "@codeviz/common";
import { compileGlob, type CompiledGlob } from "./globPattern";

interface IgnoreRule {
  glob: CompiledGlob;
  negated: boolean;
  directoryOnly: boolean;
}

/**
 * Rules of a single .gitignore file, scoped to the directory holding it.
 */
export class GitignoreRules {
  private constructor(
    /** Root-relative directory of the .gitignore; "" for the root. */
    readonly baseDir: string,
    private readonly rules: IgnoreRule[],
  ) {}

  get size(): number {
    return this.rules.length;
  }

  /**
   * Read `<absDir>/.gitignore`. Returns null when the file is missing or
   * unreadable.
   */
  static async load(absDir: string, baseDir: string, logger: Logger): Promise<GitignoreRules | null> {
    let content: string;
    try {
      content = await readFile(join(absDir, ".gitignore"), "utf-8");
    } catch (error) {
      if (errorCode(error) !== "ENOENT") {
        logger.debug(`Could not read ${join(absDir, ".gitignore")}: ${describeError(error)}`);
      }
      return null;
    }
    return GitignoreRules.parse(content, baseDir, logger);
  }

  static parse(content: string, baseDir: string, logger: Logger): GitignoreRules {
    const rules: IgnoreRule[] = [];

    for (const rawLine of content.split(/\r?\n/)) {
      let line = rawLine.trimEnd();
      if (!line || line.startsWith("#")) continue; // Remove comments and empty lines

      let negated = false;
      if (line.startsWith("!")) {
        negated = true;
        line = line.slice(1);
      } else if (line.startsWith("\\#") || line.startsWith("\\!")) {
        line = line.slice(1);
      }

      let directoryOnly = false;
      if (line.endsWith("/")) {
        directoryOnly = true;
        line = line.slice(0, -1);
      }
      if (!line) continue;

      // patterns without an inner slash match at any depth
      const anchored = line.includes("/");
      const pattern = anchored ? line.replace(/^\//, "") : `**/${line}`;

      try {
        rules.push({ glob: compileGlob(pattern), negated, directoryOnly });
      } catch (error) {
        logger.debug(`Skipping .gitignore rule "${rawLine}" in "${baseDir || "."}": ${describeError(error)}`);
      }
    }

    return new GitignoreRules(baseDir, rules);
  }

  /**
   * Verdict of this file for a root-relative path: true = ignored,
   * false = re-included by a negation, undefined = no rule applies.
   * The last matching rule wins.
   */
  match(relativePath: string, isDirectory: boolean): boolean | undefined {
    const local = this.toLocalPath(relativePath);
    if (local === null) return undefined;

    let verdict: boolean | undefined;
    for (const rule of this.rules) {
      if (rule.directoryOnly && !isDirectory) continue;
      if (rule.glob.matches(local)) {
        verdict = !rule.negated;
      }
    }
    return verdict;
  }

  private toLocalPath(relativePath: string): string | null {
    if (this.baseDir === "") return relativePath;
    const prefix = `${this.baseDir}/`;
    return relativePath.startsWith(prefix) ? relativePath.slice(prefix.length) : null;
  }
}

/**
 * Check a path against the .gitignore files on its way from the root.
 * Deeper files take precedence over shallower ones.
 */
export function isGitignored(
  stack: readonly GitignoreRules[],
  relativePath: string,
  isDirectory: boolean,
): boolean {
  for (let i = stack.length - 1; i >= 0; i--) {
    const verdict = stack[i].match(relativePath, isDirectory);
    if (verdict !== undefined) return verdict;
  }
  return false;
}
