import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { nodeFileSystem, type FileSystem } from "../../src/utils/fileSystem";

export function makeTempDir(prefix = "codeviz-test-"): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function removeDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

/** Write `files` (relative path → contents) under `root`, creating directories. */
export function writeTree(root: string, files: Record<string, string | Buffer>): void {
  for (const [relPath, contents] of Object.entries(files)) {
    const absPath = path.join(root, relPath);
    fs.mkdirSync(path.dirname(absPath), { recursive: true });
    fs.writeFileSync(absPath, contents);
  }
}

/**
 * The real filesystem, except that every call on one of `deniedPaths`
 * (absolute) fails with EACCES.
 */
export function denyingFileSystem(deniedPaths: readonly string[]): FileSystem {
  const denied = new Set(deniedPaths);
  const check = (target: string): void => {
    if (denied.has(target)) {
      throw Object.assign(new Error(`EACCES: permission denied, open '${target}'`), { code: "EACCES" });
    }
  };
  return {
    readdir: async (absDir) => {
      check(absDir);
      return nodeFileSystem.readdir(absDir);
    },
    stat: async (absPath) => {
      check(absPath);
      return nodeFileSystem.stat(absPath);
    },
    readFile: async (absPath) => {
      check(absPath);
      return nodeFileSystem.readFile(absPath);
    },
  };
}
