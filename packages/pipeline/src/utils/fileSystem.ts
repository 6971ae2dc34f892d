import type { Dirent, Stats } from "node:fs";
import { open, readdir, stat } from "node:fs/promises";

export interface FileContents {
  contents: Buffer;
  /** mtime observed on the same handle the contents were read from */
  mtimeMs: number;
}

/**
 * The filesystem calls made by the scan and measure stages. Absolute paths
 * throughout.
 */
export interface FileSystem {
  readdir(absDir: string): Promise<Dirent[]>;
  stat(absPath: string): Promise<Stats>;
  readFile(absPath: string): Promise<FileContents>;
}

export const nodeFileSystem: FileSystem = {
  readdir: (absDir) => readdir(absDir, { withFileTypes: true }),
  stat: (absPath) => stat(absPath),
  readFile: readWithMtime,
};

async function readWithMtime(absPath: string): Promise<FileContents> {
  const handle = await open(absPath, "r");
  try {
    const stats = await handle.stat();
    const contents = await handle.readFile();
    return { contents, mtimeMs: stats.mtimeMs };
  } finally {
    await handle.close();
  }
}
