import { posix } from "node:path";
import { createHash } from "node:crypto";
import { CodeVizError, type DirectoryTreeNode, type FileMetrics } from "@codeviz/common";
import { comparePaths } from "./scanner/fileScanner";

const ROOT_ID = "root";

/**
 * Rolls per-file metrics up the directory hierarchy so front ends can render
 * a repository as nested boxes.
 */
export class DirectoryTreeService {
  /**
   * Build the directory tree for `files`. Every node carries the totals of
   * its whole subtree; children and files are sorted by name.
   */
  buildTree(files: readonly FileMetrics[]): DirectoryTreeNode {
    const root = createNode(ROOT_ID, "", "", null);
    const nodeMap = new Map<string, DirectoryTreeNode>([["", root]]);
    const byPath = new Map(files.map((file) => [file.path, file]));

    for (const file of files) {
      const dirPath = parentPath(file.path);
      const dir = this.ensureDirectoryPath(dirPath, nodeMap);
      dir.files.push(file.path);
    }

    this.rollUp(root, byPath);
    return root;
  }

  private ensureDirectoryPath(dirPath: string, nodeMap: Map<string, DirectoryTreeNode>): DirectoryTreeNode {
    const existing = nodeMap.get(dirPath);
    if (existing) return existing;

    const parent = this.ensureDirectoryPath(parentPath(dirPath), nodeMap);
    const node = createNode(generateDirId(dirPath), posix.basename(dirPath), dirPath, parent.id);
    nodeMap.set(dirPath, node);
    parent.children.push(node);
    return node;
  }

  // post-order: children first, then the files sitting in this directory
  private rollUp(node: DirectoryTreeNode, byPath: ReadonlyMap<string, FileMetrics>): void {
    node.children.sort((a, b) => comparePaths(a.name, b.name));
    node.files.sort(comparePaths);

    for (const child of node.children) {
      this.rollUp(child, byPath);
      node.loc += child.loc;
      node.functionCount += child.functionCount;
      node.sizeBytes += child.sizeBytes;
      node.fileCount += child.fileCount;
    }

    for (const filePath of node.files) {
      const file = byPath.get(filePath);
      if (!file) continue;
      node.loc += file.loc;
      node.functionCount += file.functionCount;
      node.sizeBytes += file.sizeBytes;
      node.fileCount += 1;
    }
  }

  /**
   * @throws {CodeVizError} when the tree does not hold exactly `expectedFileCount` files
   */
  validateTreeIntegrity(tree: DirectoryTreeNode, expectedFileCount: number): void {
    const actualFileCount = countFiles(tree);
    if (actualFileCount !== expectedFileCount) {
      throw new CodeVizError(
        `Tree integrity check failed: expected ${expectedFileCount} files, found ${actualFileCount}`,
      );
    }
  }

  /** Directory node at a root-relative path ("" is the root), or null. */
  findNode(tree: DirectoryTreeNode, dirPath: string): DirectoryTreeNode | null {
    const target = dirPath.replace(/^\.?\/+|\/+$/g, "");
    if (target === "" || target === ".") return tree;

    let node = tree;
    for (const segment of target.split("/")) {
      const child = node.children.find((candidate) => candidate.name === segment);
      if (!child) return null;
      node = child;
    }
    return node;
  }
}

function createNode(id: string, name: string, path: string, parentId: string | null): DirectoryTreeNode {
  return { id, name, path, parentId, loc: 0, functionCount: 0, sizeBytes: 0, fileCount: 0, children: [], files: [] };
}

function parentPath(path: string): string {
  const dir = posix.dirname(path);
  return dir === "." ? "" : dir;
}

/** Stable id derived from the directory path. */
function generateDirId(path: string): string {
  return createHash("sha256").update(path).digest("hex").substring(0, 16);
}

function countFiles(node: DirectoryTreeNode): number {
  return node.children.reduce((count, child) => count + countFiles(child), node.files.length);
}
