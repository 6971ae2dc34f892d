/**
 * In-memory directory node produced by rolling file metrics up the path
 * hierarchy. Metrics are cumulative over the whole subtree.
 */
export interface DirectoryTreeNode {
  id: string;
  name: string;
  /** Root-relative directory path; "" for the root. */
  path: string;
  parentId: string | null;
  loc: number;
  functionCount: number;
  sizeBytes: number;
  fileCount: number;
  children: DirectoryTreeNode[];
  /** Paths of the files sitting directly in this directory. */
  files: string[];
}
