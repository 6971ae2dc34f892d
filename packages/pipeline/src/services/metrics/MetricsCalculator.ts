import { Buffer } from "node:buffer";
import { MetricsError, ParseError, ParseTimeoutError, type FileMetrics } from "@codeviz/common";
import type { CommentRange, LanguageParser, SyntaxTree } from "../parsers/LanguageParser";

/**
 * Measure one file. No I/O: the caller reads the file and captures its mtime.
 *
 * @throws {MetricsError} when the parser cannot produce a tree
 */
export function calculateMetrics(
  path: string,
  source: string,
  parser: LanguageParser,
  lastModified: number,
): FileMetrics {
  let tree: SyntaxTree;
  try {
    tree = parser.parse(source);
  } catch (error) {
    if (error instanceof ParseTimeoutError) {
      throw new MetricsError(path, "parse_timeout", { cause: error });
    }
    throw new MetricsError(path, "parse_failed", {
      cause: error instanceof ParseError ? error : new ParseError(parser.language, String(error), { cause: error }),
    });
  }

  let commentRanges: CommentRange[];
  let functionCount: number;
  try {
    commentRanges = parser.commentRanges(tree);
    functionCount = parser.functionCount(tree);
  } catch (error) {
    throw new MetricsError(path, "parse_failed", { cause: error });
  }

  return {
    path,
    language: parser.language,
    loc: countLinesOfCode(source, commentRanges),
    sizeBytes: Buffer.byteLength(source, "utf8"),
    functionCount,
    lastModified,
  };
}

type Interval = [start: number, end: number];

/**
 * Lines with at least one non-whitespace character outside every comment.
 * A trailing comment after code still counts the line; lines inside a block
 * comment never do.
 */
export function countLinesOfCode(source: string, commentRanges: readonly CommentRange[]): number {
  if (source === "") return 0;

  const covered = new Map<number, Interval[]>();
  const cover = (row: number, start: number, end: number): void => {
    if (end <= start) return;
    const list = covered.get(row);
    if (list) list.push([start, end]);
    else covered.set(row, [[start, end]]);
  };

  for (const range of commentRanges) {
    if (range.startRow === range.endRow) {
      cover(range.startRow, range.startColumn, range.endColumn);
      continue;
    }
    cover(range.startRow, range.startColumn, Infinity);
    for (let row = range.startRow + 1; row < range.endRow; row++) {
      cover(row, 0, Infinity);
    }
    cover(range.endRow, 0, range.endColumn);
  }

  const lines = source.split("\n");
  let loc = 0;
  for (let row = 0; row < lines.length; row++) {
    if (hasCode(lines[row], covered.get(row))) loc++;
  }
  return loc;
}

function hasCode(line: string, intervals: readonly Interval[] | undefined): boolean {
  for (let column = 0; column < line.length; column++) {
    if (/\s/.test(line[column])) continue;
    if (intervals && intervals.some(([start, end]) => column >= start && column < end)) continue;
    return true;
  }
  return false;
}
