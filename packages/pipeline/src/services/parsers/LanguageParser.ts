import Parser from "tree-sitter";
import { ParseError, ParseTimeoutError, DEFAULT_PARSE_TIMEOUT_MS } from "@codeviz/common";

export type SyntaxTree = Parser.Tree;

/**
 * Span of a comment node. Rows are zero-based, columns are UTF-16 offsets
 * into the row, end column exclusive.
 */
export interface CommentRange {
  startRow: number;
  startColumn: number;
  endRow: number;
  endColumn: number;
}

/**
 * Per-language capability used by the metrics calculator. Implementations
 * must tolerate syntax errors in `parse` and only throw when no tree can be
 * produced at all.
 */
export interface LanguageParser {
  readonly language: string;
  readonly extensions: readonly string[];
  /** Alternative names accepted by the registry, e.g. "ts". */
  readonly aliases?: readonly string[];
  parse(source: string): SyntaxTree;
  commentRanges(tree: SyntaxTree): CommentRange[];
  functionCount(tree: SyntaxTree): number;
}

export interface LanguageDescriptor {
  language: string;
  extensions: readonly string[];
  aliases?: readonly string[];
  /** Grammar object exported by a tree-sitter-<lang> package. */
  grammar: unknown;
  /** Query capturing comment nodes as @comment. */
  commentQuery: string;
  /** Query capturing function-like nodes as @function. */
  functionQuery: string;
}

export interface TreeSitterParserOptions {
  parseTimeoutMs?: number;
}

// Characters handed to tree-sitter per read callback
const READ_CHUNK = 8 * 1024;

/**
 * tree-sitter backed LanguageParser. The native parser and both queries are
 * built on first use and then reused for every file of the language.
 */
export class TreeSitterLanguageParser implements LanguageParser {
  private parser: Parser | null = null;
  private commentQuery: Parser.Query | null = null;
  private functionQuery: Parser.Query | null = null;
  private readonly timeoutMs: number;

  constructor(
    private readonly descriptor: LanguageDescriptor,
    options: TreeSitterParserOptions = {},
  ) {
    this.timeoutMs = options.parseTimeoutMs ?? DEFAULT_PARSE_TIMEOUT_MS;
  }

  get language(): string {
    return this.descriptor.language;
  }

  get extensions(): readonly string[] {
    return this.descriptor.extensions;
  }

  get aliases(): readonly string[] {
    return this.descriptor.aliases ?? [];
  }

  parse(source: string): SyntaxTree {
    const parser = this.getParser();

    // declared nullable: the binding hands back null when the timeout cancels a parse
    let tree: Parser.Tree | null | undefined;
    try {
      tree = parser.parse((index: number) =>
        index < source.length ? source.slice(index, index + READ_CHUNK) : "",
      );
    } catch (error) {
      parser.reset();
      throw new ParseError(this.language, error instanceof Error ? error.message : String(error), {
        cause: error,
      });
    }

    if (!tree) {
      parser.reset();
      throw new ParseTimeoutError(this.language, this.timeoutMs);
    }
    return tree;
  }

  commentRanges(tree: SyntaxTree): CommentRange[] {
    return this.getQueries()
      .comments.captures(tree.rootNode)
      .filter((capture) => capture.name === "comment")
      .map(({ node }) => ({
        startRow: node.startPosition.row,
        startColumn: node.startPosition.column,
        endRow: node.endPosition.row,
        endColumn: node.endPosition.column,
      }));
  }

  functionCount(tree: SyntaxTree): number {
    return this.getQueries()
      .functions.captures(tree.rootNode)
      .filter((capture) => capture.name === "function").length;
  }

  private getParser(): Parser {
    if (!this.parser) {
      const parser = new Parser();
      try {
        parser.setLanguage(this.descriptor.grammar);
      } catch (error) {
        throw new ParseError(this.language, "grammar could not be loaded", { cause: error });
      }
      parser.setTimeoutMicros(this.timeoutMs * 1000);
      this.parser = parser;
    }
    return this.parser;
  }

  private getQueries(): { comments: Parser.Query; functions: Parser.Query } {
    if (!this.commentQuery || !this.functionQuery) {
      const { grammar, commentQuery, functionQuery } = this.descriptor;
      try {
        this.commentQuery = new Parser.Query(grammar, commentQuery);
        this.functionQuery = new Parser.Query(grammar, functionQuery);
      } catch (error) {
        throw new ParseError(this.language, "invalid query", { cause: error });
      }
    }
    return { comments: this.commentQuery, functions: this.functionQuery };
  }
}
