import Go from "tree-sitter-go";
import JavaScript from "tree-sitter-javascript";
import Python from "tree-sitter-python";
import Rust from "tree-sitter-rust";
import TypeScript from "tree-sitter-typescript";
import type { LanguageDescriptor } from "./LanguageParser";

const ECMASCRIPT_FUNCTIONS = `
[
  (function_declaration)
  (arrow_function)
  (method_definition)
] @function
`;

const COMMENT = "(comment) @comment";

/**
 * Languages known to the default registry. A new language is one more entry
 * here plus its grammar package.
 */
export const BUILTIN_LANGUAGES: readonly LanguageDescriptor[] = [
  {
    language: "typescript",
    extensions: [".ts", ".mts", ".cts"],
    aliases: ["ts"],
    grammar: TypeScript.typescript,
    commentQuery: COMMENT,
    functionQuery: ECMASCRIPT_FUNCTIONS,
  },
  {
    language: "tsx",
    extensions: [".tsx"],
    grammar: TypeScript.tsx,
    commentQuery: COMMENT,
    functionQuery: ECMASCRIPT_FUNCTIONS,
  },
  {
    language: "javascript",
    extensions: [".js", ".jsx", ".mjs", ".cjs"],
    aliases: ["js", "jsx"],
    grammar: JavaScript,
    commentQuery: COMMENT,
    functionQuery: ECMASCRIPT_FUNCTIONS,
  },
  {
    language: "python",
    extensions: [".py"],
    aliases: ["py"],
    grammar: Python,
    commentQuery: COMMENT,
    functionQuery: "(function_definition) @function",
  },
  {
    language: "go",
    extensions: [".go"],
    aliases: ["golang"],
    grammar: Go,
    commentQuery: COMMENT,
    functionQuery: `
[
  (function_declaration)
  (method_declaration)
  (func_literal)
] @function
`,
  },
  {
    language: "rust",
    extensions: [".rs"],
    aliases: ["rs"],
    grammar: Rust,
    commentQuery: "[(line_comment) (block_comment)] @comment",
    functionQuery: "(function_item) @function",
  },
];
