import { extname } from "node:path";
import { UnsupportedLanguageError } from "@codeviz/common";
import {
  TreeSitterLanguageParser,
  type LanguageDescriptor,
  type LanguageParser,
  type TreeSitterParserOptions,
} from "./LanguageParser";
import { BUILTIN_LANGUAGES } from "./languages";

export interface ParserRegistryOptions extends TreeSitterParserOptions {
  /** Descriptors to start from; defaults to the built-in languages. */
  languages?: readonly LanguageDescriptor[];
}

/**
 * Maps file extensions and language names to parsers. Owns one parser per
 * language; parsing is synchronous so an instance is never entered twice at
 * once.
 */
export class ParserRegistry {
  private readonly parsers = new Map<string, LanguageParser>();
  private readonly byName = new Map<string, string>();
  private readonly byExtension = new Map<string, string>();
  private readonly parserOptions: TreeSitterParserOptions;

  constructor(options: ParserRegistryOptions = {}) {
    this.parserOptions = { parseTimeoutMs: options.parseTimeoutMs };
    for (const descriptor of options.languages ?? BUILTIN_LANGUAGES) {
      this.registerLanguage(descriptor);
    }
  }

  registerLanguage(descriptor: LanguageDescriptor): void {
    this.registerParser(new TreeSitterLanguageParser(descriptor, this.parserOptions));
  }

  /**
   * Install a parser, replacing any earlier one for the same language,
   * extensions or aliases.
   */
  registerParser(parser: LanguageParser): void {
    const language = parser.language.toLowerCase();
    this.parsers.set(language, parser);
    this.byName.set(language, language);
    for (const alias of parser.aliases ?? []) {
      this.byName.set(alias.toLowerCase(), language);
    }
    for (const extension of parser.extensions) {
      this.byExtension.set(extension.toLowerCase(), language);
    }
  }

  /**
   * @throws {UnsupportedLanguageError} when neither a language nor an alias matches
   */
  getParser(language: string): LanguageParser {
    const name = this.byName.get(language.trim().toLowerCase());
    const parser = name === undefined ? undefined : this.parsers.get(name);
    if (!parser) {
      throw new UnsupportedLanguageError(language);
    }
    return parser;
  }

  /** Language tag for a path by its extension, or null. */
  detectLanguage(filePath: string): string | null {
    const extension = extname(filePath).toLowerCase();
    if (!extension) return null;
    return this.byExtension.get(extension) ?? null;
  }

  supportedExtensions(): ReadonlySet<string> {
    return new Set(this.byExtension.keys());
  }

  supportedLanguages(): string[] {
    return [...this.parsers.keys()].sort();
  }
}

let defaultRegistry: ParserRegistry | null = null;

/** Process-wide registry with the built-in languages. */
export function getDefaultRegistry(): ParserRegistry {
  if (!defaultRegistry) {
    defaultRegistry = new ParserRegistry();
  }
  return defaultRegistry;
}
