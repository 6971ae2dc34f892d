import { InvalidPatternError } from "@codeviz/common";

/**
 * Glob pattern compiled to an anchored regular expression over
 * `/`-separated relative paths.
 *
 * `*` and `?` never cross a `/`, `**` spans any number of directories, and a
 * trailing `/**` also matches the directory itself so that `vendor/**` prunes
 * `vendor` before the walker descends into it.
 */
export interface CompiledGlob {
  readonly pattern: string;
  readonly regex: RegExp;
  matches(relativePath: string): boolean;
}

const REGEX_SPECIALS = new Set([".", "+", "^", "$", "(", ")", "|", "{", "}", "[", "]", "\\", "/", "*", "?"]);

// "**/" anywhere in a pattern: zero or more leading directories
const ANY_DIRECTORIES = "(?:.*/)?";

function escapeChar(char: string): string {
  return REGEX_SPECIALS.has(char) ? `\\${char}` : char;
}

/**
 * @throws {InvalidPatternError} on empty patterns, unclosed `[` or `{`,
 *   nested `{`, a stray `}` or a dangling `\`
 */
export function compileGlob(pattern: string): CompiledGlob {
  let source = pattern.trim();
  if (source.startsWith("./")) source = source.slice(2);
  else if (source.startsWith("/")) source = source.slice(1);
  // "dir/" names the directory itself
  source = source.replace(/\/+$/, "");
  if (source === "") {
    throw new InvalidPatternError(pattern, "pattern is empty");
  }

  let body = "";
  let inAlternation = false;
  let i = 0;

  while (i < source.length) {
    const char = source[i];

    if (char === "*") {
      let end = i;
      while (source[end] === "*") end++;
      const atSegmentStart = i === 0 || source[i - 1] === "/";
      const next = source[end];

      if (end - i >= 2 && atSegmentStart && (next === "/" || next === undefined)) {
        if (next === "/") {
          if (!body.endsWith(ANY_DIRECTORIES)) body += ANY_DIRECTORIES;
          i = end + 1;
        } else {
          // a trailing "**" absorbs any "**/" segments before it
          while (body.endsWith(ANY_DIRECTORIES)) body = body.slice(0, -ANY_DIRECTORIES.length);
          if (body === "") {
            body = ".*";
          } else if (body.endsWith("\\/")) {
            // "dir/**" matches dir itself and everything below it
            body = body.slice(0, -2) + "(?:/.*)?";
          } else {
            body += ".*";
          }
          i = end;
        }
      } else {
        body += "[^/]*";
        i = end;
      }
      continue;
    }

    if (char === "?") {
      body += "[^/]";
    } else if (char === "[") {
      const { classBody, next } = readCharacterClass(pattern, source, i);
      body += classBody;
      i = next;
      continue;
    } else if (char === "{") {
      if (inAlternation) {
        throw new InvalidPatternError(pattern, "nested alternation groups are not allowed");
      }
      inAlternation = true;
      body += "(?:";
    } else if (char === "}") {
      if (!inAlternation) {
        throw new InvalidPatternError(pattern, "unopened alternation group");
      }
      inAlternation = false;
      body += ")";
    } else if (char === "," && inAlternation) {
      body += "|";
    } else if (char === "\\") {
      const escaped = source[i + 1];
      if (escaped === undefined) {
        throw new InvalidPatternError(pattern, "dangling escape");
      }
      body += escapeChar(escaped);
      i += 2;
      continue;
    } else {
      body += escapeChar(char);
    }
    i++;
  }

  if (inAlternation) {
    throw new InvalidPatternError(pattern, "unclosed alternation group");
  }

  let regex: RegExp;
  try {
    regex = new RegExp(`^${body}$`);
  } catch (error) {
    throw new InvalidPatternError(pattern, error instanceof Error ? error.message : String(error));
  }
  return {
    pattern,
    regex,
    matches: (relativePath: string) => regex.test(relativePath),
  };
}

function readCharacterClass(
  pattern: string,
  source: string,
  start: number,
): { classBody: string; next: number } {
  let i = start + 1;
  let negated = false;
  if (source[i] === "!" || source[i] === "^") {
    negated = true;
    i++;
  }

  let members = "";
  // a "]" directly after the opening bracket is a literal member
  if (source[i] === "]") {
    members += "\\]";
    i++;
  }

  while (i < source.length && source[i] !== "]") {
    const char = source[i];
    if (char === "\\") {
      const escaped = source[i + 1];
      if (escaped === undefined) {
        throw new InvalidPatternError(pattern, "dangling escape");
      }
      members += `\\${escaped}`;
      i += 2;
      continue;
    }
    members += char === "-" ? "-" : escapeChar(char);
    i++;
  }

  if (i >= source.length) {
    throw new InvalidPatternError(pattern, "unclosed character class");
  }

  // a class never matches the path separator
  return { classBody: negated ? `[^/${members}]` : `(?!/)[${members}]`, next: i + 1 };
}

/**
 * Compiles every pattern up front so a bad one fails the run before any I/O.
 */
export function compileGlobs(patterns: readonly string[]): CompiledGlob[] {
  return patterns.map(compileGlob);
}

export function matchesAny(globs: readonly CompiledGlob[], relativePath: string): boolean {
  return globs.some((glob) => glob.matches(relativePath));
}
