import { InvalidPatternError } from "@codeviz/common";
import { compileGlob, matchesAny, compileGlobs } from "../src/services/scanner/globPattern";

describe("compileGlob", () => {
  test("**/dir/** matches the directory itself and anything below it at any depth", () => {
    const glob = compileGlob("**/node_modules/**");

    expect(glob.matches("node_modules")).toBe(true);
    expect(glob.matches("a/node_modules")).toBe(true);
    expect(glob.matches("a/node_modules/pkg/index.js")).toBe(true);
    expect(glob.matches("node_modulesx/a.js")).toBe(false);
    expect(glob.matches("src/my_node_modules/a.js")).toBe(false);
  });

  test("single star stays within one path segment", () => {
    const glob = compileGlob("*.ts");

    expect(glob.matches("a.ts")).toBe(true);
    expect(glob.matches("src/a.ts")).toBe(false);
  });

  test("double star in the middle spans zero or more directories", () => {
    const glob = compileGlob("src/**/*.test.ts");

    expect(glob.matches("src/a.test.ts")).toBe(true);
    expect(glob.matches("src/x/y/a.test.ts")).toBe(true);
    expect(glob.matches("lib/a.test.ts")).toBe(false);
  });

  test("question mark matches exactly one character", () => {
    const glob = compileGlob("file?.js");

    expect(glob.matches("file1.js")).toBe(true);
    expect(glob.matches("file.js")).toBe(false);
    expect(glob.matches("file12.js")).toBe(false);
  });

  test("alternation and character classes", () => {
    expect(compileGlob("{a,b}.ts").matches("b.ts")).toBe(true);
    expect(compileGlob("{a,b}.ts").matches("c.ts")).toBe(false);
    expect(compileGlob("[abc].ts").matches("b.ts")).toBe(true);
    expect(compileGlob("[!abc].ts").matches("d.ts")).toBe(true);
    expect(compileGlob("[!abc].ts").matches("a.ts")).toBe(false);
  });

  test("dots are literal", () => {
    expect(compileGlob("a.ts").matches("abts")).toBe(false);
  });

  test("leading ./ and / are ignored", () => {
    expect(compileGlob("./src/**").matches("src")).toBe(true);
    expect(compileGlob("/src/**").matches("src/a.ts")).toBe(true);
  });

  test("repeated double-star segments collapse into one", () => {
    const everything = compileGlob("**/**");
    expect(everything.matches("a.ts")).toBe(true);
    expect(everything.matches("x/y/z.ts")).toBe(true);

    const generated = compileGlob("gen/**/**");
    expect(generated.matches("gen")).toBe(true);
    expect(generated.matches("gen/a/b.ts")).toBe(true);
    expect(generated.matches("general/a.ts")).toBe(false);

    expect(compileGlob("a/**/**/b/**").matches("a/x/b/c.ts")).toBe(true);
  });

  test("a trailing slash names the directory", () => {
    const glob = compileGlob("excluded/");

    expect(glob.matches("excluded")).toBe(true);
    expect(glob.matches("excludedx")).toBe(false);
    expect(compileGlob("build//").matches("build")).toBe(true);
  });

  test.each([
    ["", "pattern is empty"],
    ["/", "pattern is empty"],
    ["{a,b", "unclosed alternation group"],
    ["a}", "unopened alternation group"],
    ["{a,{b}}", "nested alternation groups are not allowed"],
    ["[ab", "unclosed character class"],
    ["a\\", "dangling escape"],
  ])("rejects %j", (pattern, reason) => {
    expect(() => compileGlob(pattern)).toThrow(InvalidPatternError);
    expect(() => compileGlob(pattern)).toThrow(`Invalid exclude pattern "${pattern}": ${reason}`);
  });
});

describe("matchesAny", () => {
  test("is true when any compiled pattern matches", () => {
    const globs = compileGlobs(["**/dist/**", "*.gen.ts"]);

    expect(matchesAny(globs, "pkg/dist/index.js")).toBe(true);
    expect(matchesAny(globs, "api.gen.ts")).toBe(true);
    expect(matchesAny(globs, "src/api.ts")).toBe(false);
    expect(matchesAny([], "anything")).toBe(false);
  });
});
