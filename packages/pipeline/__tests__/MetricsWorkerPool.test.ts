import { CodeVizError, MetricsError, UnsupportedLanguageError } from "@codeviz/common";
import { calculateMetrics } from "../src/services/metrics/MetricsCalculator";
import { ParserRegistry } from "../src/services/parsers/ParserRegistry";
import { MetricsWorkerPool } from "../src/services/workers/MetricsWorkerPool";

describe("MetricsWorkerPool", () => {
  let pool: MetricsWorkerPool;

  beforeAll(async () => {
    pool = await MetricsWorkerPool.start({ size: 2, parseTimeoutMs: 5000 });
  });

  afterAll(async () => {
    await pool.close();
  });

  test("starts the requested number of workers", () => {
    expect(pool.size).toBe(2);
  });

  test("measures exactly as the calling thread does", async () => {
    const registry = new ParserRegistry();
    const sources = [
      { path: "a.ts", language: "typescript", source: "// c\nfunction f() {}\nconst g = () => 1;\n" },
      { path: "b.py", language: "python", source: "def f():\n    # note\n    return 1\n" },
      { path: "c.rs", language: "rust", source: "/* doc */\nfn main() {}\n" },
    ];

    const measured = await Promise.all(
      sources.map(({ path, language, source }) => pool.measure({ path, language, source, lastModified: 7 })),
    );

    expect(measured).toEqual(
      sources.map(({ path, language, source }) =>
        calculateMetrics(path, source, registry.getParser(language), 7),
      ),
    );
  });

  test("rejects an unknown language with UnsupportedLanguageError", async () => {
    await expect(
      pool.measure({ path: "x.cob", language: "cobol", source: "", lastModified: 0 }),
    ).rejects.toBeInstanceOf(UnsupportedLanguageError);
  });

  test("keeps serving after a failed task", async () => {
    await expect(pool.measure({ path: "x.cob", language: "cobol", source: "", lastModified: 0 })).rejects.toThrow();

    await expect(
      pool.measure({ path: "ok.js", language: "javascript", source: "function ok() {}\n", lastModified: 1 }),
    ).resolves.toMatchObject({ path: "ok.js", loc: 1, functionCount: 1 });
  });
});

describe("MetricsWorkerPool timeouts", () => {
  test("reports an engine-cancelled parse as parse_timeout", async () => {
    const pool = await MetricsWorkerPool.start({ size: 1, parseTimeoutMs: 1, taskTimeoutMs: 20_000 });
    const huge = Array.from({ length: 100_000 }, (_, i) => `function f${i}(a, b) { return a + b * ${i}; }`).join("\n");

    try {
      const failure = pool.measure({ path: "huge.js", language: "javascript", source: huge, lastModified: 0 });

      await expect(failure).rejects.toBeInstanceOf(MetricsError);
      await expect(failure).rejects.toMatchObject({
        reason: "parse_timeout",
        message: "Metrics calculation failed for huge.js: Tree-sitter parse failed (javascript): parse cancelled after 1ms",
      });
    } finally {
      await pool.close();
    }
  });

  test("replaces a worker that overruns its task and fails only that task", async () => {
    const pool = await MetricsWorkerPool.start({ size: 1, parseTimeoutMs: 60_000, taskTimeoutMs: 250 });
    const huge = Array.from({ length: 300_000 }, (_, i) => `function f${i}(a, b) { return a + b * ${i}; }`).join("\n");

    try {
      const overrun = pool.measure({ path: "huge.js", language: "javascript", source: huge, lastModified: 0 });
      const next = pool.measure({ path: "small.js", language: "javascript", source: "function s() {}\n", lastModified: 0 });

      await expect(overrun).rejects.toMatchObject({
        reason: "parse_timeout",
        message: "Metrics calculation failed for huge.js: Measuring huge.js timed out after 250ms",
      });
      await expect(next).resolves.toMatchObject({ path: "small.js", functionCount: 1 });
      expect(pool.size).toBe(1);
    } finally {
      await pool.close();
    }
  });

  test("refuses work once closed", async () => {
    const pool = await MetricsWorkerPool.start({ size: 1, parseTimeoutMs: 1000 });
    await pool.close();

    await expect(
      pool.measure({ path: "a.js", language: "javascript", source: "", lastModified: 0 }),
    ).rejects.toBeInstanceOf(CodeVizError);
  });
});
