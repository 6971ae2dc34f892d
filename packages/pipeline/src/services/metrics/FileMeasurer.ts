import type { FileMetrics } from "@codeviz/common";
import { calculateMetrics } from "./MetricsCalculator";
import type { ParserRegistry } from "../parsers/ParserRegistry";

export interface MeasureRequest {
  path: string;
  source: string;
  language: string;
  lastModified: number;
}

/**
 * Where the measure stage runs: on the calling thread or in worker threads.
 */
export interface FileMeasurer {
  /**
   * @throws {MetricsError} when the file cannot be parsed or measured in time
   * @throws {UnsupportedLanguageError} when no parser handles `language`
   */
  measure(request: MeasureRequest): Promise<FileMetrics>;
  close(): Promise<void>;
}

export class InProcessMeasurer implements FileMeasurer {
  constructor(private readonly registry: ParserRegistry) {}

  async measure({ path, source, language, lastModified }: MeasureRequest): Promise<FileMetrics> {
    return calculateMetrics(path, source, this.registry.getParser(language), lastModified);
  }

  async close(): Promise<void> {
    // nothing held
  }
}
