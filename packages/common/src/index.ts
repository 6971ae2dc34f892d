/**
 * @codeviz/common
 * Shared models, configuration, errors and logging for the codeviz engine.
 */

export * from "./types/FileMetrics";
export * from "./types/FileMetricsSchema";
export * from "./models";
export * from "./errors";
export * from "./logger";
export * from "./config";
