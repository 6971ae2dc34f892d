export * from "./MetricsCacheEntry";
export * from "./Directory";
