import { z } from "zod";

/** Runtime shape of FileMetrics for values crossing a process or storage boundary. */
export const FileMetricsSchema = z.object({
  path: z.string(),
  language: z.string(),
  loc: z.number().int().nonnegative(),
  sizeBytes: z.number().int().nonnegative(),
  functionCount: z.number().int().nonnegative(),
  lastModified: z.number(),
});
