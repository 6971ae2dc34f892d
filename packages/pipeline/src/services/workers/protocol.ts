import { z } from "zod";
import { FileMetricsSchema } from "@codeviz/common";

/** Messages exchanged with metrics worker threads. Both ends validate. */

export const WorkerSettingsSchema = z.object({
  parseTimeoutMs: z.number().int().positive(),
});
export type WorkerSettings = z.infer<typeof WorkerSettingsSchema>;

export const MeasureTaskSchema = z.object({
  id: z.number().int().nonnegative(),
  path: z.string(),
  source: z.string(),
  language: z.string(),
  lastModified: z.number(),
});
export type MeasureTask = z.infer<typeof MeasureTaskSchema>;

export const WorkerReplySchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("ready") }),
  z.object({ type: z.literal("metrics"), id: z.number().int(), metrics: FileMetricsSchema }),
  z.object({
    type: z.literal("failure"),
    id: z.number().int(),
    kind: z.enum(["unsupported_language", "parse_failed", "parse_timeout"]),
    message: z.string(),
  }),
]);
export type WorkerReply = z.infer<typeof WorkerReplySchema>;
export type TaskReply = Exclude<WorkerReply, { type: "ready" }>;
