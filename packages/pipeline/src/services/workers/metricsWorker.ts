import { parentPort, workerData } from "node:worker_threads";
import { MetricsError, UnsupportedLanguageError, describeError } from "@codeviz/common";
import { calculateMetrics } from "../metrics/MetricsCalculator";
import { ParserRegistry } from "../parsers/ParserRegistry";
import { MeasureTaskSchema, WorkerSettingsSchema, type TaskReply, type WorkerReply } from "./protocol";

// Worker thread entry. Each thread builds its own parsers; tree-sitter
// state never crosses threads.

const port = parentPort;
if (!port) {
  throw new Error("metricsWorker must be started as a worker thread");
}

const { parseTimeoutMs } = WorkerSettingsSchema.parse(workerData);
const registry = new ParserRegistry({ parseTimeoutMs });

function measure(message: unknown): TaskReply {
  const task = MeasureTaskSchema.parse(message);
  try {
    const parser = registry.getParser(task.language);
    return {
      type: "metrics",
      id: task.id,
      metrics: calculateMetrics(task.path, task.source, parser, task.lastModified),
    };
  } catch (error) {
    if (error instanceof UnsupportedLanguageError) {
      return { type: "failure", id: task.id, kind: "unsupported_language", message: error.message };
    }
    if (error instanceof MetricsError) {
      return { type: "failure", id: task.id, kind: error.reason, message: describeError(error.cause) };
    }
    return { type: "failure", id: task.id, kind: "parse_failed", message: describeError(error) };
  }
}

port.on("message", (message: unknown) => {
  port.postMessage(measure(message));
});

const ready: WorkerReply = { type: "ready" };
port.postMessage(ready);
