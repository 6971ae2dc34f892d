import { extname, join } from "node:path";
import { Worker } from "node:worker_threads";
import {
  CodeVizError,
  MetricsError,
  TimeoutError,
  UnsupportedLanguageError,
  createSilentLogger,
  describeError,
  type FileMetrics,
  type Logger,
  type MetricsFailureReason,
} from "@codeviz/common";
import type { FileMeasurer, MeasureRequest } from "../metrics/FileMeasurer";
import { WorkerReplySchema, type MeasureTask, type TaskReply, type WorkerSettings } from "./protocol";

export interface MetricsWorkerPoolOptions {
  size: number;
  parseTimeoutMs: number;
  /**
   * Limit for one task, counted from the moment a worker picks it up.
   * Defaults to twice `parseTimeoutMs`.
   */
  taskTimeoutMs?: number;
  logger?: Logger;
}

interface PendingTask {
  id: number;
  request: MeasureRequest;
  resolve: (metrics: FileMetrics) => void;
  reject: (error: unknown) => void;
}

interface WorkerSlot {
  worker: Worker;
  task: PendingTask | null;
  timer: NodeJS.Timeout | null;
  ready: boolean;
  retired: boolean;
}

/**
 * Measures files on a fixed set of worker threads, one task per worker at a
 * time. A worker that crashes or overruns its task is terminated and
 * replaced; only the task it held fails.
 */
export class MetricsWorkerPool implements FileMeasurer {
  private readonly slots: WorkerSlot[] = [];
  private readonly starting = new Set<WorkerSlot>();
  private readonly queue: PendingTask[] = [];
  private readonly taskTimeoutMs: number;
  private readonly logger: Logger;
  private nextId = 0;
  private closed = false;

  private constructor(private readonly options: MetricsWorkerPoolOptions) {
    this.taskTimeoutMs = options.taskTimeoutMs ?? options.parseTimeoutMs * 2;
    this.logger = options.logger ?? createSilentLogger();
  }

  /**
   * Resolves once every worker has loaded its parsers.
   * @throws {CodeVizError} when a worker fails to start; none are left running
   */
  static async start(options: MetricsWorkerPoolOptions): Promise<MetricsWorkerPool> {
    const pool = new MetricsWorkerPool(options);
    try {
      await Promise.all(Array.from({ length: Math.max(1, options.size) }, () => pool.spawn()));
    } catch (error) {
      await pool.close();
      throw new CodeVizError(`Cannot start metrics workers: ${describeError(error)}`, { cause: error });
    }
    return pool;
  }

  get size(): number {
    return this.slots.length;
  }

  measure(request: MeasureRequest): Promise<FileMetrics> {
    if (this.closed) {
      return Promise.reject(new CodeVizError("Metrics worker pool is closed"));
    }
    return new Promise<FileMetrics>((resolve, reject) => {
      this.queue.push({ id: this.nextId++, request, resolve, reject });
      this.dispatch();
      this.failQueuedIfNoWorkers();
    });
  }

  async close(): Promise<void> {
    this.closed = true;
    const slots = [...this.slots, ...this.starting];
    this.slots.length = 0;
    this.starting.clear();

    const closedError = new CodeVizError("Metrics worker pool is closed");
    for (const slot of slots) {
      slot.retired = true;
      if (slot.timer) clearTimeout(slot.timer);
      slot.task?.reject(closedError);
      slot.task = null;
    }
    for (const task of this.queue.splice(0)) task.reject(closedError);

    await Promise.all(slots.map((slot) => slot.worker.terminate()));
  }

  private spawn(): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      const worker = createWorker({ parseTimeoutMs: this.options.parseTimeoutMs });
      const slot: WorkerSlot = { worker, task: null, timer: null, ready: false, retired: false };
      this.starting.add(slot);

      worker.on("message", (message: unknown) => {
        const reply = WorkerReplySchema.safeParse(message);
        if (!reply.success) {
          this.retire(slot, new CodeVizError("Unexpected message from metrics worker"), "parse_failed");
          return;
        }
        if (reply.data.type === "ready") {
          this.starting.delete(slot);
          if (slot.retired) return;
          slot.ready = true;
          this.slots.push(slot);
          resolve();
          this.dispatch();
          return;
        }
        this.settle(slot, reply.data);
      });

      worker.on("error", (error: Error) => {
        if (!slot.ready) {
          this.starting.delete(slot);
          reject(error);
          return;
        }
        this.retire(slot, error, "parse_failed");
      });

      worker.on("exit", (code: number) => {
        if (!slot.ready) {
          this.starting.delete(slot);
          reject(new CodeVizError(`Metrics worker exited with code ${code} before it was ready`));
          return;
        }
        this.retire(slot, new CodeVizError(`Metrics worker exited with code ${code}`), "parse_failed");
      });
    });
  }

  private dispatch(): void {
    for (const slot of this.slots) {
      if (slot.task) continue;
      const task = this.queue.shift();
      if (!task) return;

      slot.task = task;
      slot.timer = setTimeout(() => {
        const timeout = new TimeoutError(`Measuring ${task.request.path}`, this.taskTimeoutMs);
        this.logger.warn(`${timeout.message}; restarting its worker`);
        this.retire(slot, timeout, "parse_timeout");
      }, this.taskTimeoutMs);

      const message: MeasureTask = { id: task.id, ...task.request };
      slot.worker.postMessage(message);
    }
  }

  private settle(slot: WorkerSlot, reply: TaskReply): void {
    const task = slot.task;
    if (!task || task.id !== reply.id) return;
    if (slot.timer) clearTimeout(slot.timer);
    slot.timer = null;
    slot.task = null;

    if (reply.type === "metrics") {
      task.resolve(reply.metrics);
    } else if (reply.kind === "unsupported_language") {
      task.reject(new UnsupportedLanguageError(task.request.language));
    } else {
      task.reject(new MetricsError(task.request.path, reply.kind, { cause: new CodeVizError(reply.message) }));
    }
    this.dispatch();
  }

  /** Drop a worker that can no longer be trusted and start a replacement. */
  private retire(slot: WorkerSlot, error: unknown, reason: MetricsFailureReason): void {
    if (slot.retired) return;
    slot.retired = true;

    const index = this.slots.indexOf(slot);
    if (index !== -1) this.slots.splice(index, 1);
    if (slot.timer) clearTimeout(slot.timer);
    slot.timer = null;

    const task = slot.task;
    slot.task = null;
    if (task) task.reject(new MetricsError(task.request.path, reason, { cause: error }));

    slot.worker.terminate().catch((terminateError: unknown) => {
      this.logger.debug(`Metrics worker did not terminate cleanly: ${describeError(terminateError)}`);
    });

    if (this.closed) return;
    this.spawn().catch((spawnError: unknown) => {
      if (this.closed) return;
      this.logger.warn(`Cannot replace metrics worker: ${describeError(spawnError)}`);
      this.failQueuedIfNoWorkers();
    });
  }

  private failQueuedIfNoWorkers(): void {
    if (this.slots.length > 0 || this.starting.size > 0) return;
    const error = new CodeVizError("No metrics workers are running");
    for (const task of this.queue.splice(0)) task.reject(error);
  }
}

function createWorker(settings: WorkerSettings): Worker {
  const extension = extname(__filename);
  const entry = join(__dirname, `metricsWorker${extension}`);
  if (extension !== ".ts") {
    return new Worker(entry, { workerData: settings });
  }
  // running from TypeScript sources: load the entry through tsx
  const bootstrap = [`require(${JSON.stringify(require.resolve("tsx/cjs"))});`, `require(${JSON.stringify(entry)});`];
  return new Worker(bootstrap.join("\n"), { eval: true, workerData: settings });
}
