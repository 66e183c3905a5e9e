import path from "node:path";
import { failedFileResult } from "../pipeline/fileTask.js";
import type { BatchFileResult, BatchProgressCallback, BatchSummary } from "../types.js";
import { emptySummary } from "../types.js";
import { errorMessage } from "../utils/errors.js";
import { fileExists } from "../utils/files.js";
import { moduleLogger } from "../utils/logger.js";
import { ProcessPool } from "./pool.js";
import type { WorkerPool } from "./pool.js";

const log = moduleLogger("async-processor");

export interface AsyncProcessorOptions {
  maxWorkers?: number;
  createPool?: (size: number) => WorkerPool;
}

export interface ProcessOptions {
  model: string;
  outputFormat: string;
  outputDir?: string; // defaults to each file's own directory
}

export interface ProcessMultipleOptions extends ProcessOptions {
  onProgress?: BatchProgressCallback;
  signal?: AbortSignal;
}

/**
 * Transcribes many files in parallel on a pool of worker processes.
 *
 * Results (and "complete"/"failed" progress events) are reported in the
 * order the files were submitted, not the order workers finish them. Unlike
 * `BatchProcessor`, nothing is persisted for resuming.
 *
 * @example
 *   const summary = await withAsyncProcessor({ maxWorkers: 4 }, (p) =>
 *     p.processMultiple(["a.mp4", "b.mp4"], { model: "base", outputFormat: "vtt" })
 *   );
 */
export class AsyncProcessor {
  readonly maxWorkers: number;
  private readonly createPool: (size: number) => WorkerPool;
  private pool?: WorkerPool;

  constructor(opts: AsyncProcessorOptions = {}) {
    this.maxWorkers = Math.max(1, opts.maxWorkers ?? 4);
    this.createPool = opts.createPool ?? ((size) => new ProcessPool(size));
  }

  /** The pool, created on first use. */
  get executor(): WorkerPool {
    if (!this.pool) {
      log.debug({ maxWorkers: this.maxWorkers }, "Creating worker pool");
      this.pool = this.createPool(this.maxWorkers);
    }
    return this.pool;
  }

  get hasPool(): boolean {
    return this.pool !== undefined;
  }

  // Never rejects: pool failures become failed results
  private submit(filePath: string, opts: ProcessOptions): Promise<BatchFileResult> {
    const outputDir = opts.outputDir || path.dirname(filePath);
    return this.executor
      .run({ filePath, outputDir, model: opts.model, outputFormat: opts.outputFormat })
      .catch((err: unknown) => {
        log.error({ err, filePath }, "Task failed");
        return failedFileResult(filePath, errorMessage(err));
      });
  }

  async processSingle(videoPath: string, opts: ProcessOptions): Promise<BatchFileResult> {
    if (!fileExists(videoPath)) {
      return failedFileResult(videoPath, `File not found: ${videoPath}`);
    }
    return this.submit(videoPath, opts);
  }

  async processMultiple(videoPaths: string[], opts: ProcessMultipleOptions): Promise<BatchSummary> {
    if (videoPaths.length === 0) return emptySummary();

    const startedAt = Date.now();
    const total = videoPaths.length;
    const { signal, onProgress } = opts;

    const onAbort = () => {
      log.warn("Processing cancelled, shutting down worker pool");
      this.shutdown().catch((err: unknown) => log.error({ err }, "Pool shutdown failed"));
    };
    signal?.addEventListener("abort", onAbort, { once: true });

    try {
      // Everything is submitted up front; the pool bounds real concurrency
      const tasks: Array<[string, Promise<BatchFileResult>]> = [];
      for (const videoPath of videoPaths) {
        if (signal?.aborted) {
          tasks.push([videoPath, Promise.resolve(failedFileResult(videoPath, "Cancelled"))]);
        } else {
          tasks.push([videoPath, this.submit(videoPath, opts)]);
        }
      }

      const results: BatchFileResult[] = [];
      for (const [i, [videoPath, task]] of tasks.entries()) {
        const idx = i + 1;
        onProgress?.(videoPath, idx, total, "processing");
        const result = await task;
        results.push(result);
        onProgress?.(videoPath, idx, total, result.success ? "complete" : `failed: ${result.error}`);
      }

      const successful = results.filter((r) => r.success).length;
      return {
        totalFiles: total,
        successful,
        failed: results.length - successful,
        skipped: 0,
        totalDurationSeconds: (Date.now() - startedAt) / 1000,
        results,
      };
    } finally {
      signal?.removeEventListener("abort", onAbort);
    }
  }

  /** Releases the pool. A later call to `executor` starts a fresh one. */
  async shutdown(opts: { wait?: boolean } = {}): Promise<void> {
    const pool = this.pool;
    if (!pool) return;
    this.pool = undefined;
    await pool.shutdown(opts);
  }
}

/** Runs `fn` with a fresh processor and always shuts its pool down afterwards. */
export async function withAsyncProcessor<T>(
  opts: AsyncProcessorOptions,
  fn: (processor: AsyncProcessor) => Promise<T>
): Promise<T> {
  const processor = new AsyncProcessor(opts);
  try {
    return await fn(processor);
  } finally {
    await processor.shutdown();
  }
}
