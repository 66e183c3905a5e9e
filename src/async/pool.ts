import fs from "node:fs";
import { once } from "node:events";
import { fork } from "node:child_process";
import type { ChildProcess } from "node:child_process";
import { fileURLToPath } from "node:url";
import type { VideoTask } from "../pipeline/fileTask.js";
import type { BatchFileResult } from "../types.js";
import { BatchProcessingError } from "../utils/errors.js";
import { moduleLogger } from "../utils/logger.js";
import { WorkerResponseSchema } from "./messages.js";
import type { WorkerRequest } from "./messages.js";

const log = moduleLogger("pool");

/** Runs tasks in isolated execution contexts, at most `size` at a time. */
export interface WorkerPool {
  readonly size: number;
  run(task: VideoTask): Promise<BatchFileResult>;
  shutdown(opts?: { wait?: boolean }): Promise<void>;
}

interface PendingTask {
  id: number;
  task: VideoTask;
  resolve: (result: BatchFileResult) => void;
  reject: (err: Error) => void;
}

interface PoolWorker {
  child: ChildProcess;
  current?: PendingTask;
}

export interface ProcessPoolOptions {
  script?: string;
  execArgv?: string[];
}

// Built output sits next to worker.js; from sources the child needs tsx
function defaultWorkerScript(): { script: string; execArgv: string[] } {
  const compiled = fileURLToPath(new URL("./worker.js", import.meta.url));
  if (fs.existsSync(compiled)) return { script: compiled, execArgv: [] };
  return {
    script: fileURLToPath(new URL("./worker.ts", import.meta.url)),
    execArgv: ["--import", "tsx"],
  };
}

/**
 * Pool of forked Node processes. Children are spawned on demand up to
 * `size`; extra tasks wait in FIFO order. A child that dies takes only its
 * current task down with it and is replaced on the next dispatch.
 */
export class ProcessPool implements WorkerPool {
  readonly size: number;
  private readonly script: string;
  private readonly execArgv: string[];
  private workers: PoolWorker[] = [];
  private queue: PendingTask[] = [];
  private nextId = 1;
  private idleWaiters: Array<() => void> = [];
  private closing?: Promise<void>;

  constructor(size: number, opts: ProcessPoolOptions = {}) {
    this.size = Math.max(1, size);
    const defaults = defaultWorkerScript();
    this.script = opts.script ?? defaults.script;
    this.execArgv = opts.execArgv ?? (opts.script ? [] : defaults.execArgv);
  }

  get activeWorkers(): number {
    return this.workers.length;
  }

  run(task: VideoTask): Promise<BatchFileResult> {
    if (this.closing) {
      return Promise.reject(new BatchProcessingError("Worker pool is shut down"));
    }
    return new Promise((resolve, reject) => {
      this.queue.push({ id: this.nextId++, task, resolve, reject });
      this.dispatch();
    });
  }

  private dispatch(): void {
    while (this.queue.length > 0 && !this.closing) {
      let worker = this.workers.find((w) => !w.current);
      if (!worker) {
        if (this.workers.length >= this.size) return;
        worker = this.spawn();
      }
      const pending = this.queue.shift();
      if (!pending) return;
      worker.current = pending;
      const request: WorkerRequest = { id: pending.id, task: pending.task };
      worker.child.send(request);
    }
  }

  private spawn(): PoolWorker {
    const child = fork(this.script, [], { execArgv: this.execArgv });
    const worker: PoolWorker = { child };
    child.on("message", (message: unknown) => this.onMessage(worker, message));
    child.on("error", (err) => log.error({ err, pid: child.pid }, "Worker error"));
    child.on("exit", (code, signal) => this.onExit(worker, code, signal));
    this.workers.push(worker);
    log.debug({ pid: child.pid, workers: this.workers.length }, "Spawned worker");
    return worker;
  }

  private onMessage(worker: PoolWorker, message: unknown): void {
    const parsed = WorkerResponseSchema.safeParse(message);
    const pending = worker.current;
    if (!parsed.success || !pending || parsed.data.id !== pending.id) {
      log.warn({ pid: worker.child.pid }, "Unexpected message from worker");
      return;
    }
    worker.current = undefined;
    const response = parsed.data;
    if (response.ok) {
      pending.resolve(response.result);
    } else {
      pending.reject(new BatchProcessingError(response.error, { filePath: pending.task.filePath }));
    }
    this.settled();
  }

  private onExit(worker: PoolWorker, code: number | null, signal: NodeJS.Signals | null): void {
    this.workers = this.workers.filter((w) => w !== worker);
    const pending = worker.current;
    worker.current = undefined;
    if (pending) {
      log.error({ pid: worker.child.pid, code, signal }, "Worker exited while busy");
      pending.reject(
        new BatchProcessingError(`Worker exited unexpectedly (code=${code}, signal=${signal})`, {
          filePath: pending.task.filePath,
        })
      );
    }
    this.settled();
  }

  private settled(): void {
    this.dispatch();
    if (this.workers.every((w) => !w.current)) {
      const waiters = this.idleWaiters;
      this.idleWaiters = [];
      waiters.forEach((resolve) => resolve());
    }
  }

  private waitForIdle(): Promise<void> {
    if (this.workers.every((w) => !w.current)) return Promise.resolve();
    return new Promise((resolve) => this.idleWaiters.push(resolve));
  }

  /**
   * Rejects queued tasks and stops every child. With `wait` (the default)
   * tasks already running are allowed to finish first. Safe to call again.
   */
  shutdown(opts: { wait?: boolean } = {}): Promise<void> {
    if (!this.closing) {
      this.closing = this.close(opts.wait ?? true);
    }
    return this.closing;
  }

  private async close(wait: boolean): Promise<void> {
    const queued = this.queue;
    this.queue = [];
    for (const pending of queued) {
      pending.reject(new BatchProcessingError("Worker pool shut down before the task started", {
        filePath: pending.task.filePath,
      }));
    }

    if (wait) await this.waitForIdle();

    await Promise.all(
      this.workers.map(async ({ child }) => {
        if (child.exitCode !== null || child.signalCode !== null) return;
        const exited = once(child, "exit");
        child.kill();
        await exited;
      })
    );
    log.debug("Worker pool shut down");
  }
}
