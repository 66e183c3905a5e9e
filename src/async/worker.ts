import { getAppContext } from "../context.js";
import { processVideoFile } from "../pipeline/fileTask.js";
import { errorMessage } from "../utils/errors.js";
import { moduleLogger } from "../utils/logger.js";
import { WorkerRequestSchema } from "./messages.js";
import type { WorkerResponse } from "./messages.js";

const log = moduleLogger("worker");

// Entry point of a pool child; runs one task at a time as the parent sends them.

function reply(message: WorkerResponse) {
  process.send?.(message);
}

async function handle(raw: unknown): Promise<void> {
  const parsed = WorkerRequestSchema.safeParse(raw);
  if (!parsed.success) {
    log.error({ issues: parsed.error.issues }, "Ignoring malformed task message");
    return;
  }
  const { id, task } = parsed.data;
  try {
    const { generator } = getAppContext();
    const result = await processVideoFile(task, generator);
    reply({ id, ok: true, result });
  } catch (err) {
    reply({ id, ok: false, error: errorMessage(err) });
  }
}

if (!process.send) {
  log.error("worker.ts must be started by the process pool");
  process.exit(1);
}

log.debug("Worker started");

process.on("message", (message: unknown) => {
  handle(message).catch((err: unknown) => {
    log.error({ err }, "Worker failed to handle message");
  });
});

process.on("disconnect", () => process.exit(0));
