import fs from "node:fs";
import { z } from "zod";
import type { BatchFileResult } from "../types.js";
import { moduleLogger } from "../utils/logger.js";

const log = moduleLogger("batch-state");

export const BATCH_STATE_VERSION = 1;

export const BatchFileResultSchema = z.object({
  filePath: z.string(),
  success: z.boolean(),
  outputPath: z.string().optional(),
  error: z.string().optional(),
  durationSeconds: z.number().default(0),
  timestamp: z.string().default(() => new Date().toISOString()),
});

// Unknown keys are stripped and list fields default to empty, so files
// written by older or newer versions still load.
const BatchStateFileSchema = z.object({
  version: z.number().int().default(BATCH_STATE_VERSION),
  inputDir: z.string(),
  outputDir: z.string(),
  model: z.string(),
  outputFormat: z.string(),
  startedAt: z.string().default(() => new Date().toISOString()),
  processedFiles: z.array(z.string()).default([]),
  failedFiles: z.array(z.string()).default([]),
  results: z.array(BatchFileResultSchema).default([]),
});

export interface BatchState {
  inputDir: string;
  outputDir: string;
  model: string;
  outputFormat: string;
  startedAt: string;
  processedFiles: Set<string>; // insertion order kept for display
  failedFiles: Set<string>;
  results: BatchFileResult[];
}

export function createBatchState(init: Pick<BatchState, "inputDir" | "outputDir" | "model" | "outputFormat">): BatchState {
  return {
    ...init,
    startedAt: new Date().toISOString(),
    processedFiles: new Set(),
    failedFiles: new Set(),
    results: [],
  };
}

/** Records one outcome, keeping processed and failed sets disjoint. */
export function recordFileResult(state: BatchState, result: BatchFileResult): void {
  if (result.success) {
    state.failedFiles.delete(result.filePath);
    state.processedFiles.add(result.filePath);
  } else {
    state.processedFiles.delete(result.filePath);
    state.failedFiles.add(result.filePath);
  }
  state.results.push({ ...result });
}

export function wasAttempted(state: BatchState, filePath: string): boolean {
  return state.processedFiles.has(filePath) || state.failedFiles.has(filePath);
}

/** Returns null when the file is missing, unreadable or does not match the schema. */
export function loadBatchState(statePath: string): BatchState | null {
  if (!fs.existsSync(statePath)) return null;
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(statePath, "utf-8"));
  } catch (err) {
    log.warn({ err, statePath }, "Failed to read batch state");
    return null;
  }

  const parsed = BatchStateFileSchema.safeParse(raw);
  if (!parsed.success) {
    log.warn({ statePath, issues: parsed.error.issues }, "Ignoring invalid batch state");
    return null;
  }
  if (parsed.data.version > BATCH_STATE_VERSION) {
    log.warn({ statePath, version: parsed.data.version }, "Ignoring batch state from a newer version");
    return null;
  }

  const { version: _version, ...data } = parsed.data;
  const processedFiles = new Set(data.processedFiles);
  // A path listed in both sets keeps its successful entry
  const failedFiles = new Set(data.failedFiles.filter((f) => !processedFiles.has(f)));
  return { ...data, processedFiles, failedFiles };
}

export function saveBatchState(statePath: string, state: BatchState): void {
  const file: z.input<typeof BatchStateFileSchema> = {
    version: BATCH_STATE_VERSION,
    inputDir: state.inputDir,
    outputDir: state.outputDir,
    model: state.model,
    outputFormat: state.outputFormat,
    startedAt: state.startedAt,
    processedFiles: [...state.processedFiles],
    failedFiles: [...state.failedFiles],
    results: state.results,
  };
  // Write then rename, so a kill mid-write leaves the previous state intact
  const tmpPath = `${statePath}.tmp`;
  fs.writeFileSync(tmpPath, JSON.stringify(file, null, 2), "utf-8");
  fs.renameSync(tmpPath, statePath);
}

export function deleteBatchState(statePath: string): boolean {
  if (!fs.existsSync(statePath)) return false;
  fs.rmSync(statePath);
  return true;
}
