import fs from "node:fs";
import path from "node:path";
import {
  BATCH_REPORT_FILE_NAME,
  BATCH_STATE_FILE_NAME,
  DEFAULT_BATCH_EXTENSIONS,
} from "../constants.js";
import {
  createBatchState,
  deleteBatchState,
  loadBatchState,
  recordFileResult,
  saveBatchState,
  wasAttempted,
} from "../store/batchState.js";
import type { BatchState } from "../store/batchState.js";
import type { BatchFileResult, BatchProgressCallback, BatchSummary } from "../types.js";
import { BatchProcessingError } from "../utils/errors.js";
import { directoryExists, ensureDirectory, listFilesWithExtension } from "../utils/files.js";
import { moduleLogger } from "../utils/logger.js";
import { assertValid, validateModelName, validateOutputFormat } from "../utils/validators.js";
import { processVideoFile } from "./fileTask.js";
import type { SubtitleGenerator } from "./subtitleGenerator.js";
import { generateReport } from "./report.js";

const log = moduleLogger("batch");

export interface BatchProcessorOptions {
  generator: SubtitleGenerator;
  model: string;
  outputFormat: string;
  extensions?: string[];
}

export interface BatchRunOptions {
  outputDir?: string; // defaults to the input directory
  resume?: boolean;
  onProgress?: BatchProgressCallback;
}

/**
 * Runs every media file of a directory through the generator, one at a time.
 * whisper.cpp is not run concurrently here; `AsyncProcessor` covers parallel
 * runs. Progress is persisted after each file so an interrupted run can be
 * resumed.
 */
export class BatchProcessor {
  readonly model: string;
  readonly outputFormat: string;
  readonly extensions: string[];
  private readonly generator: SubtitleGenerator;

  constructor(opts: BatchProcessorOptions) {
    this.generator = opts.generator;
    this.model = opts.model;
    this.outputFormat = opts.outputFormat;
    this.extensions = opts.extensions?.length ? opts.extensions : [...DEFAULT_BATCH_EXTENSIONS];
  }

  /** Matching files directly inside `inputDir`, sorted by path. */
  findVideoFiles(inputDir: string): string[] {
    const files = this.extensions.flatMap((ext) => listFilesWithExtension(inputDir, ext, false));
    return [...new Set(files)].sort();
  }

  static statePath(outputDir: string): string {
    return path.join(outputDir, BATCH_STATE_FILE_NAME);
  }

  static reportPath(outputDir: string): string {
    return path.join(outputDir, BATCH_REPORT_FILE_NAME);
  }

  async processBatch(inputDir: string, opts: BatchRunOptions = {}): Promise<BatchSummary> {
    if (!directoryExists(inputDir)) {
      throw new BatchProcessingError(`Input directory does not exist: ${inputDir}`, { inputDir });
    }
    assertValid(validateModelName(this.model));
    assertValid(validateOutputFormat(this.outputFormat));

    const outputDir = opts.outputDir || inputDir;
    ensureDirectory(outputDir);

    const videoFiles = this.findVideoFiles(inputDir);
    const statePath = BatchProcessor.statePath(outputDir);

    let state: BatchState | null = null;
    if (opts.resume) {
      state = loadBatchState(statePath);
      if (state) {
        log.info(
          { processed: state.processedFiles.size, failed: state.failedFiles.size },
          "Resuming batch"
        );
        if (state.model !== this.model || state.outputFormat !== this.outputFormat) {
          log.warn(
            { previous: { model: state.model, format: state.outputFormat } },
            "Resumed batch used different settings; remaining files use the current ones"
          );
        }
      }
    }
    if (!state) {
      state = createBatchState({ inputDir, outputDir, model: this.model, outputFormat: this.outputFormat });
    }

    // Files that succeeded or failed before are not attempted again
    const current = state;
    const filesToProcess = videoFiles.filter((f) => !wasAttempted(current, f));
    const skipped = videoFiles.length - filesToProcess.length;
    if (videoFiles.length === 0) {
      log.warn({ inputDir }, "No video files found");
    }

    const results: BatchFileResult[] = [];
    const total = filesToProcess.length;
    const startedAt = Date.now();

    for (const [i, filePath] of filesToProcess.entries()) {
      const idx = i + 1;
      opts.onProgress?.(filePath, idx, total, "processing");

      const result = await processVideoFile(
        { filePath, outputDir, model: this.model, outputFormat: this.outputFormat },
        this.generator
      );
      results.push(result);

      recordFileResult(current, result);
      saveBatchState(statePath, current);

      if (result.success) {
        log.info({ filePath, outputPath: result.outputPath, idx, total }, "File complete");
      } else {
        log.warn({ filePath, error: result.error, idx, total }, "File failed");
      }
      opts.onProgress?.(filePath, idx, total, result.success ? "complete" : `failed: ${result.error}`);
    }

    const successful = results.filter((r) => r.success).length;
    const failed = results.length - successful;
    const summary: BatchSummary = {
      totalFiles: videoFiles.length,
      successful,
      failed,
      skipped,
      totalDurationSeconds: (Date.now() - startedAt) / 1000,
      results,
    };

    const reportPath = BatchProcessor.reportPath(outputDir);
    fs.writeFileSync(reportPath, generateReport(summary), "utf-8");
    log.info({ reportPath }, "Batch report saved");

    // A pass without failures leaves no resume artifact behind
    if (failed === 0 && deleteBatchState(statePath)) {
      log.info({ statePath }, "Removed batch state");
    }

    return summary;
  }
}
