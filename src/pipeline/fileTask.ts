import path from "node:path";
import type { BatchFileResult } from "../types.js";
import { errorMessage } from "../utils/errors.js";
import { getFileBasename } from "../utils/files.js";
import { moduleLogger } from "../utils/logger.js";
import { moveOutput } from "./subtitleGenerator.js";
import type { SubtitleGenerator } from "./subtitleGenerator.js";

const log = moduleLogger("file-task");

export interface VideoTask {
  filePath: string;
  outputDir: string;
  model: string;
  outputFormat: string;
}

export function failedFileResult(filePath: string, error: string, durationSeconds = 0): BatchFileResult {
  return {
    filePath,
    success: false,
    error,
    durationSeconds,
    timestamp: new Date().toISOString(),
  };
}

/**
 * Transcribes one file and moves its subtitle to `<outputDir>/<base>.<format>`.
 * Every failure, thrown or reported, comes back as an unsuccessful result.
 */
export async function processVideoFile(task: VideoTask, generator: SubtitleGenerator): Promise<BatchFileResult> {
  const startedAt = Date.now();
  const elapsed = () => (Date.now() - startedAt) / 1000;

  try {
    const result = await generator.generate({
      inputPath: task.filePath,
      model: task.model,
      outputFormat: task.outputFormat,
      outputDir: task.outputDir,
    });

    if (!result.success) {
      return failedFileResult(task.filePath, result.error || "Transcription failed", elapsed());
    }

    const finalOutput = path.join(task.outputDir, `${getFileBasename(task.filePath)}.${result.format}`);
    const outputPath = moveOutput(result.outputPath, finalOutput);
    return {
      filePath: task.filePath,
      success: true,
      outputPath,
      durationSeconds: elapsed(),
      timestamp: new Date().toISOString(),
    };
  } catch (err) {
    log.error({ err, filePath: task.filePath }, "Error processing file");
    return failedFileResult(task.filePath, errorMessage(err), elapsed());
  }
}
