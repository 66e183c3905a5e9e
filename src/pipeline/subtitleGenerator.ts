import fs from "node:fs";
import path from "node:path";
import type { ModelManager } from "../models/modelManager.js";
import type { StageCallback, TranscriptionResult } from "../types.js";
import { ModelError, TranscriptionError, ValidationError, errorMessage } from "../utils/errors.js";
import { fileExists } from "../utils/files.js";
import { moduleLogger } from "../utils/logger.js";
import type { Transcriber } from "./transcribe.js";

const log = moduleLogger("generator");

/** The slice of the model cache the generator needs. */
export type ModelResolver = Pick<ModelManager, "getModel">;

export interface GenerateOptions {
  inputPath: string;
  model: string;
  outputFormat: string;
  outputDir: string;
  onProgress?: StageCallback;
}

/**
 * One input file through the pipeline: check the input, resolve the model
 * (downloading it if needed), run the engine. No retries.
 */
export class SubtitleGenerator {
  constructor(
    private readonly transcriber: Transcriber,
    private readonly models: ModelResolver
  ) {}

  async generate(opts: GenerateOptions): Promise<TranscriptionResult> {
    if (!fileExists(opts.inputPath)) {
      throw new ValidationError(`Input file not found: ${opts.inputPath}`, { inputPath: opts.inputPath });
    }

    opts.onProgress?.("preparing", 0);
    let modelPath: string;
    try {
      modelPath = await this.models.getModel(opts.model);
      log.info({ modelPath }, "Using model");
    } catch (err) {
      if (err instanceof ModelError) throw err;
      throw new ModelError(`Failed to get model '${opts.model}': ${errorMessage(err)}`, { model: opts.model }, err);
    }
    opts.onProgress?.("preparing", 1);

    const result = await this.transcriber.transcribe({
      inputPath: opts.inputPath,
      modelPath,
      outputFormat: opts.outputFormat,
      outputDir: opts.outputDir,
      onProgress: opts.onProgress,
    });

    if (result.success) {
      log.info({ outputPath: result.outputPath }, "Subtitles generated");
    } else {
      log.error({ error: result.error, inputPath: opts.inputPath }, "Transcription failed");
    }
    return result;
  }

  /**
   * Like `generate`, then moves the engine's output next to the input as
   * `<input base>.<format>`. A failed move keeps the engine's path; the
   * result stays successful.
   */
  async generateAndRename(opts: Omit<GenerateOptions, "outputDir"> & { outputDir?: string }): Promise<TranscriptionResult> {
    const result = await this.generate({
      ...opts,
      outputDir: opts.outputDir ?? path.dirname(opts.inputPath),
    });
    if (!result.success) return result;

    const parsed = path.parse(opts.inputPath);
    const finalPath = path.join(parsed.dir, `${parsed.name}.${result.format}`);
    const moved = moveOutput(result.outputPath, finalPath);
    return { ...result, outputPath: moved };
  }

  /** `generateAndRename` for callers that need a subtitle file or an error. */
  async generateOrThrow(opts: Omit<GenerateOptions, "outputDir"> & { outputDir?: string }): Promise<TranscriptionResult> {
    const result = await this.generateAndRename(opts);
    if (!result.success) {
      throw new TranscriptionError(`Transcription failed: ${result.error ?? "unknown error"}`, {
        inputPath: opts.inputPath,
      });
    }
    return result;
  }
}

/**
 * Best-effort rename of an engine output file. Returns the path the file
 * ended up at: `target` on success, `source` otherwise.
 */
export function moveOutput(source: string, target: string): string {
  if (!source || source === target) return source;
  try {
    fs.renameSync(source, target);
    log.info({ from: source, to: target }, "Renamed output");
    return target;
  } catch (err) {
    log.warn({ err, from: source, to: target }, "Failed to rename output, keeping original path");
    return source;
  }
}
