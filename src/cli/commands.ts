import fs from "node:fs";
import path from "node:path";
import { AsyncProcessor } from "../async/processor.js";
import type { AsyncProcessorOptions } from "../async/processor.js";
import { SUBTITLE_FORMATS } from "../constants.js";
import type { AppContext } from "../context.js";
import { BatchProcessor } from "../pipeline/batch.js";
import { downloadFile, getUrlFilename, isUrl } from "../pipeline/download.js";
import { SubtitleGenerator } from "../pipeline/subtitleGenerator.js";
import { WhisperCppTranscriber } from "../pipeline/transcribe.js";
import { VideoProcessor } from "../pipeline/video.js";
import { convertSubtitleFormat, createFormatter, getSupportedFormats } from "../subtitles/formatters.js";
import type { BatchProgressCallback, BatchSummary } from "../types.js";
import { BatchProcessingError, SubtitleError, ValidationError, errorMessage } from "../utils/errors.js";
import { directoryExists, ensureDirectory, fileExists, formatBytes, getFileExtension, sanitizeFilename } from "../utils/files.js";
import { moduleLogger } from "../utils/logger.js";
import {
  assertValid,
  validateMediaPath,
  validateModelName,
  validateOutputFormat,
} from "../utils/validators.js";
import { USAGE, parseCommand } from "./args.js";
import type { BatchCommand, ConvertCommand, ModelsCommand, ProcessCommand } from "./args.js";

const log = moduleLogger("cli");

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_INTERRUPTED = 130;

export interface CliDeps {
  context: () => AppContext;
  signal?: AbortSignal;
  createPool?: AsyncProcessorOptions["createPool"];
}

const printProgress: BatchProgressCallback = (filePath, current, total, status) => {
  console.log(`[${current}/${total}] ${path.basename(filePath)}: ${status}`);
};

// File names with spaces are renamed in place before the engine sees them
function sanitizeInputPath(filePath: string): string {
  const base = path.basename(filePath);
  if (!base.includes(" ")) return filePath;
  const renamed = path.join(path.dirname(filePath), sanitizeFilename(base));
  if (renamed !== filePath) {
    fs.renameSync(filePath, renamed);
    log.info({ from: filePath, to: renamed }, "Renamed input");
  }
  return renamed;
}

export async function runProcess(cmd: ProcessCommand, ctx: AppContext, signal?: AbortSignal): Promise<number> {
  const { config } = ctx;
  const model = cmd.model ?? config.defaultModel;
  const outputFormat = cmd.format ?? config.defaultFormat;
  assertValid(validateModelName(model));
  assertValid(validateOutputFormat(outputFormat));

  let inputPath = cmd.input;
  if (isUrl(inputPath)) {
    ensureDirectory(config.dataDir);
    const destination = path.join(config.dataDir, sanitizeFilename(getUrlFilename(inputPath)));
    console.log(`Downloading ${inputPath}`);
    inputPath = await downloadFile(inputPath, destination, { signal });
  }
  inputPath = sanitizeInputPath(inputPath);
  assertValid(validateMediaPath(inputPath));

  const generator =
    cmd.threads !== undefined || cmd.processors !== undefined
      ? new SubtitleGenerator(
          new WhisperCppTranscriber({
            whisperCmd: config.whisperCmd,
            threads: cmd.threads ?? config.threads,
            processors: cmd.processors ?? config.processors,
          }),
          ctx.modelManager
        )
      : ctx.generator;

  const result = await generator.generateOrThrow({
    inputPath,
    model,
    outputFormat,
    outputDir: cmd.outputDir,
    onProgress: (stage, progress) => log.info({ stage, progress }, "Progress"),
  });

  if (!cmd.merge) {
    console.log(`Subtitles: ${result.outputPath}`);
    return EXIT_OK;
  }

  const parsed = path.parse(inputPath);
  const mergedPath = path.join(parsed.dir, `${parsed.name}_subtitled${parsed.ext}`);
  const video = new VideoProcessor({ ffmpegCmd: config.ffmpegCmd });
  await video.mergeSubtitles(inputPath, result.outputPath, mergedPath, config.subtitleCodec);
  console.log(`Subtitles: ${result.outputPath}`);
  console.log(`Video: ${mergedPath}`);
  return EXIT_OK;
}

export function printSummary(summary: BatchSummary): void {
  console.log("");
  console.log(`Total files: ${summary.totalFiles}`);
  console.log(`Successful:  ${summary.successful}`);
  console.log(`Failed:      ${summary.failed}`);
  console.log(`Skipped:     ${summary.skipped}`);
  console.log(`Duration:    ${summary.totalDurationSeconds.toFixed(2)}s`);
}

export async function runBatch(cmd: BatchCommand, ctx: AppContext, deps: Omit<CliDeps, "context"> = {}): Promise<number> {
  const { config } = ctx;
  const batch = new BatchProcessor({
    generator: ctx.generator,
    model: cmd.model ?? config.defaultModel,
    outputFormat: cmd.format ?? config.defaultFormat,
  });

  let summary: BatchSummary;
  if (cmd.concurrent) {
    if (!directoryExists(cmd.inputDir)) {
      throw new BatchProcessingError(`Input directory does not exist: ${cmd.inputDir}`, { inputDir: cmd.inputDir });
    }
    assertValid(validateModelName(batch.model));
    assertValid(validateOutputFormat(batch.outputFormat));
    if (cmd.resume) log.warn("--resume has no effect with --concurrent");
    if (cmd.outputDir) ensureDirectory(cmd.outputDir);

    const files = batch.findVideoFiles(cmd.inputDir);
    const processor = new AsyncProcessor({ maxWorkers: cmd.workers ?? config.workers, createPool: deps.createPool });
    try {
      summary = await processor.processMultiple(files, {
        model: batch.model,
        outputFormat: batch.outputFormat,
        outputDir: cmd.outputDir,
        onProgress: printProgress,
        signal: deps.signal,
      });
    } finally {
      await processor.shutdown();
    }
  } else {
    summary = await batch.processBatch(cmd.inputDir, {
      outputDir: cmd.outputDir,
      resume: cmd.resume,
      onProgress: printProgress,
    });
  }

  printSummary(summary);
  return summary.failed > 0 ? EXIT_FAILURE : EXIT_OK;
}

export function runConvert(cmd: ConvertCommand): number {
  if (!fileExists(cmd.input)) {
    throw new ValidationError(`Subtitle file not found: ${cmd.input}`, { path: cmd.input });
  }
  const from = cmd.from ?? getFileExtension(cmd.input);
  const target = createFormatter(cmd.to);
  const content = fs.readFileSync(cmd.input, "utf-8");
  const converted = convertSubtitleFormat(content, from, cmd.to);

  const parsed = path.parse(cmd.input);
  const outputPath = cmd.output ?? path.join(parsed.dir, `${parsed.name}.${target.fileExtension}`);
  fs.writeFileSync(outputPath, converted, "utf-8");
  console.log(`Converted: ${outputPath}`);
  return EXIT_OK;
}

export async function runModels(cmd: ModelsCommand, ctx: AppContext): Promise<number> {
  const { modelManager } = ctx;
  switch (cmd.action) {
    case "list": {
      const available = modelManager.listAvailableModels();
      const downloaded = new Set(modelManager.listDownloadedModels());
      console.log("Available models:");
      for (const name of available) {
        const size = downloaded.has(name) ? ` (${formatBytes(modelManager.getModelSize(name))})` : "";
        console.log(`  [${downloaded.has(name) ? "x" : " "}] ${name}${size}`);
      }
      console.log(`\nDownloaded: ${downloaded.size}/${available.length}`);
      return EXIT_OK;
    }
    case "download": {
      assertValid(validateModelName(cmd.name));
      const modelPath = await modelManager.downloadModel(cmd.name, cmd.force);
      console.log(`Downloaded: ${modelPath}`);
      return EXIT_OK;
    }
    case "delete": {
      assertValid(validateModelName(cmd.name));
      if (modelManager.deleteModel(cmd.name)) {
        console.log(`Deleted: ${cmd.name}`);
      } else {
        console.log(`Model not downloaded: ${cmd.name}`);
      }
      return EXIT_OK;
    }
  }
}

export function runFormats(): number {
  console.log("Engine output formats:");
  for (const fmt of SUBTITLE_FORMATS) console.log(`  - ${fmt}`);
  console.log("Convertible subtitle formats:");
  for (const fmt of getSupportedFormats()) console.log(`  - ${fmt}`);
  return EXIT_OK;
}

/** Parses `argv`, runs the command and returns the process exit code. */
export async function runCli(argv: string[], deps: CliDeps): Promise<number> {
  try {
    const cmd = parseCommand(argv);
    switch (cmd.command) {
      case "help":
        console.log(USAGE);
        return EXIT_OK;
      case "formats":
        return runFormats();
      case "convert":
        return runConvert(cmd);
      case "models":
        return await runModels(cmd, deps.context());
      case "process":
        return await runProcess(cmd, deps.context(), deps.signal);
      case "batch": {
        const code = await runBatch(cmd, deps.context(), deps);
        return deps.signal?.aborted ? EXIT_INTERRUPTED : code;
      }
    }
  } catch (err) {
    if (deps.signal?.aborted) {
      console.error("Operation cancelled.");
      return EXIT_INTERRUPTED;
    }
    if (err instanceof SubtitleError) {
      console.error(`Error: ${err.message}`);
      log.debug({ err }, "Command failed");
    } else {
      console.error(`Error: ${errorMessage(err)}`);
      log.error({ err }, "Unexpected error");
    }
    return EXIT_FAILURE;
  }
}
