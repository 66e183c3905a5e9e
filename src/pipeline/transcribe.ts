import path from "node:path";
import crypto from "node:crypto";
import { DEFAULT_OUTPUT_FORMAT, OUTPUT_FORMAT_FLAGS, SUBTITLE_FORMATS, isOutputFormat } from "../constants.js";
import type { TranscriptionResult, StageCallback } from "../types.js";
import { CommandError, errorMessage } from "../utils/errors.js";
import { ensureDirectory } from "../utils/files.js";
import { moduleLogger } from "../utils/logger.js";
import { runCommand } from "../utils/process.js";

const log = moduleLogger("transcribe");

export interface TranscribeOptions {
  inputPath: string;
  modelPath: string;
  outputFormat?: string; // vtt, srt, txt, json or lrc
  outputDir: string;
  onProgress?: StageCallback;
}

/** A speech-to-text engine that writes a subtitle file for one input. */
export interface Transcriber {
  transcribe(opts: TranscribeOptions): Promise<TranscriptionResult>;
  getSupportedFormats(): string[];
}

export interface WhisperCppOptions {
  whisperCmd: string;
  threads?: number;
  processors?: number;
}

/**
 * Runs the whisper.cpp CLI once per request. The output base name is a fresh
 * UUID, so concurrent requests sharing an output directory never collide.
 * A non-zero exit is reported in the result rather than thrown.
 */
export class WhisperCppTranscriber implements Transcriber {
  readonly whisperCmd: string;
  readonly threads: number;
  readonly processors: number;

  constructor(opts: WhisperCppOptions) {
    this.whisperCmd = opts.whisperCmd;
    this.threads = Math.max(1, opts.threads ?? 4);
    this.processors = Math.max(1, opts.processors ?? 1);
  }

  getSupportedFormats(): string[] {
    return [...SUBTITLE_FORMATS];
  }

  async transcribe(opts: TranscribeOptions): Promise<TranscriptionResult> {
    const requestId = crypto.randomUUID();
    ensureDirectory(opts.outputDir);

    // whisper-cli appends the extension itself
    const outPrefix = path.join(opts.outputDir, requestId);

    // Unknown formats fall back to vtt instead of failing
    const requested = (opts.outputFormat || DEFAULT_OUTPUT_FORMAT).toLowerCase();
    const format = isOutputFormat(requested) ? requested : DEFAULT_OUTPUT_FORMAT;
    if (format !== requested) {
      log.debug({ requested, format }, "Unsupported output format, using default");
    }

    const args = [
      "-t", String(this.threads),
      "-p", String(this.processors),
      "-m", opts.modelPath,
      "-f", opts.inputPath,
      OUTPUT_FORMAT_FLAGS[format],
      "-of", outPrefix,
    ];

    opts.onProgress?.("transcribing", 0);
    log.info({ requestId, input: opts.inputPath }, "Running transcription");
    log.debug({ command: this.whisperCmd, args }, "whisper command");

    try {
      const { output } = await runCommand(this.whisperCmd, args);
      log.debug({ requestId, output }, "Transcription output");
      opts.onProgress?.("transcribing", 1);
      return {
        requestId,
        inputPath: opts.inputPath,
        outputPath: `${outPrefix}.${format}`,
        format,
        success: true,
      };
    } catch (err) {
      const error =
        err instanceof CommandError ? err.output.trim() || err.message : errorMessage(err);
      log.error({ requestId, error }, "Transcription failed");
      return {
        requestId,
        inputPath: opts.inputPath,
        outputPath: "",
        format,
        success: false,
        error,
      };
    }
  }
}
