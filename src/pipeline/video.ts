import path from "node:path";
import { CommandError, ValidationError, VideoProcessingError, errorMessage } from "../utils/errors.js";
import { fileExists } from "../utils/files.js";
import { moduleLogger } from "../utils/logger.js";
import { runCommand } from "../utils/process.js";

const log = moduleLogger("video");

export interface VideoProcessorOptions {
  ffmpegCmd: string;
  overwriteOutput?: boolean;
}

function requireFile(kind: string, filePath: string) {
  if (!fileExists(filePath)) {
    throw new ValidationError(`${kind} file not found: ${filePath}`, { path: filePath });
  }
}

// Escaping for a path used inside an ffmpeg filter argument
function escapeFilterPath(p: string): string {
  return p.replace(/\\/g, "/").replace(/:/g, "\\:").replace(/'/g, "\\'");
}

/** Thin ffmpeg wrapper for muxing, burning and audio extraction. */
export class VideoProcessor {
  private readonly ffmpegCmd: string;
  private readonly overwriteOutput: boolean;

  constructor(opts: VideoProcessorOptions) {
    this.ffmpegCmd = opts.ffmpegCmd;
    this.overwriteOutput = opts.overwriteOutput ?? true;
  }

  private async ffmpeg(action: string, args: string[]): Promise<void> {
    const fullArgs = [this.overwriteOutput ? "-y" : "-n", ...args];
    log.debug({ command: this.ffmpegCmd, args: fullArgs }, action);
    try {
      await runCommand(this.ffmpegCmd, fullArgs);
    } catch (err) {
      const detail = err instanceof CommandError ? err.stderr.trim() || err.message : errorMessage(err);
      throw new VideoProcessingError(`Failed to ${action}: ${detail}`, { args: fullArgs }, err);
    }
  }

  /** Adds the subtitle file as a soft subtitle stream; audio and video are copied. */
  async mergeSubtitles(videoPath: string, subtitlePath: string, outputPath: string, subtitleCodec = "mov_text"): Promise<string> {
    requireFile("Video", videoPath);
    requireFile("Subtitle", subtitlePath);
    log.info({ videoPath, subtitlePath }, "Merging subtitles");
    await this.ffmpeg("merge subtitles", [
      "-i", videoPath,
      "-i", subtitlePath,
      "-map", "0",
      "-map", "1",
      "-c:v", "copy",
      "-c:a", "copy",
      "-c:s", subtitleCodec,
      outputPath,
    ]);
    log.info({ outputPath }, "Merged subtitles");
    return outputPath;
  }

  /** Renders the subtitles into the picture; re-encodes the video stream. */
  async burnSubtitles(videoPath: string, subtitlePath: string, outputPath: string, fontSize = 24): Promise<string> {
    requireFile("Video", videoPath);
    requireFile("Subtitle", subtitlePath);
    log.info({ videoPath, subtitlePath }, "Burning subtitles");
    await this.ffmpeg("burn subtitles", [
      "-i", videoPath,
      "-vf", `subtitles='${escapeFilterPath(subtitlePath)}':force_style='FontSize=${fontSize}'`,
      outputPath,
    ]);
    return outputPath;
  }

  /** Mono 16-bit PCM at `sampleRate`, the input whisper.cpp expects. */
  async extractAudio(videoPath: string, outputPath?: string, sampleRate = 16000): Promise<string> {
    requireFile("Video", videoPath);
    const parsed = path.parse(videoPath);
    const target = outputPath ?? path.join(parsed.dir, `${parsed.name}.wav`);
    log.info({ videoPath, target }, "Extracting audio");
    await this.ffmpeg("extract audio", [
      "-i", videoPath,
      "-vn",
      "-ac", "1",
      "-ar", String(sampleRate),
      "-c:a", "pcm_s16le",
      target,
    ]);
    return target;
  }
}
