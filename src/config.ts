import "dotenv/config";
import path from "node:path";
import { DEFAULT_OUTPUT_FORMAT, DEFAULT_WHISPER_MODEL } from "./constants.js";

export interface ServiceConfig {
  whisperCmd: string;
  ffmpegCmd: string;
  modelsDir: string;
  dataDir: string; // downloaded inputs land here
  outputDir: string;
  threads: number;
  processors: number;
  defaultModel: string;
  defaultFormat: string;
  workers: number; // concurrent pipeline pool size
  subtitleCodec: string; // codec used when muxing subtitles into a container
  logLevel: string;
}

export const rootDir = path.resolve(process.cwd());

function intFromEnv(value: string | undefined, fallback: number): number {
  const parsed = parseInt(value || "", 10);
  return Number.isFinite(parsed) ? parsed : fallback;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServiceConfig {
  const whisperCmd = env.WHISPER_CMD || "./binary/whisper-cli";
  const ffmpegCmd = env.FFMPEG_CMD || "ffmpeg";

  const modelsDir = path.resolve(rootDir, env.MODELS_DIR || "models");
  const dataDir = path.resolve(rootDir, env.DATA_DIR || "data");
  const outputDir = path.resolve(rootDir, env.OUTPUT_DIR || "output");

  const threads = Math.max(1, intFromEnv(env.WHISPER_THREADS, 4));
  const processors = Math.max(1, intFromEnv(env.WHISPER_PROCESSORS, 1));
  const workers = Math.max(1, intFromEnv(env.BATCH_WORKERS, 4));

  return {
    whisperCmd,
    ffmpegCmd,
    modelsDir,
    dataDir,
    outputDir,
    threads,
    processors,
    defaultModel: env.WHISPER_MODEL || DEFAULT_WHISPER_MODEL,
    defaultFormat: env.SUBTITLE_FORMAT || DEFAULT_OUTPUT_FORMAT,
    workers,
    subtitleCodec: env.SUBTITLE_CODEC || "mov_text",
    logLevel: env.LOG_LEVEL || "info",
  };
}
