import type { Logger } from "pino";
import { loadConfig } from "./config.js";
import type { ServiceConfig } from "./config.js";
import { ModelManager } from "./models/modelManager.js";
import { SubtitleGenerator } from "./pipeline/subtitleGenerator.js";
import { WhisperCppTranscriber } from "./pipeline/transcribe.js";
import { logger } from "./utils/logger.js";

export interface AppContext {
  config: ServiceConfig;
  logger: Logger;
  modelManager: ModelManager;
  transcriber: WhisperCppTranscriber;
  generator: SubtitleGenerator;
}

export function createAppContext(config: ServiceConfig): AppContext {
  const modelManager = new ModelManager({ modelsDir: config.modelsDir });
  const transcriber = new WhisperCppTranscriber({
    whisperCmd: config.whisperCmd,
    threads: config.threads,
    processors: config.processors,
  });
  return {
    config,
    logger,
    modelManager,
    transcriber,
    generator: new SubtitleGenerator(transcriber, modelManager),
  };
}

let shared: AppContext | undefined;

/**
 * The process-wide context. The first call builds it; later calls return
 * that same instance whatever config they pass.
 */
export function getAppContext(config?: ServiceConfig): AppContext {
  if (!shared) {
    shared = createAppContext(config ?? loadConfig());
  }
  return shared;
}

export function resetAppContext(): void {
  shared = undefined;
}
