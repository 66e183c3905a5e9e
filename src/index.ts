export * from "./constants.js";
export * from "./types.js";
export { loadConfig } from "./config.js";
export type { ServiceConfig } from "./config.js";
export { createAppContext, getAppContext, resetAppContext } from "./context.js";
export type { AppContext } from "./context.js";
export * from "./utils/errors.js";
export { withRetry } from "./utils/retry.js";
export type { RetryOptions } from "./utils/retry.js";
export * from "./utils/validators.js";
export { ModelManager } from "./models/modelManager.js";
export type { Downloader, ModelManagerOptions } from "./models/modelManager.js";
export { downloadFile, isUrl } from "./pipeline/download.js";
export { WhisperCppTranscriber } from "./pipeline/transcribe.js";
export type { Transcriber, TranscribeOptions } from "./pipeline/transcribe.js";
export { SubtitleGenerator } from "./pipeline/subtitleGenerator.js";
export type { GenerateOptions } from "./pipeline/subtitleGenerator.js";
export { processVideoFile } from "./pipeline/fileTask.js";
export type { VideoTask } from "./pipeline/fileTask.js";
export { BatchProcessor } from "./pipeline/batch.js";
export { generateReport } from "./pipeline/report.js";
export { VideoProcessor } from "./pipeline/video.js";
export * from "./subtitles/formatters.js";
export { AsyncProcessor, withAsyncProcessor } from "./async/processor.js";
export type { AsyncProcessorOptions, ProcessMultipleOptions } from "./async/processor.js";
export { ProcessPool } from "./async/pool.js";
export type { WorkerPool } from "./async/pool.js";
