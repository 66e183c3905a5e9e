// Model catalog, output formats and file-name conventions

export const DEFAULT_WHISPER_MODEL = "base";

// Valid ggml model names published for whisper.cpp
export const VALID_WHISPER_MODELS = [
  "tiny.en",
  "tiny",
  "tiny-q5_1",
  "tiny.en-q5_1",
  "base.en",
  "base",
  "base-q5_1",
  "base.en-q5_1",
  "small.en",
  "small.en-tdrz", // tinydiarize build, hosted separately
  "small",
  "small-q5_1",
  "small.en-q5_1",
  "medium",
  "medium.en",
  "medium-q5_0",
  "medium.en-q5_0",
  "large-v1",
  "large-v2",
  "large",
  "large-q5_0",
] as const;

export type WhisperModel = (typeof VALID_WHISPER_MODELS)[number];

const MODEL_NAMES: ReadonlySet<string> = new Set(VALID_WHISPER_MODELS);

export function isValidModel(model: string): model is WhisperModel {
  return MODEL_NAMES.has(model);
}

export const MODEL_SOURCE_URL = "https://huggingface.co/ggerganov/whisper.cpp";
export const TDRZ_MODEL_SOURCE_URL =
  "https://huggingface.co/akashmjn/tinydiarize-whisper.cpp";
export const TDRZ_MARKER = "tdrz";

export function modelFileName(model: string): string {
  return `ggml-${model}.bin`;
}

export function modelDownloadUrl(model: string): string {
  const source = model.includes(TDRZ_MARKER)
    ? TDRZ_MODEL_SOURCE_URL
    : MODEL_SOURCE_URL;
  return `${source}/resolve/main/${modelFileName(model)}`;
}

// Output formats whisper-cli can write, with the flag that selects each one
export const OUTPUT_FORMAT_FLAGS = {
  vtt: "-ovtt",
  srt: "-osrt",
  txt: "-otxt",
  json: "-oj",
  lrc: "-olrc",
} as const;

export type OutputFormat = keyof typeof OUTPUT_FORMAT_FLAGS;

export const SUBTITLE_FORMATS: readonly OutputFormat[] = ["vtt", "srt", "txt", "json", "lrc"];
export const DEFAULT_OUTPUT_FORMAT: OutputFormat = "vtt";

export function isOutputFormat(format: string): format is OutputFormat {
  return Object.prototype.hasOwnProperty.call(OUTPUT_FORMAT_FLAGS, format);
}

export const VIDEO_EXTENSIONS = [
  "mp4",
  "mkv",
  "avi",
  "mov",
  "wmv",
  "flv",
  "webm",
  "m4v",
  "mpeg",
  "mpg",
] as const;

export const AUDIO_EXTENSIONS = ["mp3", "wav", "flac", "aac", "ogg", "m4a", "wma"] as const;

export const MEDIA_EXTENSIONS: readonly string[] = [
  ...VIDEO_EXTENSIONS,
  ...AUDIO_EXTENSIONS,
];

// Extensions picked up by a batch run when none are configured
export const DEFAULT_BATCH_EXTENSIONS = [
  "mp4",
  "mkv",
  "avi",
  "mov",
  "webm",
  "m4v",
  "flv",
  "wmv",
];

export const BATCH_STATE_FILE_NAME = ".batch_state.json";
export const BATCH_REPORT_FILE_NAME = "batch_report.md";
