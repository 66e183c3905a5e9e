export type ErrorDetails = Record<string, unknown>;

/**
 * Base class for every failure raised by the subtitle pipeline, so callers can
 * catch the whole family with one `instanceof` check.
 */
export class SubtitleError extends Error {
  readonly details: ErrorDetails;

  constructor(message: string, details: ErrorDetails = {}, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = new.target.name;
    this.details = details;
  }

  override toString(): string {
    const keys = Object.keys(this.details);
    if (keys.length === 0) return `${this.name}: ${this.message}`;
    return `${this.name}: ${this.message} (details: ${JSON.stringify(this.details)})`;
  }
}

/** Bad path, model name or format name, detected before any work starts. */
export class ValidationError extends SubtitleError {}

/** Catalog lookup or model download failure. */
export class ModelError extends SubtitleError {}

/** The recognition engine exited non-zero. */
export class TranscriptionError extends SubtitleError {}

/** ffmpeg merge, burn or extraction failure. */
export class VideoProcessingError extends SubtitleError {}

/** Unusable input directory or batch-level failure. */
export class BatchProcessingError extends SubtitleError {}

/** Network fetch failure. */
export class DownloadError extends SubtitleError {}

/** Unknown codec name or unusable configuration value. */
export class ConfigurationError extends SubtitleError {}

/** An external command could not be spawned or exited non-zero. */
export class CommandError extends SubtitleError {
  readonly exitCode: number;
  readonly stdout: string;
  readonly stderr: string;
  readonly output: string;

  constructor(
    message: string,
    result: { exitCode: number; stdout: string; stderr: string; output: string },
    cause?: unknown
  ) {
    super(message, { exitCode: result.exitCode }, cause);
    this.exitCode = result.exitCode;
    this.stdout = result.stdout;
    this.stderr = result.stderr;
    this.output = result.output;
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
