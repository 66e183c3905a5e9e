import {
  AUDIO_EXTENSIONS,
  MEDIA_EXTENSIONS,
  SUBTITLE_FORMATS,
  VALID_WHISPER_MODELS,
  VIDEO_EXTENSIONS,
  isOutputFormat,
  isValidModel,
} from "../constants.js";
import { ValidationError } from "./errors.js";
import { fileExists, getFileExtension } from "./files.js";

export type Validation = { valid: true } | { valid: false; error: string };

const ok: Validation = { valid: true };

function validateExtension(
  kind: string,
  filePath: string,
  allowed: readonly string[],
  mustExist: boolean
): Validation {
  if (!filePath) return { valid: false, error: `${kind} path cannot be empty` };
  const ext = getFileExtension(filePath);
  if (!allowed.includes(ext)) {
    return {
      valid: false,
      error: `Unsupported ${kind.toLowerCase()} format: .${ext}. Supported: ${allowed.join(", ")}`,
    };
  }
  if (mustExist && !fileExists(filePath)) {
    return { valid: false, error: `${kind} file not found: ${filePath}` };
  }
  return ok;
}

export function validateVideoPath(filePath: string, mustExist = true): Validation {
  return validateExtension("Video", filePath, VIDEO_EXTENSIONS, mustExist);
}

export function validateAudioPath(filePath: string, mustExist = true): Validation {
  return validateExtension("Audio", filePath, AUDIO_EXTENSIONS, mustExist);
}

export function validateMediaPath(filePath: string, mustExist = true): Validation {
  return validateExtension("Media", filePath, MEDIA_EXTENSIONS, mustExist);
}

export function validateModelName(model: string): Validation {
  if (!model) return { valid: false, error: "Model name cannot be empty" };
  if (!isValidModel(model)) {
    return {
      valid: false,
      error: `Unknown model: ${model}. Available: ${VALID_WHISPER_MODELS.join(", ")}`,
    };
  }
  return ok;
}

export function validateOutputFormat(format: string): Validation {
  if (!format) return { valid: false, error: "Format cannot be empty" };
  if (!isOutputFormat(format.toLowerCase())) {
    return {
      valid: false,
      error: `Unknown format: ${format}. Available: ${SUBTITLE_FORMATS.join(", ")}`,
    };
  }
  return ok;
}

export function assertValid(result: Validation): void {
  if (!result.valid) throw new ValidationError(result.error);
}
