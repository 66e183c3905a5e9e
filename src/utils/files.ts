import fs from "node:fs";
import path from "node:path";

export function fileExists(filePath: string): boolean {
  try {
    return fs.statSync(filePath).isFile();
  } catch {
    return false;
  }
}

export function directoryExists(dirPath: string): boolean {
  try {
    return fs.statSync(dirPath).isDirectory();
  } catch {
    return false;
  }
}

export function ensureDirectory(dir: string) {
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }
}

/** Lower-cased extension without the leading dot. */
export function getFileExtension(filePath: string): string {
  return path.extname(filePath).replace(/^\./, "").toLowerCase();
}

export function getFileBasename(filePath: string, includeExtension = false): string {
  const base = path.basename(filePath);
  return includeExtension ? base : path.basename(base, path.extname(base));
}

/** Size in bytes, or -1 when the file is not there. */
export function getFileSize(filePath: string): number {
  try {
    return fs.statSync(filePath).size;
  } catch {
    return -1;
  }
}

/** Human-readable size, e.g. `147.95 MB`. */
export function formatBytes(bytes: number): string {
  if (bytes < 0) return "unknown";
  const units = ["B", "KB", "MB", "GB"];
  let value = bytes;
  let unit = 0;
  while (value >= 1024 && unit < units.length - 1) {
    value /= 1024;
    unit++;
  }
  return unit === 0 ? `${value} B` : `${value.toFixed(2)} ${units[unit]}`;
}

export function sanitizeFilename(filename: string, replacement = "_"): string {
  const escaped = replacement.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
  return filename
    .replace(/ /g, replacement)
    .replace(/[<>:"/\\|?*\x00-\x1f]/g, replacement)
    .replace(/^[. ]+|[. ]+$/g, "")
    .replace(new RegExp(`(${escaped})+`, "g"), replacement);
}

/**
 * Files in `directory` whose extension matches `extension` (case-sensitive,
 * like a shell glob). Subdirectories are descended only when `recursive`.
 */
export function listFilesWithExtension(directory: string, extension: string, recursive = false): string[] {
  const suffix = `.${extension.replace(/^\./, "")}`;
  const found: string[] = [];
  for (const entry of fs.readdirSync(directory, { withFileTypes: true })) {
    const full = path.join(directory, entry.name);
    if (entry.isDirectory()) {
      if (recursive) found.push(...listFilesWithExtension(full, extension, true));
    } else if (entry.isFile() && entry.name.endsWith(suffix) && entry.name.length > suffix.length) {
      found.push(full);
    }
  }
  return found;
}
