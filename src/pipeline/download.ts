import fs from "node:fs";
import path from "node:path";
import crypto from "node:crypto";
import { Readable, Transform } from "node:stream";
import { pipeline } from "node:stream/promises";
import { fetch } from "undici";
import { DownloadError, errorMessage } from "../utils/errors.js";
import { ensureDirectory } from "../utils/files.js";
import { moduleLogger } from "../utils/logger.js";

const log = moduleLogger("download");

/** Called with bytes received so far and the announced total (0 when unknown). */
export type DownloadProgress = (downloadedBytes: number, totalBytes: number) => void;

export interface DownloadOptions {
  onProgress?: DownloadProgress;
  signal?: AbortSignal;
}

export function isUrl(value: string): boolean {
  try {
    const url = new URL(value);
    return (url.protocol === "http:" || url.protocol === "https:") && url.host.length > 0;
  } catch {
    return false;
  }
}

/**
 * Streams `url` into `destination`. The body is written to a sibling `.part`
 * file first and renamed into place once complete, so the destination never
 * holds a truncated download.
 */
export async function downloadFile(url: string, destination: string, opts: DownloadOptions = {}): Promise<string> {
  ensureDirectory(path.dirname(destination));
  const partPath = `${destination}.${process.pid}.${crypto.randomUUID().slice(0, 8)}.part`;

  try {
    const response = await fetch(url, {
      headers: { "User-Agent": "whisper-subtitles" },
      signal: opts.signal,
    });
    if (!response.ok || !response.body) {
      const body = await response.text().catch(() => "");
      throw new DownloadError(`Download failed: ${response.status} ${body}`.trim(), {
        url,
        status: response.status,
      });
    }

    const totalBytes = parseInt(response.headers.get("content-length") || "0", 10) || 0;
    let downloadedBytes = 0;
    const counter = new Transform({
      transform(chunk: Buffer, _encoding, callback) {
        downloadedBytes += chunk.length;
        opts.onProgress?.(downloadedBytes, totalBytes);
        callback(null, chunk);
      },
    });

    await pipeline(Readable.fromWeb(response.body), counter, fs.createWriteStream(partPath));
    fs.renameSync(partPath, destination);
    log.info({ url, destination, bytes: downloadedBytes }, "Download complete");
    return destination;
  } catch (err) {
    fs.rmSync(partPath, { force: true });
    if (err instanceof DownloadError) throw err;
    throw new DownloadError(`Failed to download ${url}: ${errorMessage(err)}`, { url }, err);
  }
}

/** File name taken from the URL path, or `fallback` when the path has none. */
export function getUrlFilename(url: string, fallback = "download"): string {
  try {
    const name = path.basename(decodeURIComponent(new URL(url).pathname));
    return name || fallback;
  } catch {
    return fallback;
  }
}
