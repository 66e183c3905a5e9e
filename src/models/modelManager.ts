import fs from "node:fs";
import path from "node:path";
import {
  VALID_WHISPER_MODELS,
  isValidModel,
  modelDownloadUrl,
  modelFileName,
} from "../constants.js";
import { downloadFile } from "../pipeline/download.js";
import type { DownloadOptions } from "../pipeline/download.js";
import { DownloadError, ModelError, errorMessage } from "../utils/errors.js";
import { ensureDirectory, getFileSize } from "../utils/files.js";
import { moduleLogger } from "../utils/logger.js";
import { withRetry } from "../utils/retry.js";
import type { RetryOptions } from "../utils/retry.js";

const log = moduleLogger("models");

export type Downloader = (url: string, destination: string, opts?: DownloadOptions) => Promise<string>;

export interface ModelManagerOptions {
  modelsDir: string;
  downloader?: Downloader;
  retry?: RetryOptions;
}

/**
 * Owns the on-disk model directory: resolves catalog names to ggml files and
 * fetches missing ones. Only `downloadModel` (and `getModel` on a cache miss)
 * touches the network.
 */
export class ModelManager {
  readonly modelsDir: string;
  private readonly downloader: Downloader;
  private readonly retry: RetryOptions;
  private readonly inflight = new Map<string, Promise<string>>();

  constructor(opts: ModelManagerOptions) {
    this.modelsDir = opts.modelsDir;
    this.downloader = opts.downloader ?? downloadFile;
    this.retry = opts.retry ?? {};
    ensureDirectory(this.modelsDir);
    log.info({ modelsDir: this.modelsDir }, "Model manager initialized");
  }

  private assertKnown(name: string): void {
    if (!isValidModel(name)) {
      throw new ModelError(`Invalid model: ${name}. Available: ${VALID_WHISPER_MODELS.join(", ")}`, {
        model: name,
      });
    }
  }

  /** Local path of `name`, downloading the file first when it is missing. */
  async getModel(name: string): Promise<string> {
    this.assertKnown(name);
    const modelPath = this.getModelPath(name);
    if (!fs.existsSync(modelPath)) {
      log.info({ model: name }, "Model not found locally, downloading");
      await this.downloadModel(name);
    }
    return modelPath;
  }

  getModelPath(name: string): string {
    return path.join(this.modelsDir, modelFileName(name));
  }

  modelExists(name: string): boolean {
    return fs.existsSync(this.getModelPath(name));
  }

  async downloadModel(name: string, force = false): Promise<string> {
    this.assertKnown(name);
    const modelPath = this.getModelPath(name);
    if (!force && fs.existsSync(modelPath)) {
      log.info({ model: name, modelPath }, "Model already exists");
      return modelPath;
    }

    // Concurrent callers in this process share one download
    const pending = this.inflight.get(name);
    if (pending) return pending;

    const job = this.fetchModel(name, modelPath).finally(() => this.inflight.delete(name));
    this.inflight.set(name, job);
    return job;
  }

  private async fetchModel(name: string, modelPath: string): Promise<string> {
    const url = modelDownloadUrl(name);
    log.info({ model: name, url }, "Downloading model");

    let lastDecile = -1;
    const onProgress = (downloaded: number, total: number) => {
      if (total <= 0) return;
      const decile = Math.floor((downloaded / total) * 10);
      if (decile > lastDecile) {
        lastDecile = decile;
        log.info({ model: name, downloaded, total }, `Downloading ${modelFileName(name)}: ${decile * 10}%`);
      }
    };

    try {
      await withRetry(() => this.downloader(url, modelPath, { onProgress }), {
        retryOn: [DownloadError],
        label: `download of model '${name}'`,
        ...this.retry,
      });
      log.info({ model: name, modelPath }, "Model downloaded");
      return modelPath;
    } catch (err) {
      throw new ModelError(`Failed to download model '${name}': ${errorMessage(err)}`, { model: name, url }, err);
    }
  }

  listAvailableModels(): string[] {
    return [...VALID_WHISPER_MODELS];
  }

  listDownloadedModels(): string[] {
    return VALID_WHISPER_MODELS.filter((name) => this.modelExists(name));
  }

  /** Size in bytes, or -1 when the model is not downloaded. */
  getModelSize(name: string): number {
    return getFileSize(this.getModelPath(name));
  }

  /** Returns whether a file was actually removed. */
  deleteModel(name: string): boolean {
    const modelPath = this.getModelPath(name);
    if (!fs.existsSync(modelPath)) return false;
    fs.rmSync(modelPath);
    log.info({ model: name }, "Deleted model");
    return true;
  }
}
