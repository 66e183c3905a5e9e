import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { Mock } from "vitest";
import { ModelManager } from "../modelManager.js";
import type { Downloader } from "../modelManager.js";
import { modelDownloadUrl } from "../../constants.js";
import { DownloadError, ModelError } from "../../utils/errors.js";

describe("ModelManager", () => {
  let dir: string;
  let downloader: Mock<Downloader>;

  const writingDownloader: Downloader = async (_url, destination) => {
    fs.writeFileSync(destination, "weights");
    return destination;
  };

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "models-"));
    downloader = vi.fn<Downloader>(writingDownloader);
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  const manager = (opts: { retry?: { maxAttempts: number; delayMs: number } } = {}) =>
    new ModelManager({ modelsDir: path.join(dir, "models"), downloader, retry: opts.retry });

  it("creates the models directory", () => {
    manager();
    expect(fs.existsSync(path.join(dir, "models"))).toBe(true);
  });

  it("resolves model paths from catalog names", () => {
    expect(manager().getModelPath("base.en")).toBe(path.join(dir, "models", "ggml-base.en.bin"));
  });

  it("builds download URLs, using the tinydiarize host for tdrz models", () => {
    expect(modelDownloadUrl("base")).toBe("https://huggingface.co/ggerganov/whisper.cpp/resolve/main/ggml-base.bin");
    expect(modelDownloadUrl("small.en-tdrz")).toBe(
      "https://huggingface.co/akashmjn/tinydiarize-whisper.cpp/resolve/main/ggml-small.en-tdrz.bin"
    );
  });

  it("rejects names outside the catalog before touching the disk", async () => {
    await expect(manager().getModel("gigantic")).rejects.toThrow(ModelError);
    await expect(manager().getModel("gigantic")).rejects.toThrow(/^Invalid model: gigantic\. Available: /);
    expect(downloader).not.toHaveBeenCalled();
  });

  it("downloads a missing model once and then serves it from disk", async () => {
    const models = manager();
    const modelPath = await models.getModel("tiny");
    expect(modelPath).toBe(path.join(dir, "models", "ggml-tiny.bin"));
    expect(fs.readFileSync(modelPath, "utf-8")).toBe("weights");
    expect(downloader).toHaveBeenCalledTimes(1);
    expect(downloader.mock.calls[0]?.[0]).toBe(modelDownloadUrl("tiny"));

    await models.getModel("tiny");
    expect(downloader).toHaveBeenCalledTimes(1);
  });

  it("shares one download between concurrent callers", async () => {
    const models = manager();
    const [a, b] = await Promise.all([models.getModel("base"), models.downloadModel("base")]);
    expect(a).toBe(b);
    expect(downloader).toHaveBeenCalledTimes(1);
  });

  it("re-downloads an existing model when forced", async () => {
    const models = manager();
    await models.downloadModel("tiny");
    await models.downloadModel("tiny", true);
    expect(downloader).toHaveBeenCalledTimes(2);
  });

  it("retries failed downloads and reports exhaustion as ModelError", async () => {
    downloader.mockRejectedValue(new DownloadError("Download failed: 503"));
    const models = manager({ retry: { maxAttempts: 3, delayMs: 0 } });
    await expect(models.getModel("tiny")).rejects.toThrow(
      "Failed to download model 'tiny': Download failed: 503"
    );
    expect(downloader).toHaveBeenCalledTimes(3);
    expect(models.modelExists("tiny")).toBe(false);
  });

  it("lists downloaded models in catalog order", async () => {
    const models = manager();
    expect(models.listDownloadedModels()).toEqual([]);
    await models.downloadModel("small");
    await models.downloadModel("tiny");
    expect(models.listDownloadedModels()).toEqual(["tiny", "small"]);
    expect(models.listAvailableModels()).toHaveLength(21);
  });

  it("reports sizes, -1 when absent", async () => {
    const models = manager();
    expect(models.getModelSize("tiny")).toBe(-1);
    await models.downloadModel("tiny");
    expect(models.getModelSize("tiny")).toBe("weights".length);
  });

  it("deletes models idempotently", async () => {
    const models = manager();
    await models.downloadModel("tiny");
    expect(models.deleteModel("tiny")).toBe(true);
    expect(models.modelExists("tiny")).toBe(false);
    expect(models.deleteModel("tiny")).toBe(false);
  });
});
