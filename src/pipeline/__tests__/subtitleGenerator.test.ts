import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { SubtitleGenerator, moveOutput } from "../subtitleGenerator.js";
import { FakeTranscriber, fakeModels } from "../../__tests__/helpers/fakes.js";
import { ModelError, TranscriptionError, ValidationError } from "../../utils/errors.js";

describe("SubtitleGenerator", () => {
  let dir: string;
  let input: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "generator-"));
    input = path.join(dir, "talk.mp4");
    fs.writeFileSync(input, "");
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("fails on a missing input before resolving the model", async () => {
    const models = { getModel: vi.fn(fakeModels.getModel) };
    const generator = new SubtitleGenerator(new FakeTranscriber(), models);
    const missing = path.join(dir, "nope.mp4");
    await expect(
      generator.generate({ inputPath: missing, model: "base", outputFormat: "vtt", outputDir: dir })
    ).rejects.toThrow(new ValidationError(`Input file not found: ${missing}`));
    expect(models.getModel).not.toHaveBeenCalled();
  });

  it("passes the resolved model path to the transcriber", async () => {
    const transcriber = new FakeTranscriber();
    const generator = new SubtitleGenerator(transcriber, fakeModels);
    const stages: string[] = [];
    const result = await generator.generate({
      inputPath: input,
      model: "small",
      outputFormat: "srt",
      outputDir: dir,
      onProgress: (stage, progress) => stages.push(`${stage}:${progress}`),
    });
    expect(result.success).toBe(true);
    expect(transcriber.calls[0]?.modelPath).toBe("/models/ggml-small.bin");
    expect(stages).toEqual(["preparing:0", "preparing:1"]);
  });

  it("wraps model resolution failures in ModelError", async () => {
    const generator = new SubtitleGenerator(new FakeTranscriber(), {
      getModel: async () => {
        throw new Error("disk full");
      },
    });
    await expect(
      generator.generate({ inputPath: input, model: "base", outputFormat: "vtt", outputDir: dir })
    ).rejects.toThrow(new ModelError("Failed to get model 'base': disk full"));
  });

  it("passes ModelError through unchanged", async () => {
    const original = new ModelError("Invalid model: huge");
    const generator = new SubtitleGenerator(new FakeTranscriber(), {
      getModel: async () => {
        throw original;
      },
    });
    await expect(
      generator.generate({ inputPath: input, model: "huge", outputFormat: "vtt", outputDir: dir })
    ).rejects.toBe(original);
  });

  it("renames the output next to the input", async () => {
    const generator = new SubtitleGenerator(new FakeTranscriber(), fakeModels);
    const result = await generator.generateAndRename({ inputPath: input, model: "base", outputFormat: "vtt" });
    expect(result.outputPath).toBe(path.join(dir, "talk.vtt"));
    expect(fs.existsSync(path.join(dir, "talk.vtt"))).toBe(true);
    expect(fs.existsSync(path.join(dir, `${result.requestId}.vtt`))).toBe(false);
  });

  it("returns failed results from generateAndRename without renaming", async () => {
    const generator = new SubtitleGenerator(new FakeTranscriber(["talk.mp4"]), fakeModels);
    const result = await generator.generateAndRename({ inputPath: input, model: "base", outputFormat: "vtt" });
    expect(result).toMatchObject({ success: false, outputPath: "", error: "engine exploded" });
  });

  it("throws TranscriptionError from generateOrThrow on failure", async () => {
    const generator = new SubtitleGenerator(new FakeTranscriber(["talk.mp4"]), fakeModels);
    await expect(
      generator.generateOrThrow({ inputPath: input, model: "base", outputFormat: "vtt" })
    ).rejects.toThrow(new TranscriptionError("Transcription failed: engine exploded"));
  });
});

describe("moveOutput", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "move-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("returns the target after a successful rename", () => {
    const source = path.join(dir, "a.vtt");
    fs.writeFileSync(source, "x");
    expect(moveOutput(source, path.join(dir, "b.vtt"))).toBe(path.join(dir, "b.vtt"));
  });

  it("keeps the source path when the rename fails", () => {
    const source = path.join(dir, "a.vtt");
    fs.writeFileSync(source, "x");
    const target = path.join(dir, "no-such-dir", "b.vtt");
    expect(moveOutput(source, target)).toBe(source);
    expect(fs.existsSync(source)).toBe(true);
  });

  it("leaves empty paths alone", () => {
    expect(moveOutput("", path.join(dir, "b.vtt"))).toBe("");
  });
});
