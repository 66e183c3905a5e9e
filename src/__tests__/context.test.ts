import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { loadConfig } from "../config.js";
import { createAppContext, getAppContext, resetAppContext } from "../context.js";

describe("application context", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "context-"));
    resetAppContext();
  });

  afterEach(() => {
    resetAppContext();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("wires the components from the config", () => {
    const config = loadConfig({ MODELS_DIR: path.join(dir, "models"), WHISPER_THREADS: "6" });
    const ctx = createAppContext(config);
    expect(ctx.config).toBe(config);
    expect(ctx.modelManager.modelsDir).toBe(path.join(dir, "models"));
    expect(ctx.transcriber.threads).toBe(6);
    expect(fs.existsSync(path.join(dir, "models"))).toBe(true);
  });

  it("keeps the first shared context", () => {
    const first = getAppContext(loadConfig({ MODELS_DIR: path.join(dir, "one") }));
    const second = getAppContext(loadConfig({ MODELS_DIR: path.join(dir, "two") }));
    expect(second).toBe(first);
    expect(second.modelManager.modelsDir).toBe(path.join(dir, "one"));
  });

  it("builds a new context after a reset", () => {
    const first = getAppContext(loadConfig({ MODELS_DIR: path.join(dir, "one") }));
    resetAppContext();
    const second = getAppContext(loadConfig({ MODELS_DIR: path.join(dir, "two") }));
    expect(second).not.toBe(first);
  });
});
