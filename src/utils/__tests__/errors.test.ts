import { describe, expect, it } from "vitest";
import {
  CommandError,
  ConfigurationError,
  ModelError,
  SubtitleError,
  ValidationError,
  errorMessage,
} from "../errors.js";

describe("error hierarchy", () => {
  it("names errors after their class and keeps the family", () => {
    const err = new ModelError("missing model", { model: "base" });
    expect(err).toBeInstanceOf(SubtitleError);
    expect(err).toBeInstanceOf(Error);
    expect(err.name).toBe("ModelError");
    expect(err.details).toEqual({ model: "base" });
  });

  it("includes details in toString only when present", () => {
    expect(new ValidationError("bad").toString()).toBe("ValidationError: bad");
    expect(new ConfigurationError("bad codec", { format: "ass" }).toString()).toBe(
      'ConfigurationError: bad codec (details: {"format":"ass"})'
    );
  });

  it("keeps the cause", () => {
    const cause = new Error("socket hang up");
    expect(new ModelError("download failed", {}, cause).cause).toBe(cause);
    expect(new ModelError("no cause").cause).toBeUndefined();
  });

  it("carries process output on CommandError", () => {
    const err = new CommandError("failed", { exitCode: 2, stdout: "out", stderr: "err", output: "outerr" });
    expect(err.exitCode).toBe(2);
    expect(err.output).toBe("outerr");
    expect(err.details).toEqual({ exitCode: 2 });
  });

  it("extracts messages from anything thrown", () => {
    expect(errorMessage(new Error("boom"))).toBe("boom");
    expect(errorMessage("plain")).toBe("plain");
    expect(errorMessage(42)).toBe("42");
  });
});
