import { describe, expect, it } from "vitest";
import { parseCommand } from "../args.js";
import { ValidationError } from "../../utils/errors.js";

describe("parseCommand", () => {
  it("shows help without arguments or with --help", () => {
    expect(parseCommand([])).toEqual({ command: "help" });
    expect(parseCommand(["batch", "--help"])).toEqual({ command: "help" });
  });

  it("treats a bare path as the process command", () => {
    expect(parseCommand(["talk.mp4", "--merge", "-m", "small"])).toEqual({
      command: "process",
      input: "talk.mp4",
      model: "small",
      merge: true,
    });
  });

  it("parses process options", () => {
    expect(
      parseCommand(["process", "https://example.com/a.mp4", "--format", "srt", "--threads", "8", "-p", "2", "-o", "/tmp/out"])
    ).toEqual({
      command: "process",
      input: "https://example.com/a.mp4",
      format: "srt",
      outputDir: "/tmp/out",
      merge: false,
      threads: 8,
      processors: 2,
    });
  });

  it("rejects non-numeric or non-positive counts", () => {
    expect(() => parseCommand(["talk.mp4", "--threads", "many"])).toThrow(ValidationError);
    expect(() => parseCommand(["batch", "/videos", "--workers", "0"])).toThrow(/^workers: /);
  });

  it("parses batch options", () => {
    expect(parseCommand(["batch", "/videos", "--concurrent", "--workers", "3", "--resume"])).toEqual({
      command: "batch",
      inputDir: "/videos",
      resume: true,
      concurrent: true,
      workers: 3,
    });
  });

  it("requires a directory for batch", () => {
    expect(() => parseCommand(["batch"])).toThrow("inputDir: No input directory specified");
  });

  it("parses convert and requires --to", () => {
    expect(parseCommand(["convert", "a.vtt", "--to", "srt"])).toEqual({ command: "convert", input: "a.vtt", to: "srt" });
    expect(() => parseCommand(["convert", "a.vtt"])).toThrow("to: --to is required");
  });

  it("parses models actions, listing by default", () => {
    expect(parseCommand(["models"])).toEqual({ command: "models", action: "list" });
    expect(parseCommand(["models", "download", "tiny", "--force"])).toEqual({
      command: "models",
      action: "download",
      name: "tiny",
      force: true,
    });
    expect(parseCommand(["models", "delete", "tiny"])).toEqual({ command: "models", action: "delete", name: "tiny" });
    expect(() => parseCommand(["models", "download"])).toThrow("name: Model name required");
  });

  it("parses formats", () => {
    expect(parseCommand(["formats"])).toEqual({ command: "formats" });
  });

  it("rejects unknown options", () => {
    expect(() => parseCommand(["talk.mp4", "--colour"])).toThrow(ValidationError);
  });
});
