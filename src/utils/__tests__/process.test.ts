import { describe, expect, it } from "vitest";
import { runCommand } from "../process.js";
import { CommandError } from "../errors.js";

// Uses the running Node binary as a portable child process
const node = process.execPath;

describe("runCommand", () => {
  it("collects stdout and stderr", async () => {
    const result = await runCommand(node, ["-e", "process.stdout.write('out'); process.stderr.write('err')"]);
    expect(result.exitCode).toBe(0);
    expect(result.stdout).toBe("out");
    expect(result.stderr).toBe("err");
    expect(result.output).toContain("out");
    expect(result.output).toContain("err");
  });

  it("rejects with CommandError on a non-zero exit", async () => {
    const run = runCommand(node, ["-e", "process.stderr.write('bad model'); process.exit(3)"]);
    await expect(run).rejects.toBeInstanceOf(CommandError);
    await expect(run).rejects.toMatchObject({ exitCode: 3, stderr: "bad model", output: "bad model" });
  });

  it("rejects with exit code -1 when the command cannot start", async () => {
    await expect(runCommand("./definitely-not-a-command", [])).rejects.toMatchObject({ exitCode: -1 });
  });
});
