import { spawn } from "node:child_process";
import { CommandError } from "./errors.js";

export interface CommandResult {
  stdout: string;
  stderr: string;
  output: string; // stdout and stderr interleaved in arrival order
  exitCode: number;
}

export async function runCommand(command: string, args: string[], options?: { cwd?: string; timeoutMs?: number; env?: Record<string, string>; }): Promise<CommandResult> {
  return new Promise((resolve, reject) => {
    const child = spawn(command, args, {
      cwd: options?.cwd,
      env: { ...process.env, ...options?.env },
      timeout: options?.timeoutMs,
      stdio: ["ignore", "pipe", "pipe"],
    });

    let stdout = "";
    let stderr = "";
    let output = "";
    child.stdout.setEncoding("utf8");
    child.stderr.setEncoding("utf8");
    child.stdout.on("data", (chunk: string) => {
      stdout += chunk;
      output += chunk;
    });
    child.stderr.on("data", (chunk: string) => {
      stderr += chunk;
      output += chunk;
    });

    child.on("error", (err) => {
      reject(
        new CommandError(
          `Command failed to start (${command}): ${err.message}`,
          { exitCode: -1, stdout, stderr, output: output || err.message },
          err
        )
      );
    });

    child.on("close", (code, signal) => {
      const exitCode = typeof code === "number" ? code : 1;
      if (exitCode === 0 && !signal) {
        resolve({ stdout, stderr, output, exitCode });
        return;
      }
      reject(
        new CommandError(
          `Command failed (${command} ${args.join(" ")}): code=${exitCode}${signal ? ` signal=${signal}` : ""}\nSTDERR: ${stderr}\nSTDOUT: ${stdout}`,
          { exitCode, stdout, stderr, output }
        )
      );
    });
  });
}
