#!/usr/bin/env node
import { getAppContext } from "../context.js";
import { isUrl } from "../pipeline/download.js";
import { moduleLogger } from "../utils/logger.js";
import { EXIT_INTERRUPTED, runCli } from "./commands.js";

const log = moduleLogger("cli");
const controller = new AbortController();

// First Ctrl-C lets a concurrent batch or a URL download wind down; a second
// one exits at once. Sequential runs save their state after every file.
const argv = process.argv.slice(2);
const cancellable = argv.includes("--concurrent") || argv.some(isUrl);
process.on("SIGINT", () => {
  if (cancellable && !controller.signal.aborted) {
    console.error("\nCancelling...");
    controller.abort();
    return;
  }
  console.error("\nOperation cancelled.");
  process.exit(EXIT_INTERRUPTED);
});

runCli(argv, { context: () => getAppContext(), signal: controller.signal })
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    log.fatal({ err }, "CLI crashed");
    process.exitCode = 1;
  });
