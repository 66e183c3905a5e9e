import { pino } from "pino";
import type { Logger } from "pino";

export const logger: Logger = pino({
  level: process.env.LOG_LEVEL || "info",
  base: { pid: process.pid },
});

export function moduleLogger(module: string): Logger {
  return logger.child({ module });
}
