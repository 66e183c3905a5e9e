import { moduleLogger } from "./logger.js";

const log = moduleLogger("retry");

type ErrorClass = abstract new (...args: never[]) => Error;

export interface RetryOptions {
  maxAttempts?: number;
  delayMs?: number; // wait before the second attempt
  backoff?: number; // multiplier applied to the delay after each failure
  retryOn?: ErrorClass[] | ((err: unknown) => boolean);
  label?: string;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function shouldRetry(err: unknown, retryOn: RetryOptions["retryOn"]): boolean {
  if (!retryOn) return true;
  if (typeof retryOn === "function") return retryOn(err);
  return retryOn.some((cls) => err instanceof cls);
}

/**
 * Runs `operation` until it succeeds or `maxAttempts` is reached, waiting
 * `delayMs * backoff^(n-1)` between attempts. Errors not matched by `retryOn`
 * are re-thrown at once; after the last attempt the last error is re-thrown.
 */
export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const maxAttempts = Math.max(1, options.maxAttempts ?? 3);
  const backoff = options.backoff ?? 2;
  const label = options.label ?? "operation";
  let delayMs = options.delayMs ?? 1000;

  for (let attempt = 1; ; attempt++) {
    try {
      return await operation(attempt);
    } catch (err) {
      if (!shouldRetry(err, options.retryOn)) throw err;
      if (attempt >= maxAttempts) {
        log.error({ err, attempts: attempt }, `${label} failed after ${attempt} attempts`);
        throw err;
      }
      log.warn(
        { err, attempt, maxAttempts },
        `${label} failed (attempt ${attempt}/${maxAttempts}), retrying in ${(delayMs / 1000).toFixed(1)}s`
      );
      await sleep(delayMs);
      delayMs *= backoff;
    }
  }
}
