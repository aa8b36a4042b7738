import { logger } from "./logging.js";

/**
 * Wrap a promise with a timeout.
 * @param promise The promise to await
 * @param ms Timeout in milliseconds
 * @param label Label for error message
 * @returns Result of the promise
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  ms: number,
  label: string = "operation",
): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new Error(`${label} timed out after ${ms}ms`)), ms);
  });
  try {
    return await Promise.race([promise, timeout]);
  } finally {
    if (timer) clearTimeout(timer);
  }
}

/**
 * Retry an async operation with linear backoff.
 * `shouldRetry` can short-circuit on errors that will not improve (bad input, 4xx).
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  opts: {
    retries?: number;
    delayMs?: number;
    label?: string;
    shouldRetry?: (err: Error) => boolean;
  } = {},
): Promise<T> {
  const { retries = 2, delayMs = 500, label = "operation", shouldRetry = () => true } = opts;
  let lastErr: Error = new Error(`${label} was not attempted`);
  for (let attempt = 0; attempt <= retries; attempt++) {
    try {
      return await fn();
    } catch (e: unknown) {
      lastErr = e instanceof Error ? e : new Error(String(e));
      if (!shouldRetry(lastErr)) throw lastErr;
      if (attempt < retries) {
        const wait = delayMs * (attempt + 1);
        logger.warn(`${label} attempt ${attempt + 1} failed, retrying in ${wait}ms: ${lastErr.message}`);
        await sleep(wait);
      }
    }
  }
  throw lastErr;
}

export async function sleep(ms: number): Promise<void> {
  await new Promise<void>((resolve) => {
    setTimeout(resolve, ms);
  });
}
