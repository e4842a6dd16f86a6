import { performance } from "node:perf_hooks";

export interface TimedResult<T> {
  result: T;
  durationMs: number;
}

export async function measureAsync<T>(fn: () => Promise<T>): Promise<TimedResult<T>> {
  const start = performance.now();
  const result = await fn();
  const durationMs = performance.now() - start;
  return { result, durationMs };
}

export async function sleep(ms: number): Promise<void> {
  await new Promise((resolve) => setTimeout(resolve, ms));
}

export interface BackoffOptions {
  readonly retries: number;
  readonly baseDelayMs: number;
  readonly shouldRetry?: (error: unknown) => boolean;
  readonly onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
}

export async function exponentialBackoff<T>(operation: () => Promise<T>, options: BackoffOptions): Promise<T> {
  const { retries, baseDelayMs, shouldRetry = () => true, onRetry } = options;
  let attempt = 0;
  // eslint-disable-next-line no-constant-condition
  while (true) {
    try {
      return await operation();
    } catch (error) {
      attempt += 1;
      if (attempt > retries || !shouldRetry(error)) {
        throw error;
      }
      const delayMs = baseDelayMs * 2 ** (attempt - 1);
      onRetry?.(error, attempt, delayMs);
      await sleep(delayMs);
    }
  }
}
