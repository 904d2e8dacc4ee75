export interface RetryPolicy {
  attempts: number;
  delayMs: number;
  shouldRetry: (error: unknown) => boolean;
  sleep?: (ms: number) => Promise<void>;
}

export class RetriesExhaustedError extends Error {
  readonly attempts: number;

  readonly lastError: unknown;

  constructor(attempts: number, lastError: unknown) {
    super(`Gave up after ${attempts} attempts: ${describeError(lastError)}`);
    this.name = "RetriesExhaustedError";
    this.attempts = attempts;
    this.lastError = lastError;
  }
}

export const DEFAULT_RETRY_ATTEMPTS = 6;
export const DEFAULT_RETRY_DELAY_MS = 3_000;

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Runs `fn` until it succeeds, a failure is rejected by `shouldRetry`, or
 * `attempts` calls have been made. The wait between attempts is fixed.
 */
export async function withRetry<T>(fn: () => Promise<T>, policy: RetryPolicy): Promise<T> {
  const { attempts, delayMs, shouldRetry } = policy;
  const wait = policy.sleep ?? sleep;
  if (!Number.isInteger(attempts) || attempts < 1) {
    throw new RangeError(`Retry attempts must be a positive integer, got ${attempts}`);
  }

  let attempt = 0;
  while (true) {
    attempt += 1;
    try {
      return await fn();
    } catch (error) {
      if (!shouldRetry(error)) {
        throw error;
      }
      if (attempt >= attempts) {
        throw new RetriesExhaustedError(attempt, error);
      }
      await wait(delayMs);
    }
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

export function safeJsonParse(input: string): unknown {
  try {
    return JSON.parse(input);
  } catch (_error) {
    return null;
  }
}
