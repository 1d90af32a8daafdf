export interface BackoffOptions {
  attempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export const DEFAULT_BACKOFF: BackoffOptions = {
  attempts: 5,
  baseDelayMs: 200,
  maxDelayMs: 10000,
};

export function backoffDelay(attempt: number, opts: BackoffOptions): number {
  return Math.min(opts.baseDelayMs * Math.pow(2, attempt), opts.maxDelayMs);
}

export const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

export class RetriesExhausted extends Error {
  public readonly attempts: number;
  public readonly lastError: unknown;

  constructor(attempts: number, lastError: unknown) {
    super(`gave up after ${attempts} attempt(s)`);
    this.name = "RetriesExhausted";
    this.attempts = attempts;
    this.lastError = lastError;
  }
}

/** Runs `fn` until it resolves, waiting base·2^n ms (capped) between failures. */
export async function withBackoff<T>(
  fn: (attempt: number) => Promise<T>,
  opts: BackoffOptions = DEFAULT_BACKOFF,
  onRetry?: (attempt: number, delayMs: number, err: unknown) => void,
): Promise<T> {
  let lastError: unknown;
  for (let attempt = 0; attempt < opts.attempts; attempt++) {
    try {
      return await fn(attempt);
    } catch (err) {
      lastError = err;
      if (attempt < opts.attempts - 1) {
        const delay = backoffDelay(attempt, opts);
        onRetry?.(attempt, delay, err);
        await sleep(delay);
      }
    }
  }
  throw new RetriesExhausted(opts.attempts, lastError);
}
