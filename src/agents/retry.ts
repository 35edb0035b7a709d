import { CancelledError, TransientInferenceError } from "../errors";

export type RetryOptions = {
  maxRetries: number;
  initialDelayMs: number;
  maxDelayMs?: number;
  backoffMultiplier?: number;
  signal?: AbortSignal;
  onRetry?: (attempt: number, delayMs: number, error: TransientInferenceError) => void;
};

export function calculateBackoffDelay(attempt: number, options: RetryOptions): number {
  const multiplier = options.backoffMultiplier ?? 2;
  const maxDelay = options.maxDelayMs ?? 30000;
  return Math.min(options.initialDelayMs * Math.pow(multiplier, attempt - 1), maxDelay);
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) {
    return Promise.reject(new CancelledError());
  }
  return new Promise((resolve, reject) => {
    const onAbort = () => {
      clearTimeout(timer);
      reject(new CancelledError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

// Only TransientInferenceError is retried; anything else propagates on the first throw.
export async function withRetry<T>(fn: (attempt: number) => Promise<T>, options: RetryOptions): Promise<T> {
  let attempt = 0;
  while (true) {
    attempt += 1;
    try {
      return await fn(attempt);
    } catch (error) {
      if (!(error instanceof TransientInferenceError) || attempt > options.maxRetries) {
        throw error;
      }
      if (options.signal?.aborted) {
        throw new CancelledError();
      }
      const delayMs = calculateBackoffDelay(attempt, options);
      options.onRetry?.(attempt, delayMs, error);
      await sleep(delayMs, options.signal);
    }
  }
}
