/**
 * Exponential backoff retry with jitter.
 *
 * Off by default (maxRetries = 0). Only failures an UpstreamError marks as
 * retryable are retried; every retry is reported through `onRetry`.
 */

import { UpstreamError } from "@speech-gateway/shared-types";

export interface RetryOptions {
  /** Maximum number of retry attempts after the first. */
  readonly maxRetries: number;
  /** Initial delay in ms before first retry. */
  readonly baseDelayMs: number;
  /** Maximum delay in ms between retries. */
  readonly maxDelayMs: number;
  /** Abort signal for cancellation. */
  readonly signal?: AbortSignal | undefined;
  /** Called before each retry. */
  readonly onRetry?: ((err: UpstreamError, attempt: number, delayMs: number) => void) | undefined;
}

const DEFAULT_OPTIONS: RetryOptions = {
  maxRetries: 0,
  baseDelayMs: 250,
  maxDelayMs: 5_000,
};

/** Check if an error is transient and worth retrying. */
export function isRetryable(err: unknown): err is UpstreamError {
  return err instanceof UpstreamError && err.retryable;
}

/**
 * Execute a function with exponential backoff retry.
 * Only retries on retryable upstream errors.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  opts?: Partial<RetryOptions>,
): Promise<T> {
  const options = { ...DEFAULT_OPTIONS, ...opts };

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn(attempt);
    } catch (err) {
      if (!isRetryable(err) || attempt >= options.maxRetries || options.signal?.aborted) {
        throw err;
      }

      const exponentialDelay = options.baseDelayMs * Math.pow(2, attempt);
      const jitter = Math.random() * options.baseDelayMs;
      const delay = Math.min(exponentialDelay + jitter, options.maxDelayMs);

      options.onRetry?.(err, attempt + 1, delay);
      await sleep(delay, options.signal);
    }
  }
}

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(new Error("Retry cancelled"));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}
