import { AppError } from "./app-error.js";

export interface RetryAttempt {
  /** 1-based number of the retry about to run. */
  attempt: number;
  maxRetries: number;
  delayMs: number;
  error: unknown;
}

export interface RetryOptions {
  /** Retries after the first call. Default 3. */
  maxRetries?: number;
  /** Default 1000. */
  baseDelayMs?: number;
  /** Default 10000. */
  maxDelayMs?: number;
  onRetry?: (info: RetryAttempt) => void;
}

const DEFAULT_MAX_RETRIES = 3;
const DEFAULT_BASE_DELAY_MS = 1_000;
const DEFAULT_MAX_DELAY_MS = 10_000;

/** A 4xx AppError is final. Other AppErrors retry only when 5xx; unknown errors always retry. */
function shouldRetry(error: unknown): boolean {
  if (!AppError.isAppError(error)) return true;
  if (error.statusCode >= 400 && error.statusCode < 500) return false;
  return error.statusCode >= 500;
}

/** Doubling backoff capped at maxDelayMs, scaled by a random factor in [0.5, 1). */
function backoffDelay(retryIndex: number, baseDelayMs: number, maxDelayMs: number): number {
  const capped = Math.min(maxDelayMs, baseDelayMs * 2 ** retryIndex);
  return Math.floor(capped * (0.5 + Math.random() * 0.5));
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/** Runs `fn`, retrying failures that {@link shouldRetry} accepts, and rethrows the last error. */
export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const maxRetries = options.maxRetries ?? DEFAULT_MAX_RETRIES;
  const baseDelayMs = options.baseDelayMs ?? DEFAULT_BASE_DELAY_MS;
  const maxDelayMs = options.maxDelayMs ?? DEFAULT_MAX_DELAY_MS;

  for (let retryIndex = 0; ; retryIndex++) {
    try {
      return await fn();
    } catch (error: unknown) {
      if (retryIndex >= maxRetries || !shouldRetry(error)) throw error;

      const delayMs = backoffDelay(retryIndex, baseDelayMs, maxDelayMs);
      options.onRetry?.({ attempt: retryIndex + 1, maxRetries, delayMs, error });
      await sleep(delayMs);
    }
  }
}
