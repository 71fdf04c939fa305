/**
 * @quire/gateway — Retry with exponential backoff.
 *
 * Wraps provider calls so a timeout or a 5xx does not turn straight into a
 * failed charge. Only transient ProviderErrors are retried; a decline is
 * final on the first answer.
 *
 * Backoff: min(baseDelayMs * 2^attempt + random(0, jitterMs), maxDelayMs)
 */

import { ProviderError } from "@quire/types";

export interface RetryConfig {
  /** Attempts including the first. Default: 3 */
  readonly maxAttempts: number;
  /** Default: 500 */
  readonly baseDelayMs: number;
  /** Default: 10000 */
  readonly maxDelayMs: number;
  /** Default: 250 */
  readonly jitterMs: number;
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxAttempts: 3,
  baseDelayMs: 500,
  maxDelayMs: 10000,
  jitterMs: 250,
};

export class RetryExhaustedError extends Error {
  constructor(
    public readonly attempts: number,
    public readonly lastError: unknown,
  ) {
    const msg = lastError instanceof Error ? lastError.message : String(lastError);
    super(`All ${attempts} attempts exhausted. Last error: ${msg}`);
    this.name = "RetryExhaustedError";
  }
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * @param attempt - Zero-based retry index (0 = first retry)
 */
export function computeDelay(attempt: number, config: RetryConfig): number {
  const exponential = config.baseDelayMs * Math.pow(2, attempt);
  const jitter = Math.random() * config.jitterMs;
  return Math.min(exponential + jitter, config.maxDelayMs);
}

/**
 * Run `fn` until it succeeds, `shouldRetry` rejects an error, or the
 * attempts run out.
 *
 * @throws RetryExhaustedError if every attempt failed with a retryable error
 * @throws the original error if shouldRetry returns false
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  config: RetryConfig = DEFAULT_RETRY_CONFIG,
  shouldRetry: (err: unknown) => boolean = isTransientProviderError,
  sleepFn: (ms: number) => Promise<void> = sleep,
): Promise<T> {
  let lastError: unknown;

  for (let attempt = 0; attempt < config.maxAttempts; attempt++) {
    try {
      return await fn();
    } catch (err: unknown) {
      lastError = err;

      if (!shouldRetry(err)) {
        throw err;
      }

      if (attempt < config.maxAttempts - 1) {
        await sleepFn(computeDelay(attempt, config));
      }
    }
  }

  throw new RetryExhaustedError(config.maxAttempts, lastError);
}

export function isTransientProviderError(err: unknown): boolean {
  return err instanceof ProviderError && err.kind === "transient";
}
