/**
 * Retry with exponential backoff
 *
 * Delay before attempt n+1 is min(baseDelayMs * 2^(n-1), maxDelayMs).
 */

import type { Logger } from "../logging/logger";

export interface RetryOptions {
  maxRetries?: number; // total attempts (default: 3)
  baseDelayMs?: number; // default: 1000
  maxDelayMs?: number; // default: 10000
  label?: string; // used in log lines
  logger?: Logger;
  sleep?: (ms: number) => Promise<void>;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function backoffDelay(
  attempt: number,
  baseDelayMs: number = 1000,
  maxDelayMs: number = 10000
): number {
  return Math.min(baseDelayMs * Math.pow(2, attempt - 1), maxDelayMs);
}

/**
 * Run an async operation, retrying on failure
 */
export async function withRetry<T>(
  operation: () => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const maxRetries = Math.max(1, options.maxRetries ?? 3);
  const wait = options.sleep ?? sleep;
  const label = options.label ?? "operation";
  let lastError: unknown = null;

  for (let attempt = 1; attempt <= maxRetries; attempt++) {
    try {
      return await operation();
    } catch (error) {
      lastError = error;
      options.logger?.warn(`${label} attempt ${attempt}/${maxRetries} failed`, {
        error: error instanceof Error ? error.message : String(error),
      });

      if (attempt < maxRetries) {
        await wait(backoffDelay(attempt, options.baseDelayMs, options.maxDelayMs));
      }
    }
  }

  const reason = lastError instanceof Error ? lastError.message : String(lastError);
  throw new Error(`${label} failed after ${maxRetries} attempts: ${reason}`, {
    cause: lastError,
  });
}
