/**
 * Pure utility functions with no I/O of their own
 */

export { withRetry, backoffDelay, sleep, type RetryOptions } from "./retry";
export { tokensToChars, CHARS_PER_TOKEN } from "./token-estimation";
export { mapWithConcurrency } from "./concurrency";
