import { setTimeout as sleep } from 'node:timers/promises';
import { RequestCancelledError } from '@domain/errors/domain.errors';
import { getErrorInfo } from '../../common/error-assertions';

/**
 * How a backend call is retried. `backoff(n)` is the delay in milliseconds
 * before the n-th retry (n starts at 1).
 */
export interface RetryPolicy {
  readonly maxRetries: number;
  backoff(retry: number): number;
  isRetryable(error: unknown): boolean;
}

export interface RetryAttemptInfo {
  retry: number;
  delayMs: number;
  error: unknown;
}

export interface RetryOptions {
  signal?: AbortSignal;
  onRetry?: (info: RetryAttemptInfo) => void;
}

export const DEFAULT_MAX_RETRIES = 3;
export const DEFAULT_RETRY_BASE_DELAY_MS = 1000;

const TRANSIENT_STATUSES: ReadonlySet<number> = new Set([408, 429, 500, 502, 503, 504]);
const TRANSIENT_CODES: ReadonlySet<string> = new Set([
  'ECONNRESET',
  'ETIMEDOUT',
  'ECONNREFUSED',
  'ENOTFOUND',
  'EAI_AGAIN',
  'EPIPE',
  'UND_ERR_SOCKET',
  'UND_ERR_CONNECT_TIMEOUT',
]);
const TRANSIENT_NAMES: ReadonlySet<string> = new Set([
  'RateLimitError',
  'APIConnectionError',
  'APIConnectionTimeoutError',
  'InternalServerError',
]);

export class RetryExhaustedError extends Error {
  constructor(readonly attempts: number, readonly lastError: unknown) {
    super(`max retries exceeded after ${attempts} attempts: ${getErrorInfo(lastError).message}`, {
      cause: lastError,
    });
    this.name = 'RetryExhaustedError';
  }
}

/** 2^(retry-1) × base: 1×, 2×, 4×, ... */
export function exponentialBackoff(baseDelayMs: number): (retry: number) => number {
  return (retry) => 2 ** (retry - 1) * baseDelayMs;
}

/**
 * Rate limits, gateway errors, timeouts and dropped connections. Looks through
 * up to three levels of `cause`.
 */
export function isTransientError(error: unknown, depth = 0): boolean {
  if (typeof error !== 'object' || error === null || depth > 3) return false;

  if ('status' in error && typeof error.status === 'number') {
    if (TRANSIENT_STATUSES.has(error.status)) return true;
  }
  if ('code' in error && typeof error.code === 'string' && TRANSIENT_CODES.has(error.code)) {
    return true;
  }
  if (error instanceof Error && TRANSIENT_NAMES.has(error.name)) return true;
  if (error instanceof Error && TRANSIENT_NAMES.has(error.constructor.name)) return true;

  return 'cause' in error ? isTransientError(error.cause, depth + 1) : false;
}

export function createRetryPolicy(
  options: Partial<RetryPolicy> & { baseDelayMs?: number } = {}
): RetryPolicy {
  const maxRetries = options.maxRetries ?? DEFAULT_MAX_RETRIES;
  if (!Number.isInteger(maxRetries) || maxRetries < 0) {
    throw new Error('maxRetries must be a non-negative integer');
  }
  return {
    maxRetries,
    backoff:
      options.backoff ?? exponentialBackoff(options.baseDelayMs ?? DEFAULT_RETRY_BASE_DELAY_MS),
    isRetryable: options.isRetryable ?? ((error) => isTransientError(error)),
  };
}

/**
 * Runs `operation` until it succeeds, fails with a non-retryable error, or
 * `maxRetries + 1` attempts have failed. Aborting `signal` cancels a pending
 * sleep and turns any later failure into `RequestCancelledError`.
 */
export async function callWithRetry<T>(
  operation: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  options: RetryOptions = {}
): Promise<T> {
  const { signal, onRetry } = options;
  let lastError: unknown;

  for (let attempt = 0; attempt <= policy.maxRetries; attempt++) {
    if (attempt > 0) {
      const delayMs = policy.backoff(attempt);
      onRetry?.({ retry: attempt, delayMs, error: lastError });
      await pause(delayMs, signal);
    }
    if (signal?.aborted) throw new RequestCancelledError(signal.reason);

    try {
      return await operation(attempt);
    } catch (error) {
      if (signal?.aborted) throw new RequestCancelledError(error);
      if (!policy.isRetryable(error)) throw error;
      lastError = error;
    }
  }

  throw new RetryExhaustedError(policy.maxRetries + 1, lastError);
}

async function pause(delayMs: number, signal?: AbortSignal): Promise<void> {
  try {
    await sleep(delayMs, undefined, { signal });
  } catch (error) {
    if (signal?.aborted) throw new RequestCancelledError(error);
    throw error;
  }
}
