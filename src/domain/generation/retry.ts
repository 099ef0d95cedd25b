/**
 * Exponential backoff for rate-limited generation calls
 */

import { describeError } from './errors';

/**
 * Retry policy configuration. Delays are in milliseconds.
 */
export interface RetryOptions {
  /** Nominal wait before the first retry */
  initialDelayMs: number;
  /** Multiplier applied to the nominal wait after each retry */
  exponentialBase: number;
  /** Scale each wait by a random factor in [0.5, 1.5) */
  jitter: boolean;
  /** Retries after the first attempt */
  maxRetries: number;
  /** Upper bound for a single wait */
  maxDelayMs: number;
  /** Which failures are worth retrying */
  isRetryable: (error: unknown) => boolean;
}

/**
 * Hooks for observing retries and controlling time in tests
 */
export interface RetryHooks {
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
  onRetry?: (info: RetryAttempt) => void;
}

export interface RetryAttempt {
  /** 1-based retry number */
  attempt: number;
  maxRetries: number;
  delayMs: number;
  error: unknown;
}

/**
 * Detect rate-limit failures: an HTTP 429 status, or an error text
 * mentioning 429 or "rate limit"
 */
export function isRateLimitError(error: unknown): boolean {
  if (typeof error === 'object' && error !== null && 'status' in error && error.status === 429) {
    return true;
  }

  const message = describeError(error);
  return message.includes('429') || /rate limit/i.test(message);
}

export const DEFAULT_RETRY_OPTIONS: RetryOptions = {
  initialDelayMs: 2000,
  exponentialBase: 2,
  jitter: true,
  maxRetries: 5,
  maxDelayMs: 60000,
  isRetryable: isRateLimitError,
};

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Compute the wait before a retry from the current nominal delay
 */
export function computeRetryDelay(
  nominalDelayMs: number,
  options: Pick<RetryOptions, 'jitter' | 'maxDelayMs'>,
  random: () => number = Math.random,
): number {
  const delay = options.jitter ? nominalDelayMs * (0.5 + random()) : nominalDelayMs;
  return Math.min(delay, options.maxDelayMs);
}

/**
 * Run an operation, retrying retryable failures with exponential backoff.
 * Non-retryable failures are rethrown immediately; once retries are
 * exhausted the last failure is rethrown.
 */
export async function withExponentialBackoff<T>(
  operation: () => Promise<T>,
  options: Partial<RetryOptions> = {},
  hooks: RetryHooks = {},
): Promise<T> {
  const config = { ...DEFAULT_RETRY_OPTIONS, ...options };
  const sleep = hooks.sleep ?? defaultSleep;
  const random = hooks.random ?? Math.random;
  let nominalDelay = config.initialDelayMs;

  for (let attempt = 0; ; attempt++) {
    try {
      return await operation();
    } catch (error) {
      if (attempt >= config.maxRetries || !config.isRetryable(error)) {
        throw error;
      }

      const delayMs = computeRetryDelay(nominalDelay, config, random);
      hooks.onRetry?.({ attempt: attempt + 1, maxRetries: config.maxRetries, delayMs, error });
      await sleep(delayMs);
      nominalDelay *= config.exponentialBase;
    }
  }
}
