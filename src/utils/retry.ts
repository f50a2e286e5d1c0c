/**
 * Retry with exponential backoff for source connection attempts.
 *
 * Only transient network failures are retried. Authentication errors and
 * unknown databases fail immediately since another attempt cannot succeed.
 */

import { errorCode } from './errors.js';

export interface RetryOptions {
  maxRetries?: number;         // default: 2
  initialDelayMs?: number;     // default: 500
  maxDelayMs?: number;         // default: 10000
  backoffMultiplier?: number;  // default: 2
  retryableCodes?: string[];   // error codes to retry (default: TRANSIENT_ERROR_CODES)
  onRetry?: (error: Error, attempt: number) => void;
  /** Custom retryable check. Return true to retry, false to not, undefined to fall through to defaults. */
  isRetryable?: (error: Error) => boolean | undefined;
}

export const TRANSIENT_ERROR_CODES = [
  'ECONNREFUSED',
  'ECONNRESET',
  'ETIMEDOUT',
  'ENOTFOUND',
  'EHOSTUNREACH',
  'EAI_AGAIN',
  'PROTOCOL_CONNECTION_LOST',
];

const DEFAULT_OPTIONS: Required<Omit<RetryOptions, 'onRetry' | 'isRetryable'>> = {
  maxRetries: 2,
  initialDelayMs: 500,
  maxDelayMs: 10000,
  backoffMultiplier: 2,
  retryableCodes: TRANSIENT_ERROR_CODES,
};

/**
 * Execute a function with retry logic.
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const opts = { ...DEFAULT_OPTIONS, ...options };

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      if (!isRetryableError(error, opts.retryableCodes, options.isRetryable)) {
        throw error;
      }

      if (attempt >= opts.maxRetries) {
        throw error;
      }

      const baseDelay = calculateBackoff(attempt, opts.initialDelayMs, opts.backoffMultiplier);
      const delayMs = Math.min(addJitter(baseDelay), opts.maxDelayMs);

      if (options.onRetry && error instanceof Error) {
        options.onRetry(error, attempt + 1);
      }

      await sleep(delayMs);
    }
  }
}

/**
 * Check if an error is retryable.
 */
function isRetryableError(
  error: unknown,
  retryableCodes: string[],
  customCheck?: (error: Error) => boolean | undefined,
): boolean {
  if (!(error instanceof Error)) {
    return false;
  }

  if (customCheck) {
    const result = customCheck(error);
    if (result !== undefined) return result;
  }

  const code = errorCode(error);
  return code !== undefined && retryableCodes.includes(code);
}

/**
 * Calculate exponential backoff delay.
 */
function calculateBackoff(attempt: number, initialDelayMs: number, multiplier: number): number {
  return initialDelayMs * Math.pow(multiplier, attempt);
}

/**
 * Add jitter to prevent thundering herd.
 * Returns a value between 0.5x and 1.5x the input.
 */
function addJitter(delayMs: number): number {
  const jitterFactor = 0.5 + Math.random();
  return Math.floor(delayMs * jitterFactor);
}

function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}
