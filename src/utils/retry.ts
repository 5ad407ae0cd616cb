/**
 * Retry policy shared by every component that talks to an external service.
 *
 * Metabase and the text-generation API both rate limit, so a failed call is
 * retried after a fixed delay (optionally growing by `backoffFactor`), and only
 * for the error codes the policy names. Anything else fails immediately.
 */

import type { Logger } from 'pino';
import { getConfig } from '../config.js';
import { PipelineError, errorMessage, type ErrorCode } from '../errors.js';
import { getLogger } from './logger.js';

export interface RetryPolicy {
  /** Total attempts, including the first one. */
  maxAttempts: number;
  delayMs: number;
  /** Multiplier applied to the delay after each failed attempt (1 = fixed delay). */
  backoffFactor: number;
  retryable: readonly ErrorCode[];
}

export function defaultRetryPolicy(overrides: Partial<RetryPolicy> = {}): RetryPolicy {
  const config = getConfig();
  return {
    maxAttempts: config.RETRY_MAX_ATTEMPTS,
    delayMs: config.RETRY_DELAY_MS,
    backoffFactor: 2,
    retryable: ['SERVICE_UNAVAILABLE'],
    ...overrides,
  };
}

export function isRetryable(err: unknown, policy: RetryPolicy): boolean {
  return err instanceof PipelineError && policy.retryable.includes(err.code);
}

export function sleep(ms: number): Promise<void> {
  if (ms <= 0) return Promise.resolve();
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Run `fn` under `policy`. The last error is rethrown unchanged once attempts
 * run out, so callers can still branch on its code.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  label: string,
  logger: Logger = getLogger()
): Promise<T> {
  const attempts = Math.max(1, policy.maxAttempts);
  let lastError: unknown;

  for (let attempt = 1; attempt <= attempts; attempt++) {
    if (attempt > 1) {
      const backoffMs = Math.round(policy.delayMs * Math.pow(policy.backoffFactor, attempt - 2));
      logger.info({ label, attempt, backoffMs }, 'Retrying after backoff');
      await sleep(backoffMs);
    }

    try {
      return await fn(attempt);
    } catch (err) {
      lastError = err;

      if (!isRetryable(err, policy)) {
        throw err;
      }

      if (attempt < attempts) {
        logger.warn({ label, attempt, error: errorMessage(err) }, 'Attempt failed');
      }
    }
  }

  throw lastError;
}
