/**
 * Retry Logic for Outcome-returning operations
 *
 * Operations report failure through an Outcome value instead of throwing.
 * Only 'recoverable' outcomes are retried; a 'fatal' outcome ends the loop.
 */

import type { Outcome } from '../types/index.js';
import { logger } from './logger.js';

const log = logger.retry;

/**
 * Options for retry behavior
 */
export interface RetryOptions {
  /**
   * Maximum number of total attempts (not retries).
   * - maxAttempts: 1 = no retries (just the initial attempt)
   * - maxAttempts: 3 = 1 initial attempt + up to 2 retries
   *
   * @default 3
   */
  maxAttempts?: number;

  /**
   * Delay before the first retry in milliseconds.
   * @default 1000
   */
  initialDelayMs?: number;

  /**
   * Maximum delay between retries in milliseconds.
   * @default 30000
   */
  maxDelayMs?: number;

  /**
   * Multiplier applied to the delay after each retry. 1 keeps it fixed.
   * @default 2
   */
  backoffMultiplier?: number;

  /**
   * Stops the loop before the next attempt once aborted
   */
  signal?: AbortSignal;

  /**
   * Called before waiting for the next attempt
   */
  onRetry?: (attempt: number, reason: string, delayMs: number) => void;
}

export interface RetryResult<T> {
  outcome: Outcome<T>;
  /** Number of times the operation was invoked */
  attempts: number;
}

const DEFAULT_OPTIONS: Required<Omit<RetryOptions, 'signal'>> = {
  maxAttempts: 3,
  initialDelayMs: 1000,
  maxDelayMs: 30000,
  backoffMultiplier: 2,
  onRetry: () => {},
};

/**
 * Invoke `fn` until it succeeds, fails fatally, or runs out of attempts.
 *
 * Exceptions thrown by `fn` are treated as recoverable failures, so a caller
 * always gets an outcome back.
 *
 * @example
 * ```typescript
 * const { outcome, attempts } = await retryOutcome(
 *   (attempt) => renderOnce(url, attempt),
 *   { maxAttempts: 3, initialDelayMs: 2000, backoffMultiplier: 1 }
 * );
 * ```
 */
export async function retryOutcome<T>(
  fn: (attempt: number) => Promise<Outcome<T>>,
  options: RetryOptions = {}
): Promise<RetryResult<T>> {
  const opts = { ...DEFAULT_OPTIONS, ...options };
  const maxAttempts = Math.max(1, opts.maxAttempts);
  let delay = opts.initialDelayMs;
  let outcome: Outcome<T> = { kind: 'recoverable', reason: 'not attempted' };
  let attempts = 0;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    if (opts.signal?.aborted) {
      return { outcome: { kind: 'fatal', reason: 'aborted' }, attempts };
    }

    attempts = attempt;
    try {
      outcome = await fn(attempt);
    } catch (error) {
      outcome = {
        kind: 'recoverable',
        reason: error instanceof Error ? error.message : String(error),
      };
    }

    if (outcome.kind !== 'recoverable' || attempt === maxAttempts) {
      return { outcome, attempts };
    }

    opts.onRetry(attempt, outcome.reason, delay);

    log.warn('Retry attempt failed', {
      attempt,
      maxAttempts,
      error: outcome.reason,
      retryDelayMs: delay,
    });

    await sleep(delay, opts.signal);

    delay = Math.min(delay * opts.backoffMultiplier, opts.maxDelayMs);
  }

  return { outcome, attempts };
}

/**
 * Resolve after `ms`, or early when the signal aborts
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (ms <= 0 || signal?.aborted) {
      resolve();
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
