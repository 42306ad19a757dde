/**
 * Retry Policy
 *
 * Bounded retry with exponential backoff over generation results. Failures
 * are values here, not exceptions: the policy inspects the failure kind to
 * decide whether another attempt is worth making.
 */

import { loggers } from '../logging';
import { isRetryableFailure } from './errors';
import { GenerationFailure, GenerationResult } from './types';

export interface RetryPolicy {
  /** Total number of attempts, including the first */
  maxAttempts: number;
  /** Delay after the first failed attempt; doubles after each further failure */
  baseDelayMs: number;
  /** Ceiling applied to every computed delay */
  maxDelayMs: number;
  isRetryable: (failure: GenerationFailure) => boolean;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  baseDelayMs: 1000,
  maxDelayMs: 30000,
  isRetryable: isRetryableFailure
};

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = (ms) => new Promise(resolve => setTimeout(resolve, ms));

/**
 * Delay to wait after the given (1-based) failed attempt: 1s, 2s, 4s, ...
 */
export function computeBackoffDelay(policy: RetryPolicy, failedAttempt: number): number {
  const delay = policy.baseDelayMs * 2 ** (failedAttempt - 1);
  return Math.min(delay, policy.maxDelayMs);
}

/**
 * Run `operation` until it succeeds, fails terminally, or attempts run out.
 * On exhaustion the last failure is returned unchanged.
 */
export async function retryGeneration(
  operation: (attempt: number) => Promise<GenerationResult>,
  policy: RetryPolicy = DEFAULT_RETRY_POLICY,
  wait: Sleep = sleep
): Promise<GenerationResult> {
  const maxAttempts = Math.max(1, Math.floor(policy.maxAttempts));
  let result = await operation(1);

  for (let attempt = 1; attempt < maxAttempts; attempt++) {
    if (result.ok || !policy.isRetryable(result.failure)) {
      return result;
    }

    const delay = computeBackoffDelay(policy, attempt);
    loggers.llm.warn(
      { attempt, maxAttempts, delayMs: delay, kind: result.failure.kind },
      'Generation failed, backing off before retrying'
    );
    await wait(delay);
    result = await operation(attempt + 1);
  }

  return result;
}
