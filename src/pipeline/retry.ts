import { setTimeout as delay } from 'node:timers/promises';
import { GenerationCancelledError, RateLimitError, StoryPipelineError } from '../errors.js';

export type RetryPolicy = {
  /** Total calls, first attempt included */
  maxAttempts: number;
  backoffBaseMs: number;
  backoffMaxMs: number;
};

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

/**
 * Timer-based sleep; rejects with GenerationCancelledError when aborted
 */
export const sleep: Sleep = async (ms, signal) => {
  try {
    await delay(ms, undefined, { signal });
  } catch (error) {
    if (signal?.aborted) throw new GenerationCancelledError();
    throw error;
  }
};

/**
 * Delay before the attempt after `attempt` failed:
 * backoffBaseMs * 2^(attempt-1), raised to the provider's Retry-After,
 * capped at backoffMaxMs.
 */
export function backoffDelay(policy: RetryPolicy, attempt: number, error?: unknown): number {
  const exponential = policy.backoffBaseMs * 2 ** (attempt - 1);
  const retryAfter = error instanceof RateLimitError ? error.retryAfterMs ?? 0 : 0;
  return Math.min(Math.max(exponential, retryAfter), policy.backoffMaxMs);
}

export function isRetryable(error: unknown): boolean {
  return error instanceof StoryPipelineError && error.retryable;
}

export type RetryOutcome<T> =
  | { ok: true; value: T; attempts: number }
  | { ok: false; error: unknown; attempts: number };

/**
 * Call `fn` until it succeeds, fails with a non-retryable error, or
 * `maxAttempts` calls have been made. The signal is checked before every
 * attempt and interrupts backoff.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  options: {
    policy: RetryPolicy;
    sleep?: Sleep;
    signal?: AbortSignal;
    onRetry?: (info: { attempt: number; delayMs: number; error: unknown }) => void;
  }
): Promise<RetryOutcome<T>> {
  const { policy, signal, onRetry } = options;
  const wait = options.sleep ?? sleep;
  const maxAttempts = Math.max(1, policy.maxAttempts);

  let attempts = 0;
  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    if (signal?.aborted) {
      return { ok: false, error: new GenerationCancelledError(), attempts };
    }

    attempts = attempt;
    try {
      return { ok: true, value: await fn(attempt), attempts };
    } catch (error) {
      if (!isRetryable(error) || attempt === maxAttempts) {
        return { ok: false, error, attempts };
      }

      const delayMs = backoffDelay(policy, attempt, error);
      onRetry?.({ attempt, delayMs, error });
      try {
        await wait(delayMs, signal);
      } catch (sleepError) {
        return { ok: false, error: sleepError, attempts };
      }
    }
  }

  return { ok: false, error: new GenerationCancelledError(), attempts };
}
