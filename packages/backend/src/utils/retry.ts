import { AbortError, NetworkError } from '../types/error.js';
import type { RetryPolicy } from '../types/config.js';
import { sleep } from './abort.js';

export type RetryOptions = {
  readonly policy: RetryPolicy;
  /** Ends the wait between attempts; no attempt starts once aborted. */
  readonly signal?: AbortSignal;
  readonly onRetry?: (error: NetworkError, attempt: number, delayMs: number) => void;
};

export function calculateBackoff(
  attempt: number,
  initialDelayMs: number,
  maxDelayMs: number,
  backoffMultiplier: number,
): number {
  return Math.min(initialDelayMs * backoffMultiplier ** attempt, maxDelayMs);
}

// Server-requested delay wins, unless it exceeds what the policy allows.
function delayFor(error: NetworkError, attempt: number, policy: RetryPolicy): number | null {
  if (error.retryAfter !== null) {
    return error.retryAfter > policy.maxDelayMs ? null : error.retryAfter;
  }
  const base = calculateBackoff(attempt, policy.initialDelayMs, policy.maxDelayMs, policy.backoffMultiplier);
  return base * (1 + Math.random() * 0.25);
}

function throwIfAborted(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw new AbortError('Retry was aborted');
  }
}

/**
 * Retries a single request with exponential backoff.
 *
 * Only wrap one atomic request. Once an event stream has started delivering
 * events it must not be retried: the backend would replay or drop events.
 */
export async function retry<T>(fn: () => Promise<T>, options: RetryOptions): Promise<T> {
  const { policy, signal, onRetry } = options;

  for (let attempt = 0; ; attempt++) {
    throwIfAborted(signal);
    try {
      return await fn();
    } catch (error) {
      if (!(error instanceof NetworkError) || !error.retryable || attempt >= policy.maxRetries) {
        throw error;
      }
      const delayMs = delayFor(error, attempt, policy);
      if (delayMs === null) {
        throw error;
      }
      onRetry?.(error, attempt + 1, delayMs);
      await sleep(delayMs, signal);
    }
  }
}
