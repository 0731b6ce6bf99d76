/**
 * Drama Collector — Retry Policy
 *
 * Backoff is an explicit value rather than a loop counter so the aggregator
 * can be driven (and tested) one attempt at a time.
 */

export interface RetryPolicy {
  /** Retries after the first attempt */
  maxRetries: number;
  baseDelayMs: number;
  factor?: number;
  maxDelayMs?: number;
}

export interface RetryState {
  /** Attempts made so far */
  attempt: number;
  /** Delay before the next attempt */
  nextDelayMs: number;
}

const DEFAULT_FACTOR = 2;
const DEFAULT_MAX_DELAY_MS = 60_000;

function delayFor(retryIndex: number, policy: RetryPolicy): number {
  const factor = policy.factor ?? DEFAULT_FACTOR;
  const maxDelay = policy.maxDelayMs ?? DEFAULT_MAX_DELAY_MS;
  return Math.min(maxDelay, Math.round(policy.baseDelayMs * factor ** retryIndex));
}

export function initialRetryState(policy: RetryPolicy): RetryState {
  return { attempt: 0, nextDelayMs: delayFor(0, policy) };
}

/**
 * True when another attempt is allowed after `state.attempt` attempts.
 * The first attempt is always allowed.
 */
export function canRetry(state: RetryState, policy: RetryPolicy): boolean {
  return state.attempt <= policy.maxRetries;
}

/**
 * Record one finished attempt.
 */
export function advanceRetryState(state: RetryState, policy: RetryPolicy): RetryState {
  const attempt = state.attempt + 1;
  return {
    attempt,
    nextDelayMs: delayFor(Math.max(0, attempt - 1), policy),
  };
}
