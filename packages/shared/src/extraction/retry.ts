/**
 * Retry State
 *
 * Explicit attempt counter threaded through the session loop. Backoff
 * doubles per attempt: base, 2 * base, 4 * base, ...
 */

import { setTimeout as delay } from 'node:timers/promises';

export interface RetryPolicy {
  /** Total attempts, including the first */
  maxRetries: number;
  backoffBaseMs: number;
}

export interface RetryState {
  /** Zero-based, always < maxRetries */
  attempt: number;
  /** Delay to wait after this attempt fails, if another one remains */
  backoffMs: number;
}

/** Rejects early when the signal fires */
export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxRetries: 3,
  backoffBaseMs: 1000,
};

export const sleep: Sleep = async (ms, signal) => {
  await delay(ms, undefined, { signal });
};

export function backoffDelayMs(attempt: number, backoffBaseMs: number): number {
  return backoffBaseMs * 2 ** attempt;
}

export function initialRetryState(policy: RetryPolicy): RetryState {
  if (!Number.isInteger(policy.maxRetries) || policy.maxRetries < 1) {
    throw new Error(`maxRetries must be a positive integer, got ${policy.maxRetries}`);
  }
  return { attempt: 0, backoffMs: backoffDelayMs(0, policy.backoffBaseMs) };
}

/**
 * State for the next attempt, or null once the budget is spent
 */
export function nextRetryState(state: RetryState, policy: RetryPolicy): RetryState | null {
  const attempt = state.attempt + 1;
  if (attempt >= policy.maxRetries) {
    return null;
  }
  return { attempt, backoffMs: backoffDelayMs(attempt, policy.backoffBaseMs) };
}
