import { RateLimitError, TimeoutError, TransientProviderError, isRetryable } from '../errors.js';
import type { Logger } from '../utils/logger.js';
import { sleep as defaultSleep } from '../utils/sleep.js';
import { runWithTimeout } from './timeout.js';

export interface RetryPolicy {
  baseDelayMs: number;
  maxDelayMs: number;
  /** Total attempts including the first. Unbounded when left out; the deadline still applies. */
  maxAttempts?: number | undefined;
  /** Epoch milliseconds after which no further attempt is scheduled. */
  deadline?: number | undefined;
  /** Bounds each single attempt. 0 or left out disables it. */
  attemptTimeoutMs?: number | undefined;
}

export interface RetryState {
  attempt: number;
  nextDelayMs: number;
  deadline: number;
  lastError?: unknown;
}

export interface RetryEvent {
  attempt: number;
  delayMs: number;
  error: RateLimitError | TransientProviderError;
}

export interface RetryHooks {
  signal?: AbortSignal | undefined;
  label?: string | undefined;
  logger?: Logger | undefined;
  onRetry?: ((event: RetryEvent) => void) | undefined;
  sleep?: ((ms: number, signal?: AbortSignal) => Promise<void>) | undefined;
  now?: (() => number) | undefined;
}

/** Delay to wait after the given 1-based attempt fails. */
export function computeBackoffDelay(attempt: number, policy: Pick<RetryPolicy, 'baseDelayMs' | 'maxDelayMs'>): number {
  const exponent = Math.max(0, attempt - 1);
  return Math.min(policy.maxDelayMs, policy.baseDelayMs * 2 ** exponent);
}

/**
 * Runs `operation` until it succeeds, retrying rate-limit and transient
 * provider errors with exponential backoff. Once retries stop, the last
 * error the operation threw is rethrown as is.
 */
export async function callWithRetry<T>(
  operation: (signal: AbortSignal, attempt: number) => Promise<T>,
  policy: RetryPolicy,
  hooks: RetryHooks = {},
): Promise<T> {
  const sleep = hooks.sleep ?? defaultSleep;
  const now = hooks.now ?? Date.now;
  const label = hooks.label ?? 'provider call';
  const signal = hooks.signal ?? new AbortController().signal;
  const state: RetryState = {
    attempt: 0,
    nextDelayMs: policy.baseDelayMs,
    deadline: policy.deadline ?? Number.POSITIVE_INFINITY,
  };

  for (;;) {
    signal.throwIfAborted();
    state.attempt += 1;
    const attempt = state.attempt;

    try {
      return await runAttempt(operation, attempt, policy, signal, label);
    } catch (error) {
      if (signal.aborted || !isRetryable(error)) {
        throw error;
      }
      state.lastError = error;

      const hinted = error instanceof RateLimitError ? (error.retryAfterMs ?? 0) : 0;
      // The previous delay is a floor: a hinted wait is never followed by a shorter one.
      state.nextDelayMs = Math.min(
        policy.maxDelayMs,
        Math.max(computeBackoffDelay(attempt, policy), hinted, state.nextDelayMs),
      );

      if (policy.maxAttempts !== undefined && attempt >= policy.maxAttempts) {
        hooks.logger?.(`${label} failed after ${attempt} attempts (${error.kind}). Giving up.`);
        throw error;
      }
      if (now() + state.nextDelayMs >= state.deadline) {
        hooks.logger?.(`${label} failed (${error.kind}); the next retry would pass the deadline. Giving up.`);
        throw error;
      }

      hooks.onRetry?.({ attempt, delayMs: state.nextDelayMs, error });
      hooks.logger?.(
        `${label} attempt ${attempt} failed (${error.kind}: ${error.message}). Waiting ${state.nextDelayMs}ms before retry #${attempt}.`,
      );
      await sleep(state.nextDelayMs, signal);
    }
  }
}

async function runAttempt<T>(
  operation: (signal: AbortSignal, attempt: number) => Promise<T>,
  attempt: number,
  policy: RetryPolicy,
  signal: AbortSignal,
  label: string,
): Promise<T> {
  if (!policy.attemptTimeoutMs || policy.attemptTimeoutMs <= 0) {
    return operation(signal, attempt);
  }

  try {
    return await runWithTimeout((attemptSignal) => operation(attemptSignal, attempt), policy.attemptTimeoutMs, {
      signal,
      label: `${label} attempt ${attempt}`,
    });
  } catch (error) {
    if (error instanceof TimeoutError && !signal.aborted) {
      throw new TransientProviderError(error.message, { cause: error });
    }
    throw error;
  }
}
