/**
 * Retry with capped exponential backoff.
 *
 * Used for readiness gating: the store is retried a bounded number of
 * times before API startup is aborted, the broker is retried forever.
 */
import { setTimeout as delay } from 'node:timers/promises';
import type { Result } from '@/core/result.js';
import { ok, err } from '@/core/result.js';
import { toError } from '@/core/errors.js';

// ─── Types ──────────────────────────────────────────────────────

export interface BackoffOptions {
  /** Delay before the second attempt. Defaults to 500ms. */
  initialDelayMs?: number;
  /** Upper bound for any single delay. Defaults to 10s. */
  maxDelayMs?: number;
  /** Multiplier applied per attempt. Defaults to 2. */
  factor?: number;
}

export interface RetryOptions extends BackoffOptions {
  /** Attempts before giving up. `Infinity` retries until aborted. */
  maxAttempts: number;
  /** Stops retrying; the pending delay is cut short. */
  signal?: AbortSignal;
  /** Called after every failed attempt that will be retried. */
  onRetry?: (info: { attempt: number; delayMs: number; error: Error }) => void;
  /** Injected for tests. */
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

export interface RetryFailure {
  attempts: number;
  lastError: Error;
  aborted: boolean;
}

// ─── Helpers ────────────────────────────────────────────────────

/** Delay that follows the given (1-based) failed attempt. */
export function computeBackoffDelay(attempt: number, options: BackoffOptions = {}): number {
  const { initialDelayMs = 500, maxDelayMs = 10_000, factor = 2 } = options;
  const raw = initialDelayMs * factor ** Math.max(0, attempt - 1);
  return Math.min(raw, maxDelayMs);
}

async function defaultSleep(ms: number, signal?: AbortSignal): Promise<void> {
  await delay(ms, undefined, { signal });
}

// ─── Retry ──────────────────────────────────────────────────────

/** Run `operation` until it resolves, the attempts run out, or `signal` aborts. */
export async function retryWithBackoff<T>(
  operation: (attempt: number) => Promise<T>,
  options: RetryOptions,
): Promise<Result<T, RetryFailure>> {
  const { maxAttempts, signal, onRetry, sleep = defaultSleep } = options;
  let lastError: Error = new Error('No attempt made');

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    if (signal?.aborted) {
      return err({ attempts: attempt - 1, lastError, aborted: true });
    }

    try {
      return ok(await operation(attempt));
    } catch (error) {
      lastError = toError(error);
    }

    if (attempt === maxAttempts) break;

    const delayMs = computeBackoffDelay(attempt, options);
    onRetry?.({ attempt, delayMs, error: lastError });

    try {
      await sleep(delayMs, signal);
    } catch {
      return err({ attempts: attempt, lastError, aborted: true });
    }
  }

  return err({ attempts: maxAttempts, lastError, aborted: false });
}
