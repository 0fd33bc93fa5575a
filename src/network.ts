/**
 * @fileoverview Remote Call Policies: Retry, Backoff & Timeout
 *
 * Every repository call to Supabase goes through {@link withRetry}, which
 * races each attempt against a timeout and retries transient transport
 * failures with exponential backoff.
 *
 * ## Retry & Backoff
 *
 * An attempt that fails with a retryable {@link NetworkError} (no
 * connection, timeout, 5xx, 429) is retried after
 * `min(baseDelayMs * 2^(attempt-1), maxDelayMs)` until the policy's
 * `maxAttempts` is reached. Anything else (validation, not-found,
 * unauthorized, unknown) is rethrown on the first failure.
 *
 * The error surfaced after the final attempt is the one the operation
 * threw, unchanged, so callers can still classify it.
 */

import { classifyError, NetworkError } from './errors';
import { debugWarn } from './debug';
import { formatDuration, sleep } from './utils';

// =============================================================================
// Policies
// =============================================================================

export interface RetryPolicy {
  /** Total attempts including the first one. */
  maxAttempts: number;
  /** Delay before the second attempt; doubles for each further attempt. */
  baseDelayMs: number;
  /** Upper bound for a single delay. */
  maxDelayMs: number;
}

/**
 * Built-in policies.
 *
 * - `network`: reads and writes against the remote API (initial + 2 retries).
 * - `standard`: callers that prefer failing fast (initial + 1 retry).
 * - `none`: a single attempt.
 */
export const RETRY_POLICIES = {
  network: { maxAttempts: 3, baseDelayMs: 1000, maxDelayMs: 8000 },
  standard: { maxAttempts: 2, baseDelayMs: 500, maxDelayMs: 4000 },
  none: { maxAttempts: 1, baseDelayMs: 0, maxDelayMs: 0 }
} as const satisfies Record<string, RetryPolicy>;

/**
 * Delay to wait after a failed `attempt` (1-based) before the next one.
 *
 * @example
 * retryDelay(RETRY_POLICIES.network, 1); // → 1000
 * retryDelay(RETRY_POLICIES.network, 2); // → 2000
 */
export function retryDelay(policy: RetryPolicy, attempt: number): number {
  return Math.min(policy.baseDelayMs * Math.pow(2, attempt - 1), policy.maxDelayMs);
}

// =============================================================================
// Timeout
// =============================================================================

/**
 * Race a promise against a timeout. Rejects with `NetworkError('timeout')`.
 *
 * A non-positive or non-finite `ms` disables the timeout.
 */
export function withTimeout<T>(promise: Promise<T>, ms: number, label: string): Promise<T> {
  if (!Number.isFinite(ms) || ms <= 0) return promise;
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => {
      reject(new NetworkError('timeout', `${label} timed out after ${formatDuration(ms)}`));
    }, ms);
    promise.then(
      (val) => {
        clearTimeout(timer);
        resolve(val);
      },
      (err: unknown) => {
        clearTimeout(timer);
        reject(err);
      }
    );
  });
}

// =============================================================================
// Retry
// =============================================================================

export interface RetryOptions {
  policy: RetryPolicy;
  /** Per-attempt timeout (ms). Omit or pass 0 for none. */
  timeoutMs?: number;
  /** Name used in log lines and timeout messages. */
  label?: string;
}

/**
 * Run `operation` under a retry policy.
 *
 * @param operation - Receives the 1-based attempt number.
 *
 * @example
 * const rows = await withRetry(() => table.selectAll(tenantId), {
 *   policy: RETRY_POLICIES.network,
 *   timeoutMs: 10_000,
 *   label: 'guest_list.select',
 * });
 */
export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  options: RetryOptions
): Promise<T> {
  const { policy, timeoutMs = 0, label = 'operation' } = options;
  const maxAttempts = Math.max(1, Math.floor(policy.maxAttempts));

  for (let attempt = 1; ; attempt++) {
    try {
      return await withTimeout(operation(attempt), timeoutMs, label);
    } catch (e) {
      const classified = classifyError(e);
      if (!classified.isRetryable || attempt >= maxAttempts) {
        throw e;
      }
      const delay = retryDelay(policy, attempt);
      debugWarn(
        `[Network] ${label} failed (${classified.kind}), attempt ${attempt}/${maxAttempts}; retrying in ${formatDuration(delay)}`
      );
      if (delay > 0) await sleep(delay);
    }
  }
}
