/**
 * Capped exponential backoff
 *
 * A RetryPolicy is a plain value: attempt cap, elapsed-time ceiling, base
 * delay and the predicate deciding which failures are worth another try.
 * `retryWithBackoff` is the only loop that consumes it.
 */

import {
    SHARPI_RETRY_BASE_DELAY_MS,
    SHARPI_RETRY_MAX_ATTEMPTS,
    SHARPI_RETRY_MAX_ELAPSED_MS,
} from '../config/sync/sharpi.js';
import { NetworkError, NetworkTimeoutError, RetriableServerError } from './errors.js';

export interface RetryPolicy {
    /** Total attempts, the first one included */
    readonly maxAttempts: number;
    /** No new attempt is started once this much time has passed since the first */
    readonly maxElapsedMs: number;
    /** Wait before the second attempt; doubles for each one after */
    readonly baseDelayMs: number;
    /** Equal jitter: each wait is drawn from [half the computed wait, computed wait] */
    readonly jitter: boolean;
    readonly isRetriable: (error: unknown) => boolean;
}

export interface RetryState {
    attempt: number;
    elapsedMs: number;
    lastError: unknown;
}

/**
 * Clock, sleep and randomness used by the loop. Replaced in tests.
 */
export interface RetryRuntime {
    sleep: (ms: number) => Promise<void>;
    now: () => number;
    random: () => number;
    onRetry?: (state: RetryState, waitMs: number) => void;
}

/**
 * Server errors, timeouts and dropped connections; never client errors
 */
export function isTransientFailure(error: unknown): boolean {
    return (
        error instanceof RetriableServerError ||
        error instanceof NetworkTimeoutError ||
        error instanceof NetworkError
    );
}

export function createRetryPolicy(overrides: Partial<RetryPolicy> = {}): RetryPolicy {
    const policy: RetryPolicy = {
        maxAttempts: SHARPI_RETRY_MAX_ATTEMPTS,
        maxElapsedMs: SHARPI_RETRY_MAX_ELAPSED_MS,
        baseDelayMs: SHARPI_RETRY_BASE_DELAY_MS,
        jitter: true,
        isRetriable: isTransientFailure,
        ...overrides,
    };

    if (!Number.isInteger(policy.maxAttempts) || policy.maxAttempts < 1) {
        throw new RangeError(`maxAttempts must be a positive integer, got ${policy.maxAttempts}`);
    }
    if (policy.maxElapsedMs < 0 || policy.baseDelayMs < 0) {
        throw new RangeError('maxElapsedMs and baseDelayMs must not be negative');
    }

    return Object.freeze(policy);
}

export const defaultRetryRuntime: RetryRuntime = {
    sleep: (ms) => new Promise(resolve => setTimeout(resolve, ms)),
    now: () => Date.now(),
    random: () => Math.random(),
};

/**
 * Wait after the given failed attempt (1-based), before clipping to the
 * elapsed-time ceiling
 */
export function computeBackoffDelay(attempt: number, policy: RetryPolicy, random: () => number): number {
    const delay = policy.baseDelayMs * Math.pow(2, attempt - 1);
    if (!policy.jitter) return delay;
    const half = delay / 2;
    return half + Math.floor(half * random());
}

/**
 * Run `fn` until it succeeds, throws a non-retriable error, or the policy's
 * attempt cap or elapsed-time ceiling is reached. The last error is
 * re-thrown unchanged.
 */
export async function retryWithBackoff<T>(
    fn: (attempt: number) => Promise<T>,
    policy: RetryPolicy,
    runtime: Partial<RetryRuntime> = {}
): Promise<T> {
    const { sleep, now, random, onRetry } = { ...defaultRetryRuntime, ...runtime };
    const startedAt = now();

    for (let attempt = 1; ; attempt++) {
        try {
            return await fn(attempt);
        } catch (error: unknown) {
            if (!policy.isRetriable(error) || attempt >= policy.maxAttempts) {
                throw error;
            }

            const elapsedMs = now() - startedAt;
            const remainingMs = policy.maxElapsedMs - elapsedMs;
            if (remainingMs <= 0) {
                throw error;
            }

            const waitMs = Math.min(computeBackoffDelay(attempt, policy, random), remainingMs);
            onRetry?.({ attempt, elapsedMs, lastError: error }, waitMs);
            await sleep(waitMs);
        }
    }
}
