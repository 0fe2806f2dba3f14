/**
 * Unit tests for the capped exponential backoff loop
 */

import { ClientError, NetworkError, NetworkTimeoutError, RetriableServerError } from '../errors.js';
import { computeBackoffDelay, createRetryPolicy, isTransientFailure, retryWithBackoff } from '../retry.js';
import type { RetryRuntime } from '../retry.js';

const URL = 'https://api.test/products';

function serverError(status = 500): RetriableServerError {
    return new RetriableServerError('POST', URL, status, { message: 'boom' });
}

/** Clock that only moves when the loop sleeps */
function fakeRuntime(): { runtime: Partial<RetryRuntime>; sleeps: number[] } {
    const sleeps: number[] = [];
    let clock = 0;
    return {
        sleeps,
        runtime: {
            now: () => clock,
            sleep: async (ms: number) => {
                sleeps.push(ms);
                clock += ms;
            },
            random: () => 0.5,
        },
    };
}

describe('createRetryPolicy', () => {
    it('defaults to 3 attempts within 15 seconds', () => {
        const policy = createRetryPolicy();

        expect(policy.maxAttempts).toBe(3);
        expect(policy.maxElapsedMs).toBe(15_000);
        expect(policy.baseDelayMs).toBe(1_000);
        expect(policy.jitter).toBe(true);
        expect(policy.isRetriable).toBe(isTransientFailure);
    });

    it('rejects a non-positive attempt cap', () => {
        expect(() => createRetryPolicy({ maxAttempts: 0 })).toThrow(RangeError);
        expect(() => createRetryPolicy({ maxAttempts: 1.5 })).toThrow(RangeError);
    });

    it('rejects negative durations', () => {
        expect(() => createRetryPolicy({ baseDelayMs: -1 })).toThrow(RangeError);
    });
});

describe('isTransientFailure', () => {
    it('retries server errors, timeouts and dropped connections', () => {
        expect(isTransientFailure(serverError())).toBe(true);
        expect(isTransientFailure(new NetworkTimeoutError('POST', URL, 30_000))).toBe(true);
        expect(isTransientFailure(new NetworkError('POST', URL, new Error('ECONNRESET')))).toBe(true);
    });

    it('never retries client errors or unknown failures', () => {
        expect(isTransientFailure(new ClientError('POST', URL, 422, {}))).toBe(false);
        expect(isTransientFailure(new Error('bug'))).toBe(false);
    });
});

describe('computeBackoffDelay', () => {
    it('doubles from the base delay', () => {
        const policy = createRetryPolicy({ jitter: false });

        expect(computeBackoffDelay(1, policy, Math.random)).toBe(1_000);
        expect(computeBackoffDelay(2, policy, Math.random)).toBe(2_000);
        expect(computeBackoffDelay(3, policy, Math.random)).toBe(4_000);
    });

    it('draws a jittered wait from the upper half of the computed one', () => {
        const policy = createRetryPolicy();

        expect(computeBackoffDelay(2, policy, () => 0.25)).toBe(1_250);
        expect(computeBackoffDelay(2, policy, () => 0)).toBe(1_000);
    });

    it('never waits less than the wait before, whatever the draw', () => {
        const policy = createRetryPolicy();

        expect(computeBackoffDelay(2, policy, () => 0)).toBeGreaterThanOrEqual(computeBackoffDelay(1, policy, () => 0.999));
        expect(computeBackoffDelay(3, policy, () => 0)).toBeGreaterThanOrEqual(computeBackoffDelay(2, policy, () => 0.999));
    });
});

describe('retryWithBackoff', () => {
    it('returns the first success', async () => {
        const { runtime, sleeps } = fakeRuntime();
        const fn = vi.fn(async () => 'ok');

        await expect(retryWithBackoff(fn, createRetryPolicy(), runtime)).resolves.toBe('ok');
        expect(fn).toHaveBeenCalledTimes(1);
        expect(sleeps).toEqual([]);
    });

    it('succeeds when the success arrives within the attempt cap', async () => {
        const { runtime, sleeps } = fakeRuntime();
        const fn = vi.fn<(attempt: number) => Promise<string>>()
            .mockRejectedValueOnce(serverError(500))
            .mockRejectedValueOnce(serverError(502))
            .mockResolvedValueOnce('ok');

        await expect(retryWithBackoff(fn, createRetryPolicy({ jitter: false }), runtime)).resolves.toBe('ok');
        expect(fn.mock.calls.map(([attempt]) => attempt)).toEqual([1, 2, 3]);
        expect(sleeps).toEqual([1_000, 2_000]);
    });

    it('surfaces the last server error once the attempt cap is reached', async () => {
        const { runtime, sleeps } = fakeRuntime();
        const last = serverError(503);
        const fn = vi.fn<(attempt: number) => Promise<string>>()
            .mockRejectedValueOnce(serverError(500))
            .mockRejectedValueOnce(serverError(500))
            .mockRejectedValueOnce(last)
            .mockResolvedValueOnce('too late');

        await expect(retryWithBackoff(fn, createRetryPolicy({ jitter: false }), runtime)).rejects.toBe(last);
        expect(fn).toHaveBeenCalledTimes(3);
        expect(sleeps).toEqual([1_000, 2_000]);
    });

    it('does not retry a non-retriable error', async () => {
        const { runtime, sleeps } = fakeRuntime();
        const error = new ClientError('POST', URL, 400, { message: 'bad' });
        const fn = vi.fn(async () => {
            throw error;
        });

        await expect(retryWithBackoff(fn, createRetryPolicy(), runtime)).rejects.toBe(error);
        expect(fn).toHaveBeenCalledTimes(1);
        expect(sleeps).toEqual([]);
    });

    it('clips waits to the elapsed-time ceiling and stops when it is reached', async () => {
        const { runtime, sleeps } = fakeRuntime();
        const policy = createRetryPolicy({ maxAttempts: 10, baseDelayMs: 10_000, jitter: false });
        const fn = vi.fn(async () => {
            throw serverError();
        });

        await expect(retryWithBackoff(fn, policy, runtime)).rejects.toBeInstanceOf(RetriableServerError);
        expect(fn).toHaveBeenCalledTimes(3);
        expect(sleeps).toEqual([10_000, 5_000]);
    });

    it('applies jitter from the injected random source', async () => {
        const { runtime, sleeps } = fakeRuntime();
        const fn = vi.fn<(attempt: number) => Promise<string>>()
            .mockRejectedValueOnce(serverError())
            .mockResolvedValueOnce('ok');

        await retryWithBackoff(fn, createRetryPolicy(), runtime);
        expect(sleeps).toEqual([750]);
    });

    it('reports each retry', async () => {
        const { runtime } = fakeRuntime();
        const onRetry = vi.fn();
        const first = serverError(500);
        const fn = vi.fn<(attempt: number) => Promise<string>>()
            .mockRejectedValueOnce(first)
            .mockResolvedValueOnce('ok');

        await retryWithBackoff(fn, createRetryPolicy({ jitter: false }), { ...runtime, onRetry });
        expect(onRetry).toHaveBeenCalledTimes(1);
        expect(onRetry).toHaveBeenCalledWith({ attempt: 1, elapsedMs: 0, lastError: first }, 1_000);
    });
});
