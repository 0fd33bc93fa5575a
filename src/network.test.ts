import { afterEach, describe, expect, it, vi } from 'vitest';
import { NetworkError } from './errors';
import { retryDelay, RETRY_POLICIES, withRetry, withTimeout } from './network';

const immediate = { maxAttempts: 3, baseDelayMs: 0, maxDelayMs: 0 };

describe('retryDelay', () => {
  it('doubles up to the cap', () => {
    const delays = [1, 2, 3, 4, 5].map((attempt) => retryDelay(RETRY_POLICIES.network, attempt));
    expect(delays).toEqual([1000, 2000, 4000, 8000, 8000]);
  });
});

describe('withRetry', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('retries a transient failure and returns the later result', async () => {
    const operation = vi
      .fn<(attempt: number) => Promise<string>>()
      .mockRejectedValueOnce(new NetworkError('noConnection', 'offline'))
      .mockResolvedValueOnce('rows');

    await expect(withRetry(operation, { policy: immediate })).resolves.toBe('rows');
    expect(operation.mock.calls).toEqual([[1], [2]]);
  });

  it('rethrows the last error after the final attempt', async () => {
    const failure = new NetworkError('serverError', 'Bad Gateway', { status: 502 });
    const operation = vi.fn<(attempt: number) => Promise<string>>().mockRejectedValue(failure);

    await expect(withRetry(operation, { policy: immediate })).rejects.toBe(failure);
    expect(operation).toHaveBeenCalledTimes(3);
  });

  it('never retries business errors', async () => {
    const failure = new NetworkError('unauthorized', 'permission denied for table guest_list');
    const operation = vi.fn<(attempt: number) => Promise<string>>().mockRejectedValue(failure);

    await expect(withRetry(operation, { policy: RETRY_POLICIES.network })).rejects.toBe(failure);
    expect(operation).toHaveBeenCalledTimes(1);
  });

  it('waits the backoff delay between attempts', async () => {
    vi.useFakeTimers();
    const operation = vi
      .fn<(attempt: number) => Promise<string>>()
      .mockRejectedValueOnce(new NetworkError('serverError', 'Service Unavailable', { status: 503 }))
      .mockResolvedValueOnce('ok');

    const result = withRetry(operation, { policy: RETRY_POLICIES.network });
    await vi.advanceTimersByTimeAsync(999);
    expect(operation).toHaveBeenCalledTimes(1);

    await vi.advanceTimersByTimeAsync(1);
    await expect(result).resolves.toBe('ok');
    expect(operation).toHaveBeenCalledTimes(2);
  });
});

describe('withTimeout', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('rejects with a timeout NetworkError', async () => {
    vi.useFakeTimers();
    const never = new Promise<string>(() => {});
    const assertion = expect(withTimeout(never, 50, 'guest_list.select')).rejects.toMatchObject({
      kind: 'timeout',
      message: 'guest_list.select timed out after 50ms'
    });

    await vi.advanceTimersByTimeAsync(50);
    await assertion;
  });

  it('returns the promise itself when disabled', () => {
    const promise = Promise.resolve('rows');
    expect(withTimeout(promise, 0, 'guest_list.select')).toBe(promise);
  });
});
