import { describe, it, expect, vi } from 'vitest';
import { withRetry } from './retry.js';
import { ModelServiceError } from './errors.js';

describe('withRetry', () => {
  it('retries transient failures with capped exponential backoff', async () => {
    const fn = vi
      .fn<(attempt: number) => Promise<string>>()
      .mockRejectedValueOnce(new ModelServiceError('unavailable', 'down'))
      .mockRejectedValueOnce(new ModelServiceError('rate_limit', 'slow down'))
      .mockResolvedValue('ok');
    const onRetry = vi.fn();

    const result = await withRetry(fn, { maxRetries: 2, backoffMs: 10, maxBackoffMs: 15 }, onRetry);

    expect(result).toBe('ok');
    expect(fn.mock.calls.map(([attempt]) => attempt)).toEqual([0, 1, 2]);
    expect(onRetry.mock.calls.map(([, attempt, delay]) => [attempt, delay])).toEqual([
      [1, 10],
      [2, 15],
    ]);
  });

  it('gives up after maxRetries', async () => {
    const error = new ModelServiceError('timeout', 'timed out');
    const fn = vi.fn<(attempt: number) => Promise<string>>().mockRejectedValue(error);

    await expect(withRetry(fn, { maxRetries: 1, backoffMs: 0 })).rejects.toBe(error);
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it('does not retry failures that are not transient', async () => {
    const fn = vi
      .fn<(attempt: number) => Promise<string>>()
      .mockRejectedValue(new ModelServiceError('malformed_response', 'garbage'));

    await expect(withRetry(fn, { maxRetries: 3, backoffMs: 0 })).rejects.toMatchObject({ reason: 'malformed_response' });
    expect(fn).toHaveBeenCalledTimes(1);
  });
});
