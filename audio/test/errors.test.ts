import { describe, it, expect, vi } from 'vitest';
import {
  AudioError,
  ConnectionError,
  OperationCancelledError,
  QueueError,
  ResolutionError,
  SessionBusyError,
  isCancellation,
  withRetry,
  withTimeout,
} from '../src/errors.js';

describe('audio errors', () => {
  it('derives codes and retryability from the kind', () => {
    expect(ResolutionError.notFound('song')).toMatchObject({ code: 'RESOLUTION_NOT_FOUND', isRetryable: false, message: 'No results for "song"' });
    expect(ResolutionError.transient('song', 'slow')).toMatchObject({ code: 'RESOLUTION_TRANSIENT', isRetryable: true });
    expect(new ConnectionError('permission_denied', 'no')).toMatchObject({ code: 'CONNECTION_PERMISSION_DENIED', isRetryable: false });
    expect(new ConnectionError('timeout', 'slow')).toMatchObject({ code: 'CONNECTION_TIMEOUT', isRetryable: true });
    expect(QueueError.full(3)).toMatchObject({ code: 'QUEUE_FULL', message: 'Queue is full (limit 3)' });
    expect(new SessionBusyError('g1', 'playing')).toMatchObject({ code: 'SESSION_BUSY', message: 'Session for guild g1 is playing' });
  });

  it('recognises cancellations', () => {
    const cancelled = new OperationCancelledError('Voice connection', 'g1');
    expect(cancelled.message).toBe('Voice connection was cancelled');
    expect(isCancellation(cancelled)).toBe(true);
    expect(isCancellation(new AudioError('x', 'X'))).toBe(false);
  });
});

describe('withRetry', () => {
  it('retries retryable failures until one succeeds', async () => {
    const fn = vi
      .fn<(attempt: number) => Promise<string>>()
      .mockRejectedValueOnce(ResolutionError.transient('q', 'flaky'))
      .mockResolvedValueOnce('ok');

    await expect(withRetry(fn, 3, 0)).resolves.toBe('ok');
    expect(fn).toHaveBeenCalledTimes(2);
    expect(fn).toHaveBeenNthCalledWith(2, 2);
  });

  it('stops at the first non-retryable audio error', async () => {
    const fn = vi.fn<(attempt: number) => Promise<string>>().mockRejectedValue(ResolutionError.notFound('q'));

    await expect(withRetry(fn, 3, 0)).rejects.toBeInstanceOf(ResolutionError);
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('rethrows the last error once attempts run out', async () => {
    const fn = vi.fn<(attempt: number) => Promise<string>>().mockRejectedValue(new Error('down'));

    await expect(withRetry(fn, 2, 0)).rejects.toThrow('down');
    expect(fn).toHaveBeenCalledTimes(2);
  });
});

describe('withTimeout', () => {
  const errors = {
    onTimeout: () => new Error('timed out'),
    onAbort: () => new OperationCancelledError('Lookup'),
  };

  it('returns the operation result', async () => {
    await expect(withTimeout(async () => 42, 1_000, errors)).resolves.toBe(42);
  });

  it('rejects with the timeout error and aborts the operation signal', async () => {
    const seen: { signal?: AbortSignal } = {};
    const never = (signal: AbortSignal) => {
      seen.signal = signal;
      return new Promise<number>(() => undefined);
    };

    await expect(withTimeout(never, 10, errors)).rejects.toThrow('timed out');
    expect(seen.signal?.aborted).toBe(true);
  });

  it('rejects with the abort error when the parent signal fires', async () => {
    const parent = new AbortController();
    const pending = withTimeout(() => new Promise<number>(() => undefined), 1_000, errors, parent.signal);
    parent.abort();

    await expect(pending).rejects.toBeInstanceOf(OperationCancelledError);
  });

  it('does not start when the parent is already aborted', async () => {
    const parent = new AbortController();
    parent.abort();
    const operation = vi.fn(async () => 1);

    await expect(withTimeout(operation, 1_000, errors, parent.signal)).rejects.toThrow('Lookup was cancelled');
    expect(operation).not.toHaveBeenCalled();
  });
});
