import { describe, it, expect, vi } from 'vitest';
import {
  OperationCancelledError,
  ResolutionError,
  ResolverAdapter,
  createTrack,
  type LookupResult,
} from '../src/index.js';

function lookupReturning(result: LookupResult) {
  return { lookup: vi.fn(async (_query: string, _signal: AbortSignal) => result) };
}

const found = (title: string, token: string): LookupResult => ({
  kind: 'found',
  match: { title, durationSeconds: 212, url: `https://media.example/${token}`, locator: { token } },
});

describe('ResolverAdapter', () => {
  it('builds a descriptor from the first match', async () => {
    const resolver = new ResolverAdapter(lookupReturning(found('Some Song', 'abc')));

    const track = await resolver.resolve('  some song ', { requestedBy: 'user-1' });

    expect(track).toEqual({
      title: 'Some Song',
      durationSeconds: 212,
      sourceQuery: 'some song',
      sourceUrl: 'https://media.example/abc',
      streamLocator: { token: 'abc' },
      requestedBy: 'user-1',
    });
  });

  it('reports an empty lookup as not_found', async () => {
    const resolver = new ResolverAdapter(lookupReturning({ kind: 'empty' }));

    await expect(resolver.resolve('nothing here', { requestedBy: 'u' })).rejects.toMatchObject({
      kind: 'not_found',
      message: 'No results for "nothing here"',
    });
  });

  it('reports an empty query as not_found without a lookup', async () => {
    const lookup = lookupReturning(found('x', 'x'));
    const resolver = new ResolverAdapter(lookup);

    await expect(resolver.resolve('   ', { requestedBy: 'u' })).rejects.toMatchObject({ kind: 'not_found' });
    expect(lookup.lookup).not.toHaveBeenCalled();
  });

  it('passes through the unsupported reason', async () => {
    const resolver = new ResolverAdapter(lookupReturning({ kind: 'unsupported', reason: 'Source is not supported' }));

    await expect(resolver.resolve('https://media.example/x', { requestedBy: 'u' })).rejects.toMatchObject({
      kind: 'unsupported',
      message: 'Source is not supported',
    });
  });

  it('rejects non-http schemes and hosts outside the allow-list before looking up', async () => {
    const lookup = lookupReturning(found('x', 'x'));
    const resolver = new ResolverAdapter(lookup, { allowedHosts: ['media.example'] });

    await expect(resolver.resolve('ftp://media.example/song', { requestedBy: 'u' })).rejects.toMatchObject({
      kind: 'unsupported',
      message: 'Unsupported URL scheme ftp:',
    });
    await expect(resolver.resolve('https://other.example/song', { requestedBy: 'u' })).rejects.toMatchObject({
      kind: 'unsupported',
      message: 'Source other.example is not allowed',
    });
    await expect(resolver.resolve('https://cdn.media.example/song', { requestedBy: 'u' })).resolves.toMatchObject({ title: 'x' });
    expect(lookup.lookup).toHaveBeenCalledTimes(1);
  });

  it('maps backend failures to transient errors', async () => {
    const resolver = new ResolverAdapter({ lookup: vi.fn(async () => Promise.reject(new Error('ECONNRESET'))) });

    const error = await resolver.resolve('song', { requestedBy: 'u' }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ResolutionError);
    expect(error).toMatchObject({ kind: 'transient', isRetryable: true, message: 'Lookup failed: ECONNRESET' });
  });

  it('times out a slow lookup and aborts its signal', async () => {
    const seen: { signal?: AbortSignal } = {};
    const resolver = new ResolverAdapter(
      {
        lookup: (_query, signal) => {
          seen.signal = signal;
          return new Promise<LookupResult>(() => undefined);
        },
      },
      { timeoutMs: 10 },
    );

    await expect(resolver.resolve('song', { requestedBy: 'u' })).rejects.toMatchObject({
      kind: 'transient',
      message: 'Lookup timed out after 10ms',
    });
    expect(seen.signal?.aborted).toBe(true);
  });

  it('stops with a cancellation when the caller aborts', async () => {
    const resolver = new ResolverAdapter({ lookup: () => new Promise<LookupResult>(() => undefined) });
    const controller = new AbortController();

    const pending = resolver.resolve('song', { requestedBy: 'u', signal: controller.signal });
    controller.abort();

    await expect(pending).rejects.toBeInstanceOf(OperationCancelledError);
  });

  it('refreshes a locator through the source url and keeps the rest', async () => {
    const lookup = lookupReturning(found('Different Title', 'fresh'));
    const resolver = new ResolverAdapter(lookup);
    const track = createTrack({
      title: 'Old Song',
      sourceQuery: 'old song',
      sourceUrl: 'https://media.example/old-song',
      requestedBy: 'user-1',
      streamLocator: { token: 'stale', expiresAt: 1 },
    });

    const refreshed = await resolver.refresh(track);

    expect(lookup.lookup).toHaveBeenCalledWith('https://media.example/old-song', expect.any(AbortSignal));
    expect(refreshed.title).toBe('Old Song');
    expect(refreshed.streamLocator).toEqual({ token: 'fresh' });
  });
});
