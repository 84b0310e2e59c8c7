import type { Logger } from '@music-bot/logger';
import { createLogger } from '@music-bot/logger';
import { OperationCancelledError, ResolutionError, withTimeout } from '../errors.js';
import { resolutionCounter } from '../metrics.js';
import { createTrack, withStreamLocator, type TrackDescriptor } from '../playback/track.js';
import type { LookupMatch, LookupResult, MediaLookup } from './media-lookup.js';

export const DEFAULT_RESOLUTION_TIMEOUT_MS = 15_000;

export interface ResolveOptions {
  requestedBy: string;
  signal?: AbortSignal;
}

/**
 * Track Resolver (Port)
 * What the playback session needs from media resolution.
 */
export interface TrackResolver {
  resolve(queryOrUrl: string, options: ResolveOptions): Promise<TrackDescriptor>;
  refresh(track: TrackDescriptor, options?: { signal?: AbortSignal }): Promise<TrackDescriptor>;
}

export interface ResolverAdapterOptions {
  timeoutMs?: number;
  /** Hostnames URLs may point at; empty means any http(s) host. */
  allowedHosts?: readonly string[];
  logger?: Logger;
}

/**
 * Resolver Adapter
 * Wraps a MediaLookup with a timeout, source policy and the resolution error taxonomy.
 */
export class ResolverAdapter implements TrackResolver {
  private readonly timeoutMs: number;
  private readonly allowedHosts: readonly string[];
  private readonly logger: Logger;

  constructor(
    private readonly lookup: MediaLookup,
    options: ResolverAdapterOptions = {},
  ) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_RESOLUTION_TIMEOUT_MS;
    this.allowedHosts = (options.allowedHosts ?? []).map((host) => host.toLowerCase());
    this.logger = options.logger ?? createLogger({ component: 'resolver' });
  }

  async resolve(queryOrUrl: string, options: ResolveOptions): Promise<TrackDescriptor> {
    const query = queryOrUrl.trim();
    if (query.length === 0) {
      throw ResolutionError.notFound(queryOrUrl);
    }
    this.assertSupported(query);

    const match = await this.lookupMatch(query, options.signal);
    return createTrack({
      title: match.title,
      durationSeconds: match.durationSeconds,
      sourceQuery: query,
      sourceUrl: match.url,
      streamLocator: match.locator,
      requestedBy: options.requestedBy,
    });
  }

  /** Re-resolves an expired locator; everything but the locator is kept. */
  async refresh(track: TrackDescriptor, options: { signal?: AbortSignal } = {}): Promise<TrackDescriptor> {
    const query = track.sourceUrl ?? track.sourceQuery;
    this.assertSupported(query);

    const match = await this.lookupMatch(query, options.signal);
    return withStreamLocator(track, match.locator);
  }

  private async lookupMatch(query: string, signal?: AbortSignal): Promise<LookupMatch> {
    let result: LookupResult;
    try {
      result = await withTimeout(
        (lookupSignal) => this.lookup.lookup(query, lookupSignal),
        this.timeoutMs,
        {
          onTimeout: () => ResolutionError.transient(query, `Lookup timed out after ${this.timeoutMs}ms`),
          onAbort: () => new OperationCancelledError('Track resolution'),
        },
        signal,
      );
    } catch (error) {
      if (error instanceof ResolutionError || error instanceof OperationCancelledError) {
        resolutionCounter.labels(error instanceof ResolutionError ? error.kind : 'cancelled').inc();
        throw error;
      }
      const message = error instanceof Error ? error.message : String(error);
      this.logger.warn({ query, error: message }, 'resolver: lookup backend failed');
      resolutionCounter.labels('transient').inc();
      throw ResolutionError.transient(query, `Lookup failed: ${message}`);
    }

    switch (result.kind) {
      case 'found':
        resolutionCounter.labels('found').inc();
        this.logger.debug({ query, title: result.match.title }, 'resolver: resolved');
        return result.match;
      case 'empty':
        resolutionCounter.labels('not_found').inc();
        throw ResolutionError.notFound(query);
      case 'unsupported':
        resolutionCounter.labels('unsupported').inc();
        throw ResolutionError.unsupported(query, result.reason);
    }
  }

  private assertSupported(query: string): void {
    if (!/^[a-z][a-z0-9+.-]*:\/\//i.test(query)) return;

    let url: URL;
    try {
      url = new URL(query);
    } catch {
      throw ResolutionError.unsupported(query, 'Malformed URL');
    }

    if (url.protocol !== 'http:' && url.protocol !== 'https:') {
      throw ResolutionError.unsupported(query, `Unsupported URL scheme ${url.protocol}`);
    }

    if (this.allowedHosts.length > 0) {
      const host = url.hostname.toLowerCase();
      const allowed = this.allowedHosts.some((entry) => host === entry || host.endsWith(`.${entry}`));
      if (!allowed) {
        throw ResolutionError.unsupported(query, `Source ${host} is not allowed`);
      }
    }
  }
}
