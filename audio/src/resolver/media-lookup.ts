import type { StreamLocator } from '../playback/track.js';

/**
 * External media-lookup capability (Port).
 * Implementations turn a free-text query or URL into at most one playable
 * match. They report "no match" and "unsupported source" as results and throw
 * for backend or network failures.
 */
export interface MediaLookup {
  lookup(query: string, signal: AbortSignal): Promise<LookupResult>;
}

export interface LookupMatch {
  title: string;
  durationSeconds?: number;
  url?: string;
  locator: StreamLocator;
}

export type LookupResult =
  | { kind: 'found'; match: LookupMatch }
  | { kind: 'empty' }
  | { kind: 'unsupported'; reason: string };
