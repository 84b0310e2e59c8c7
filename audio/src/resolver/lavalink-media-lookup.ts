import type { LavalinkManager } from 'lavalink-client';
import { classifyLookupError } from './lookup-error-classifier.js';
import type { LookupResult, MediaLookup } from './media-lookup.js';

/** Subset of a Lavalink search result the lookup reads. */
export interface LavalinkSearchResultLike {
  loadType: string;
  exception?: { message?: string | null; severity?: string } | null;
  tracks: Array<{
    encoded?: string | null;
    info: {
      title: string;
      duration: number;
      uri?: string | null;
      isStream?: boolean;
    };
  }>;
}

export interface LavalinkSearchNode {
  search(query: { query: string }, requester: unknown): Promise<LavalinkSearchResultLike>;
}

export type SearchNodeProvider = () => LavalinkSearchNode | undefined;

/** Picks the least used connected node of a manager. */
export function leastUsedNode(manager: LavalinkManager): SearchNodeProvider {
  return () => manager.nodeManager.leastUsedNodes()[0];
}

/**
 * Media lookup through a Lavalink node's `loadtracks` endpoint.
 * Free text is searched on the manager's default search platform; URLs are loaded directly.
 */
export class LavalinkMediaLookup implements MediaLookup {
  constructor(private readonly nodes: SearchNodeProvider) {}

  async lookup(query: string, signal: AbortSignal): Promise<LookupResult> {
    const node = this.nodes();
    if (!node) {
      throw new Error('No Lavalink node is connected');
    }

    const result = await node.search({ query }, { id: 'resolver' });
    signal.throwIfAborted();

    switch (result.loadType) {
      case 'track':
      case 'search':
      case 'playlist': {
        const first = result.tracks.find((track) => typeof track.encoded === 'string' && track.encoded.length > 0);
        if (!first || !first.encoded) return { kind: 'empty' };
        const { info } = first;
        return {
          kind: 'found',
          match: {
            title: info.title,
            durationSeconds: info.isStream ? undefined : Math.round(info.duration / 1000),
            url: info.uri ?? undefined,
            locator: { token: first.encoded },
          },
        };
      }
      case 'empty':
        return { kind: 'empty' };
      case 'error':
      default: {
        const classified = classifyLookupError(result.exception?.message ?? 'Lavalink load failed', result.exception?.severity);
        if (classified.kind === 'unsupported') return { kind: 'unsupported', reason: classified.message };
        if (classified.kind === 'not_found') return { kind: 'empty' };
        throw new Error(classified.message);
      }
    }
  }
}
