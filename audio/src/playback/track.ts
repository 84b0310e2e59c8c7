/**
 * Opaque reference the transport can stream. Produced by the resolver and
 * possibly short-lived: `expiresAt` (epoch ms) marks when it stops being usable.
 */
export interface StreamLocator {
  readonly token: string;
  readonly expiresAt?: number;
}

/**
 * Track Descriptor
 * Immutable metadata for one requested song. The stream locator is filled in
 * lazily and may be replaced by a refresh; title and source query never change.
 */
export interface TrackDescriptor {
  readonly title: string;
  readonly durationSeconds?: number;
  readonly sourceQuery: string;
  readonly sourceUrl?: string;
  readonly streamLocator?: StreamLocator;
  readonly requestedBy: string;
}

export type LoopMode = 'off' | 'track' | 'queue';

export const LOOP_MODES: readonly LoopMode[] = ['off', 'track', 'queue'];

export function isLoopMode(value: string): value is LoopMode {
  return (LOOP_MODES as readonly string[]).includes(value);
}

export function createTrack(data: {
  title: string;
  sourceQuery: string;
  requestedBy: string;
  durationSeconds?: number;
  sourceUrl?: string;
  streamLocator?: StreamLocator;
}): TrackDescriptor {
  const title = data.title.trim();
  if (title.length === 0) {
    throw new Error('Track title cannot be empty');
  }
  if (data.durationSeconds !== undefined && (!Number.isFinite(data.durationSeconds) || data.durationSeconds < 0)) {
    throw new Error('Track duration must be a non-negative number of seconds');
  }

  return Object.freeze({
    title,
    sourceQuery: data.sourceQuery,
    requestedBy: data.requestedBy,
    ...(data.durationSeconds !== undefined ? { durationSeconds: data.durationSeconds } : {}),
    ...(data.sourceUrl ? { sourceUrl: data.sourceUrl } : {}),
    ...(data.streamLocator ? { streamLocator: Object.freeze({ ...data.streamLocator }) } : {}),
  });
}

/** Same descriptor identity, new locator. */
export function withStreamLocator(track: TrackDescriptor, streamLocator: StreamLocator): TrackDescriptor {
  return Object.freeze({ ...track, streamLocator: Object.freeze({ ...streamLocator }) });
}

export function hasLiveLocator(track: TrackDescriptor, now: number = Date.now()): boolean {
  const locator = track.streamLocator;
  if (!locator || locator.token.length === 0) return false;
  return locator.expiresAt === undefined || locator.expiresAt > now;
}

export function formatDuration(seconds: number | undefined): string {
  if (seconds === undefined) return 'live';
  const total = Math.floor(seconds);
  const h = Math.floor(total / 3600);
  const m = Math.floor((total % 3600) / 60);
  const s = total % 60;
  const pad = (n: number) => n.toString().padStart(2, '0');
  return h > 0 ? `${h}:${pad(m)}:${pad(s)}` : `${m}:${pad(s)}`;
}
