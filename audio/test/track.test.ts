import { describe, it, expect } from 'vitest';
import { createTrack, formatDuration, hasLiveLocator, isLoopMode, withStreamLocator } from '../src/index.js';

describe('track descriptors', () => {
  it('trims the title and freezes the descriptor', () => {
    const track = createTrack({ title: '  Song  ', sourceQuery: 'song', requestedBy: 'user-1', durationSeconds: 200 });
    expect(track.title).toBe('Song');
    expect(Object.isFrozen(track)).toBe(true);
  });

  it('rejects empty titles and negative durations', () => {
    expect(() => createTrack({ title: '   ', sourceQuery: 'x', requestedBy: 'u' })).toThrow('Track title cannot be empty');
    expect(() => createTrack({ title: 'x', sourceQuery: 'x', requestedBy: 'u', durationSeconds: -1 })).toThrow(
      'Track duration must be a non-negative number of seconds',
    );
  });

  it('replaces only the locator', () => {
    const track = createTrack({ title: 'Song', sourceQuery: 'song', requestedBy: 'user-1', streamLocator: { token: 'old' } });
    const refreshed = withStreamLocator(track, { token: 'new' });
    expect(refreshed).toEqual({ title: 'Song', sourceQuery: 'song', requestedBy: 'user-1', streamLocator: { token: 'new' } });
    expect(track.streamLocator?.token).toBe('old');
  });

  it('treats missing or expired locators as not live', () => {
    const base = { title: 'Song', sourceQuery: 'song', requestedBy: 'user-1' };
    expect(hasLiveLocator(createTrack(base))).toBe(false);
    expect(hasLiveLocator(createTrack({ ...base, streamLocator: { token: 't', expiresAt: 1_000 } }), 2_000)).toBe(false);
    expect(hasLiveLocator(createTrack({ ...base, streamLocator: { token: 't', expiresAt: 3_000 } }), 2_000)).toBe(true);
    expect(hasLiveLocator(createTrack({ ...base, streamLocator: { token: 't' } }))).toBe(true);
  });

  it('formats durations', () => {
    expect(formatDuration(undefined)).toBe('live');
    expect(formatDuration(65)).toBe('1:05');
    expect(formatDuration(3725)).toBe('1:02:05');
  });

  it('recognises loop modes', () => {
    expect(isLoopMode('queue')).toBe(true);
    expect(isLoopMode('all')).toBe(false);
  });
});
