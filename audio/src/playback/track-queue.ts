import { QueueError } from '../errors.js';
import type { LoopMode, TrackDescriptor } from './track.js';

export const DEFAULT_MAX_QUEUE_LENGTH = 100;

/**
 * Ordered tracks for one guild. Position 0 is the track being played while the
 * owning session is playing or paused; the length cap includes it.
 */
export class TrackQueue {
  private tracks: TrackDescriptor[] = [];
  private _loopMode: LoopMode = 'off';

  constructor(private readonly maxLength: number = DEFAULT_MAX_QUEUE_LENGTH) {
    if (!Number.isInteger(maxLength) || maxLength < 1) {
      throw new Error('Queue length limit must be a positive integer');
    }
  }

  get length(): number {
    return this.tracks.length;
  }

  get isEmpty(): boolean {
    return this.tracks.length === 0;
  }

  get capacity(): number {
    return this.maxLength;
  }

  get loopMode(): LoopMode {
    return this._loopMode;
  }

  set loopMode(mode: LoopMode) {
    this._loopMode = mode;
  }

  /** Appends to the tail and returns the resulting position. */
  enqueue(track: TrackDescriptor): number {
    if (this.tracks.length >= this.maxLength) {
      throw QueueError.full(this.maxLength);
    }
    this.tracks.push(track);
    return this.tracks.length - 1;
  }

  dequeueHead(): TrackDescriptor | undefined {
    return this.tracks.shift();
  }

  peek(): TrackDescriptor | undefined {
    return this.tracks[0];
  }

  at(index: number): TrackDescriptor | undefined {
    return this.tracks[index];
  }

  /**
   * Natural end of the head track: loop mode decides where it goes.
   * Returns the new head.
   */
  completeHead(): TrackDescriptor | undefined {
    const finished = this.tracks.shift();
    if (finished) {
      if (this._loopMode === 'track') {
        this.tracks.unshift(finished);
      } else if (this._loopMode === 'queue') {
        this.tracks.push(finished);
      }
    }
    return this.tracks[0];
  }

  /** Explicit skip: removes up to `count` tracks from the head, never re-inserted. */
  skip(count: number = 1): TrackDescriptor[] {
    if (!Number.isInteger(count) || count < 1) {
      throw QueueError.outOfRange(count, this.tracks.length);
    }
    return this.tracks.splice(0, count);
  }

  replaceHead(track: TrackDescriptor): void {
    if (this.tracks.length === 0) {
      throw QueueError.outOfRange(0, 0);
    }
    this.tracks[0] = track;
  }

  removeAt(index: number): TrackDescriptor {
    this.assertIndex(index);
    const [removed] = this.tracks.splice(index, 1);
    return removed;
  }

  move(fromIndex: number, toIndex: number): TrackDescriptor {
    this.assertIndex(fromIndex);
    this.assertIndex(toIndex);
    const [moved] = this.tracks.splice(fromIndex, 1);
    this.tracks.splice(toIndex, 0, moved);
    return moved;
  }

  clear(): number {
    const removed = this.tracks.length;
    this.tracks = [];
    return removed;
  }

  toArray(): TrackDescriptor[] {
    return [...this.tracks];
  }

  private assertIndex(index: number): void {
    if (!Number.isInteger(index) || index < 0 || index >= this.tracks.length) {
      throw QueueError.outOfRange(index, this.tracks.length);
    }
  }
}
