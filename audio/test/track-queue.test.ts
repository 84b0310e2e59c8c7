import { describe, it, expect, beforeEach } from 'vitest';
import { QueueError, TrackQueue, createTrack, type TrackDescriptor } from '../src/index.js';

const track = (title: string): TrackDescriptor =>
  createTrack({ title, sourceQuery: title, requestedBy: 'user-1', streamLocator: { token: `tok:${title}` } });

const titles = (queue: TrackQueue) => queue.toArray().map((t) => t.title);

describe('TrackQueue', () => {
  let queue: TrackQueue;

  beforeEach(() => {
    queue = new TrackQueue(5);
  });

  it('appends to the tail and reports the position', () => {
    expect(queue.enqueue(track('a'))).toBe(0);
    expect(queue.enqueue(track('b'))).toBe(1);
    expect(titles(queue)).toEqual(['a', 'b']);
    expect(queue.peek()?.title).toBe('a');
  });

  it('rejects enqueue beyond the cap and leaves the queue unchanged', () => {
    for (const title of ['a', 'b', 'c', 'd', 'e']) queue.enqueue(track(title));

    expect(() => queue.enqueue(track('f'))).toThrow(QueueError);
    expect(() => queue.enqueue(track('f'))).toThrow('Queue is full (limit 5)');
    expect(queue.length).toBe(5);
    expect(titles(queue)).toEqual(['a', 'b', 'c', 'd', 'e']);
  });

  it('refuses a non-positive cap', () => {
    expect(() => new TrackQueue(0)).toThrow('Queue length limit must be a positive integer');
  });

  describe('completeHead', () => {
    beforeEach(() => {
      queue.enqueue(track('a'));
      queue.enqueue(track('b'));
      queue.enqueue(track('c'));
    });

    it('drops the finished track with loop off', () => {
      expect(queue.completeHead()?.title).toBe('b');
      expect(titles(queue)).toEqual(['b', 'c']);
    });

    it('keeps the finished track at the head with loop track', () => {
      queue.loopMode = 'track';
      expect(queue.completeHead()?.title).toBe('a');
      expect(titles(queue)).toEqual(['a', 'b', 'c']);
    });

    it('moves the finished track to the tail with loop queue', () => {
      queue.loopMode = 'queue';
      expect(queue.completeHead()?.title).toBe('b');
      expect(titles(queue)).toEqual(['b', 'c', 'a']);
    });

    it('cycles back to the starting order after a full pass with loop queue', () => {
      queue.loopMode = 'queue';
      queue.completeHead();
      queue.completeHead();
      queue.completeHead();
      expect(titles(queue)).toEqual(['a', 'b', 'c']);
    });

    it('returns undefined once the last track finishes', () => {
      const single = new TrackQueue();
      single.enqueue(track('only'));
      expect(single.completeHead()).toBeUndefined();
      expect(single.isEmpty).toBe(true);
    });
  });

  describe('skip', () => {
    it('removes tracks from the head and never re-inserts them, whatever the loop mode', () => {
      for (const title of ['a', 'b', 'c']) queue.enqueue(track(title));
      queue.loopMode = 'queue';

      const skipped = queue.skip();

      expect(skipped.map((t) => t.title)).toEqual(['a']);
      expect(titles(queue)).toEqual(['b', 'c']);
    });

    it('skips several tracks at once', () => {
      for (const title of ['a', 'b', 'c']) queue.enqueue(track(title));
      queue.loopMode = 'track';

      expect(queue.skip(2).map((t) => t.title)).toEqual(['a', 'b']);
      expect(titles(queue)).toEqual(['c']);
    });

    it('empties the queue when the count exceeds its length', () => {
      queue.enqueue(track('a'));
      expect(queue.skip(10)).toHaveLength(1);
      expect(queue.isEmpty).toBe(true);
    });

    it('rejects a count below one', () => {
      queue.enqueue(track('a'));
      expect(() => queue.skip(0)).toThrow(QueueError);
    });
  });

  describe('removeAt and move', () => {
    beforeEach(() => {
      for (const title of ['a', 'b', 'c', 'd']) queue.enqueue(track(title));
    });

    it('removes by position', () => {
      expect(queue.removeAt(2).title).toBe('c');
      expect(titles(queue)).toEqual(['a', 'b', 'd']);
    });

    it('moves a track to a new position', () => {
      expect(queue.move(3, 1).title).toBe('d');
      expect(titles(queue)).toEqual(['a', 'd', 'b', 'c']);
    });

    it('reports out-of-range positions with INDEX_OUT_OF_RANGE', () => {
      expect(() => queue.removeAt(4)).toThrow('Position 4 is out of range (queue length 4)');
      try {
        queue.move(0, -1);
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(QueueError);
        expect(error).toMatchObject({ code: 'INDEX_OUT_OF_RANGE', kind: 'index_out_of_range' });
      }
      expect(titles(queue)).toEqual(['a', 'b', 'c', 'd']);
    });
  });

  it('replaces the head in place', () => {
    queue.enqueue(track('a'));
    queue.enqueue(track('b'));
    queue.replaceHead(track('a2'));
    expect(titles(queue)).toEqual(['a2', 'b']);
  });

  it('clear returns the number of removed tracks', () => {
    queue.enqueue(track('a'));
    queue.enqueue(track('b'));
    expect(queue.clear()).toBe(2);
    expect(queue.isEmpty).toBe(true);
  });

  it('toArray returns a copy', () => {
    queue.enqueue(track('a'));
    const copy = queue.toArray();
    copy.pop();
    expect(queue.length).toBe(1);
  });
});
