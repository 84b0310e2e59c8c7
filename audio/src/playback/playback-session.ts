import { createLogger, serializeError, type Logger } from '@music-bot/logger';
import {
  AudioError,
  ConnectionError,
  OperationCancelledError,
  QueueError,
  isCancellation,
  withRetry,
  withTimeout,
} from '../errors.js';
import { guildMutex as sharedGuildMutex, type GuildMutex } from '../guildMutex.js';
import { trackFailureCounter, tracksStartedCounter } from '../metrics.js';
import type { TrackResolver } from '../resolver/resolver-adapter.js';
import type { ConnectionHandle, StreamEvent, VoiceTransport } from '../transport/voice-transport.js';
import { hasLiveLocator, type LoopMode, type TrackDescriptor } from './track.js';
import { TrackQueue } from './track-queue.js';

export type SessionState = 'idle' | 'connecting' | 'playing' | 'paused' | 'error';

export interface SessionOptions {
  maxQueueLength: number;
  /** Grace period before an idle, empty session releases its connection. */
  idleTimeoutMs: number;
  connectionTimeoutMs: number;
  maxConsecutiveResolutionFailures: number;
  /** Extra attempts for a transient refresh failure. */
  resolutionRetries: number;
  resolutionRetryDelayMs: number;
  defaultVolume: number;
}

export const DEFAULT_SESSION_OPTIONS: SessionOptions = {
  maxQueueLength: 100,
  idleTimeoutMs: 120_000,
  connectionTimeoutMs: 15_000,
  maxConsecutiveResolutionFailures: 3,
  resolutionRetries: 2,
  resolutionRetryDelayMs: 1_000,
  defaultVolume: 100,
};

export type SessionNotice =
  | { type: 'track_started'; track: TrackDescriptor }
  | { type: 'track_failed'; track: TrackDescriptor; error: Error }
  | { type: 'queue_ended' }
  | { type: 'connection_failed'; error: Error }
  | { type: 'connection_lost'; reason: string }
  | { type: 'failure_limit_reached'; failures: number; remaining: number }
  | { type: 'idle_disconnect' };

export type SessionNotifier = (guildId: string, notice: SessionNotice) => void | Promise<void>;

export interface PlayRequest {
  query: string;
  requestedBy: string;
  voiceChannelId: string;
}

export interface PlayResult {
  track: TrackDescriptor;
  /** 0 = playing now, otherwise the position in the queue. */
  position: number;
  started: boolean;
  /** Channel the session is bound to, which may differ from the request's. */
  voiceChannelId: string | null;
}

export interface SessionSnapshot {
  guildId: string;
  state: SessionState;
  loopMode: LoopMode;
  volume: number;
  voiceChannelId: string | null;
  connected: boolean;
  current?: TrackDescriptor;
  upcoming: TrackDescriptor[];
}

export interface PlaybackSessionDeps {
  guildId: string;
  resolver: TrackResolver;
  transport: VoiceTransport;
  options?: Partial<SessionOptions>;
  mutex?: GuildMutex;
  notifier?: SessionNotifier;
  logger?: Logger;
  onDestroyed?: (session: PlaybackSession) => void;
}

type StartOrigin = 'request' | 'event';

/**
 * Playback Session
 * Owns one guild's queue and voice connection and drives the transport from
 * the queue head. Every mutation runs under the guild mutex; transport events
 * are queued onto the same mutex so they are handled in arrival order.
 *
 * idle -> connecting -> playing <-> paused; playing -> error -> (next track | idle)
 */
export class PlaybackSession {
  readonly guildId: string;
  private readonly queue: TrackQueue;
  private readonly options: SessionOptions;
  private readonly resolver: TrackResolver;
  private readonly transport: VoiceTransport;
  private readonly mutex: GuildMutex;
  private readonly notifier?: SessionNotifier;
  private readonly logger: Logger;
  private readonly onDestroyed?: (session: PlaybackSession) => void;

  private _state: SessionState = 'idle';
  private _volume: number;
  private _voiceChannelId: string | null = null;
  private handle: ConnectionHandle | null = null;
  private consecutiveFailures = 0;
  private streamSeq = 0;
  private activeStream: number | null = null;
  private lifecycle = new AbortController();
  private idleTimer: NodeJS.Timeout | null = null;
  private destroyed = false;

  constructor(deps: PlaybackSessionDeps) {
    this.guildId = deps.guildId;
    this.options = { ...DEFAULT_SESSION_OPTIONS, ...deps.options };
    this.queue = new TrackQueue(this.options.maxQueueLength);
    this.resolver = deps.resolver;
    this.transport = deps.transport;
    this.mutex = deps.mutex ?? sharedGuildMutex;
    this.notifier = deps.notifier;
    this.logger = (deps.logger ?? createLogger({ component: 'playback-session' })).child({ guildId: deps.guildId });
    this.onDestroyed = deps.onDestroyed;
    this._volume = this.options.defaultVolume;
    assertVolume(this._volume, this.guildId);
    // A session that is never played into still expires
    this.armIdleTimer();
  }

  get state(): SessionState {
    return this._state;
  }

  get loopMode(): LoopMode {
    return this.queue.loopMode;
  }

  get volume(): number {
    return this._volume;
  }

  get voiceChannelId(): string | null {
    return this._voiceChannelId;
  }

  get isActive(): boolean {
    return this._state === 'playing' || this._state === 'paused';
  }

  get isIdle(): boolean {
    return this._state === 'idle';
  }

  get hasConnection(): boolean {
    return this.handle !== null;
  }

  get isDestroyed(): boolean {
    return this.destroyed;
  }

  get queueLength(): number {
    return this.queue.length;
  }

  /**
   * Resolves `query`, enqueues it and starts playback when idle.
   * The lookup runs outside the guild lock; stop()/leave() cancel it.
   */
  async play(request: PlayRequest): Promise<PlayResult> {
    this.assertAlive();
    const { signal } = this.lifecycle;

    const track = await this.resolver.resolve(request.query, { requestedBy: request.requestedBy, signal });

    return this.mutex.run(this.guildId, async () => {
      this.assertAlive();
      if (signal.aborted) {
        throw new OperationCancelledError('Play request', this.guildId);
      }

      const position = this.queue.enqueue(track);
      this.cancelIdleTimer();
      if (!this.handle) {
        this._voiceChannelId = request.voiceChannelId;
      } else if (this._voiceChannelId !== request.voiceChannelId) {
        this.logger.info({ requested: request.voiceChannelId, bound: this._voiceChannelId }, 'session: request merged into existing channel queue');
      }

      this.logger.info({ title: track.title, position, state: this._state }, 'session: track queued');

      if (this._state === 'idle') {
        await this.startHead('request');
        if (signal.aborted) {
          throw new OperationCancelledError('Play request', this.guildId);
        }
      }

      return {
        track,
        position,
        started: position === 0 && this.isActive,
        voiceChannelId: this._voiceChannelId,
      };
    });
  }

  async pause(): Promise<boolean> {
    return this.mutex.run(this.guildId, async () => {
      if (this._state !== 'playing' || !this.handle) return false;
      await this.transport.pause(this.handle);
      this.transition('paused');
      return true;
    });
  }

  async resume(): Promise<boolean> {
    return this.mutex.run(this.guildId, async () => {
      if (this._state !== 'paused' || !this.handle) return false;
      await this.transport.resume(this.handle);
      this.transition('playing');
      return true;
    });
  }

  /**
   * Removes up to `count` tracks from the head, the current one included.
   * Skipped tracks are never re-inserted by loop mode.
   */
  async skip(count: number = 1): Promise<TrackDescriptor[]> {
    return this.mutex.run(this.guildId, async () => {
      if (!this.isActive || !this.handle) {
        return this.queue.isEmpty ? [] : this.queue.skip(count);
      }

      const skipped = this.queue.skip(count);
      this.activeStream = null;
      await this.transport.stopStream(this.handle);
      this.logger.info({ skipped: skipped.length }, 'session: skipped');
      await this.startHead('event');
      return skipped;
    });
  }

  /** Full reset: cancels in-flight work, clears the queue and releases the connection. */
  async stop(): Promise<void> {
    this.cancelInFlight();
    await this.mutex.run(this.guildId, async () => {
      if (this.destroyed) return;
      await this.reset();
      this.armIdleTimer();
    });
  }

  /** Stops everything and destroys the session. */
  async leave(): Promise<void> {
    this.cancelInFlight();
    await this.mutex.run(this.guildId, async () => {
      if (this.destroyed) return;
      await this.reset();
      this.markDestroyed('leave');
    });
  }

  /** Destroys an idle session; used by the registry. */
  async destroy(): Promise<void> {
    this.cancelInFlight();
    await this.mutex.run(this.guildId, async () => {
      if (this.destroyed) return;
      await this.reset();
      this.markDestroyed('destroy');
    });
  }

  async setLoopMode(mode: LoopMode): Promise<void> {
    await this.mutex.run(this.guildId, () => {
      this.queue.loopMode = mode;
      this.logger.info({ mode }, 'session: loop mode changed');
    });
  }

  async setVolume(volume: number): Promise<void> {
    assertVolume(volume, this.guildId);
    await this.mutex.run(this.guildId, async () => {
      this._volume = volume;
      if (this.handle) {
        await this.transport.setVolume(this.handle, volume);
      }
    });
  }

  /** Removes an upcoming track. The current track is addressed through skip(). */
  async remove(index: number): Promise<TrackDescriptor> {
    return this.mutex.run(this.guildId, () => {
      this.assertUpcomingIndex(index);
      return this.queue.removeAt(index);
    });
  }

  async move(fromIndex: number, toIndex: number): Promise<TrackDescriptor> {
    return this.mutex.run(this.guildId, () => {
      this.assertUpcomingIndex(fromIndex);
      this.assertUpcomingIndex(toIndex);
      return this.queue.move(fromIndex, toIndex);
    });
  }

  snapshot(): SessionSnapshot {
    const tracks = this.queue.toArray();
    const active = this.isActive;
    return {
      guildId: this.guildId,
      state: this._state,
      loopMode: this.queue.loopMode,
      volume: this._volume,
      voiceChannelId: this._voiceChannelId,
      connected: this.handle !== null,
      current: active ? tracks[0] : undefined,
      upcoming: active ? tracks.slice(1) : tracks,
    };
  }

  // ---------------------------------------------------------------------------
  // Playback driving (always called with the guild lock held)
  // ---------------------------------------------------------------------------

  private async startHead(origin: StartOrigin): Promise<void> {
    const { signal } = this.lifecycle;

    for (;;) {
      if (signal.aborted || this.destroyed) return;

      const head = this.queue.peek();
      if (!head) {
        this.enterIdle();
        return;
      }

      if (!this.handle) {
        try {
          await this.connect(signal);
        } catch (error) {
          this.transition('idle');
          if (isCancellation(error)) return;
          this.logger.warn({ error: serializeError(error) }, 'session: voice connection failed');
          this.armIdleTimer();
          if (origin === 'request') throw error;
          this.notify({ type: 'connection_failed', error: asError(error) });
          return;
        }
      }

      let playable: TrackDescriptor;
      try {
        playable = await this.ensureLocator(head, signal);
      } catch (error) {
        if (isCancellation(error) || signal.aborted) return;
        this.dropHead(error, 'resolution');
        if (this.consecutiveFailures >= this.options.maxConsecutiveResolutionFailures) {
          await this.haltAfterFailures();
          return;
        }
        continue;
      }

      if (signal.aborted) return;

      try {
        await this.beginStream(playable);
        return;
      } catch (error) {
        this.activeStream = null;
        if (signal.aborted) return;
        this.dropHead(error, 'stream');
        if (this.consecutiveFailures >= this.options.maxConsecutiveResolutionFailures) {
          await this.haltAfterFailures();
          return;
        }
      }
    }
  }

  private async connect(signal: AbortSignal): Promise<void> {
    const channelId = this._voiceChannelId;
    if (!channelId) {
      throw new ConnectionError('failed', 'No voice channel to join', this.guildId);
    }

    this.transition('connecting');
    const attempt: { pending?: Promise<ConnectionHandle> } = {};

    try {
      this.handle = await withTimeout(
        (attemptSignal) => {
          attempt.pending = this.transport.connect(channelId, {
            guildId: this.guildId,
            volume: this._volume,
            signal: attemptSignal,
            onDisconnect: (reason) => this.onConnectionLost(reason),
          });
          return attempt.pending;
        },
        this.options.connectionTimeoutMs,
        {
          onTimeout: () => new ConnectionError('timeout', `Voice connection timed out after ${this.options.connectionTimeoutMs}ms`, this.guildId),
          onAbort: () => new OperationCancelledError('Voice connection', this.guildId),
        },
        signal,
      );
      this.logger.info({ channelId }, 'session: voice connected');
    } catch (error) {
      // A connection that completes after we gave up must not stay half-open
      void attempt.pending?.then(
        (late) => this.transport.disconnect(late).catch((disconnectError: unknown) => {
          this.logger.warn({ error: serializeError(disconnectError) }, 'session: failed to release abandoned connection');
        }),
        () => undefined,
      );
      throw error;
    }
  }

  private async ensureLocator(track: TrackDescriptor, signal: AbortSignal): Promise<TrackDescriptor> {
    if (hasLiveLocator(track)) return track;

    const refreshed = await withRetry(
      () => this.resolver.refresh(track, { signal }),
      this.options.resolutionRetries + 1,
      this.options.resolutionRetryDelayMs,
      `refresh:${this.guildId}`,
    );
    this.queue.replaceHead(refreshed);
    return refreshed;
  }

  private async beginStream(track: TrackDescriptor): Promise<void> {
    const handle = this.handle;
    const locator = track.streamLocator;
    if (!handle || !locator) {
      throw new AudioError('Nothing to stream', 'STREAM_UNAVAILABLE', this.guildId);
    }

    const streamId = ++this.streamSeq;
    this.activeStream = streamId;
    await this.transport.stream(handle, locator, (event) => this.onStreamEvent(streamId, event));
    this.transition('playing');
    this.logger.info({ title: track.title }, 'session: streaming');
  }

  private onStreamEvent(streamId: number, event: StreamEvent): void {
    this.mutex
      .run(this.guildId, () => this.handleStreamEvent(streamId, event))
      .catch((error: unknown) => {
        this.logger.error({ error: serializeError(error), event: event.type }, 'session: stream event handling failed');
      });
  }

  private async handleStreamEvent(streamId: number, event: StreamEvent): Promise<void> {
    if (this.destroyed || streamId !== this.activeStream) return;

    switch (event.type) {
      case 'started': {
        this.consecutiveFailures = 0;
        tracksStartedCounter.inc();
        const current = this.queue.peek();
        if (current) this.notify({ type: 'track_started', track: current });
        return;
      }
      case 'finished': {
        this.activeStream = null;
        this.queue.completeHead();
        await this.startHead('event');
        return;
      }
      case 'error': {
        this.activeStream = null;
        // Stays in `error` until the next head streams or the queue runs dry
        this.transition('error');
        this.dropHead(event.error, 'stream');
        if (this.consecutiveFailures >= this.options.maxConsecutiveResolutionFailures) {
          await this.haltAfterFailures();
          return;
        }
        await this.startHead('event');
        return;
      }
    }
  }

  private onConnectionLost(reason: string): void {
    this.mutex
      .run(this.guildId, () => {
        if (this.destroyed || !this.handle) return;
        this.logger.warn({ reason }, 'session: voice connection lost');
        this.handle = null;
        this.activeStream = null;
        this.transition('idle');
        this.notify({ type: 'connection_lost', reason });
        this.armIdleTimer();
      })
      .catch((error: unknown) => {
        this.logger.error({ error: serializeError(error) }, 'session: connection loss handling failed');
      });
  }

  /** Drops the head after a failure; loop mode never re-inserts it. */
  private dropHead(error: unknown, reason: 'resolution' | 'stream'): void {
    const failed = this.queue.dequeueHead();
    this.consecutiveFailures += 1;
    trackFailureCounter.labels(reason).inc();
    if (!failed) return;

    this.logger.warn(
      { title: failed.title, reason, failures: this.consecutiveFailures, error: serializeError(error) },
      'session: dropping track that could not be played',
    );
    this.notify({ type: 'track_failed', track: failed, error: asError(error) });
  }

  private async haltAfterFailures(): Promise<void> {
    const failures = this.consecutiveFailures;
    this.consecutiveFailures = 0;
    this.activeStream = null;
    await this.releaseConnection();
    this.transition('idle');
    this.logger.warn({ failures, remaining: this.queue.length }, 'session: too many consecutive failures, halting');
    this.notify({ type: 'failure_limit_reached', failures, remaining: this.queue.length });
    this.armIdleTimer();
  }

  private enterIdle(): void {
    const wasActive = this._state !== 'idle';
    this.activeStream = null;
    this.transition('idle');
    if (wasActive) this.notify({ type: 'queue_ended' });
    this.armIdleTimer();
  }

  private async reset(): Promise<void> {
    this.cancelIdleTimer();
    this.activeStream = null;
    const cleared = this.queue.clear();
    this.consecutiveFailures = 0;
    await this.releaseConnection();
    this._voiceChannelId = null;
    this.transition('idle');
    this.logger.info({ cleared }, 'session: reset');
  }

  private async releaseConnection(): Promise<void> {
    const handle = this.handle;
    if (!handle) return;
    this.handle = null;
    try {
      await this.transport.disconnect(handle);
    } catch (error) {
      this.logger.warn({ error: serializeError(error) }, 'session: transport disconnect failed');
    }
  }

  private armIdleTimer(): void {
    this.cancelIdleTimer();
    if (this.destroyed) return;

    this.idleTimer = setTimeout(() => {
      this.idleTimer = null;
      this.mutex
        .run(this.guildId, () => this.onIdleTimeout())
        .catch((error: unknown) => {
          this.logger.error({ error: serializeError(error) }, 'session: idle timeout handling failed');
        });
    }, this.options.idleTimeoutMs);
    this.idleTimer.unref();
  }

  private cancelIdleTimer(): void {
    if (this.idleTimer) {
      clearTimeout(this.idleTimer);
      this.idleTimer = null;
    }
  }

  private async onIdleTimeout(): Promise<void> {
    if (this.destroyed || this._state !== 'idle') return;

    // Tracks left while idle belong to a session that lost or never got its connection
    const discarded = this.queue.clear();
    const hadConnection = this.handle !== null;
    await this.releaseConnection();
    this.logger.info({ hadConnection, discarded }, 'session: idle timeout reached');
    if (hadConnection) this.notify({ type: 'idle_disconnect' });
    this.markDestroyed('idle');
  }

  private cancelInFlight(): void {
    this.lifecycle.abort();
    this.lifecycle = new AbortController();
  }

  private markDestroyed(reason: string): void {
    this.cancelIdleTimer();
    this.destroyed = true;
    this.logger.info({ reason }, 'session: destroyed');
    this.onDestroyed?.(this);
  }

  private transition(next: SessionState): void {
    if (this._state === next) return;
    this.logger.debug({ from: this._state, to: next }, 'session: state change');
    this._state = next;
  }

  private notify(notice: SessionNotice): void {
    if (!this.notifier) return;
    try {
      Promise.resolve(this.notifier(this.guildId, notice)).catch((error: unknown) => {
        this.logger.warn({ error: serializeError(error), notice: notice.type }, 'session: notifier failed');
      });
    } catch (error) {
      this.logger.warn({ error: serializeError(error), notice: notice.type }, 'session: notifier failed');
    }
  }

  private assertUpcomingIndex(index: number): void {
    const first = this.isActive ? 1 : 0;
    if (!Number.isInteger(index) || index < first || index >= this.queue.length) {
      throw QueueError.outOfRange(index, this.queue.length);
    }
  }

  private assertAlive(): void {
    if (this.destroyed) {
      throw new AudioError('Session was closed', 'SESSION_CLOSED', this.guildId);
    }
  }
}

function assertVolume(volume: number, guildId: string): void {
  if (!Number.isInteger(volume) || volume < 0 || volume > 200) {
    throw new AudioError('Volume must be an integer between 0 and 200', 'INVALID_VOLUME', guildId);
  }
}

function asError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
