import type { LavalinkManager, Player } from 'lavalink-client';
import { createLogger, type Logger } from '@music-bot/logger';
import { ConnectionError } from '../errors.js';
import type { StreamLocator } from '../playback/track.js';
import type { ConnectOptions, ConnectionHandle, StreamEvent, StreamListener, VoiceTransport } from './voice-transport.js';

/**
 * Checks the platform side before joining (permissions, user limit).
 * Throws ConnectionError with kind `permission_denied` or `channel_full`.
 */
export type VoicePreflight = (guildId: string, channelId: string) => Promise<void>;

interface ActiveStream {
  token: string;
  listener: StreamListener;
}

function readField(payload: unknown, key: string): unknown {
  if (typeof payload === 'object' && payload !== null && key in payload) {
    return Reflect.get(payload, key);
  }
  return undefined;
}

function encodedOf(track: unknown): string | undefined {
  const encoded = readField(track, 'encoded');
  return typeof encoded === 'string' ? encoded : undefined;
}

/**
 * Voice transport on a Lavalink player per guild.
 * Lavalink reports `stopped`/`replaced`/`cleanup` ends for tracks we stopped
 * ourselves; only `finished` and `loadFailed` reach the session.
 */
export class LavalinkVoiceTransport implements VoiceTransport {
  private readonly streams = new Map<string, ActiveStream>();
  private readonly disconnectHandlers = new Map<string, (reason: string) => void>();
  private readonly logger: Logger;

  constructor(
    private readonly manager: LavalinkManager,
    private readonly options: { preflight?: VoicePreflight; selfDeaf?: boolean; logger?: Logger } = {},
  ) {
    this.logger = options.logger ?? createLogger({ component: 'lavalink-transport' });

    manager.on('trackStart', (player, track) => {
      this.emit(player.guildId, encodedOf(track), { type: 'started' });
    });

    manager.on('trackEnd', (player, track, payload) => {
      const reason = readField(payload, 'reason');
      this.logger.debug({ guildId: player.guildId, reason: reason ?? 'none' }, 'lavalink: track end');
      if (reason === 'finished') {
        this.emit(player.guildId, encodedOf(track), { type: 'finished' });
      } else if (reason === 'loadFailed') {
        this.emit(player.guildId, encodedOf(track), { type: 'error', error: new Error('Track failed to load') });
      }
    });

    manager.on('trackError', (player, track, payload) => {
      const exception = readField(payload, 'exception');
      const message = readField(exception, 'message');
      this.emit(player.guildId, encodedOf(track), {
        type: 'error',
        error: new Error(typeof message === 'string' && message.length > 0 ? message : 'Track playback failed'),
      });
    });

    manager.on('trackStuck', (player, track) => {
      this.emit(player.guildId, encodedOf(track), { type: 'error', error: new Error('Track got stuck') });
    });

    manager.on('playerDisconnect', (player) => {
      const handler = this.disconnectHandlers.get(player.guildId);
      if (handler) {
        this.logger.warn({ guildId: player.guildId }, 'lavalink: player disconnected from voice');
        handler('Disconnected from the voice channel');
      }
    });
  }

  async connect(channelId: string, options: ConnectOptions): Promise<ConnectionHandle> {
    const { guildId, volume, signal } = options;
    await this.options.preflight?.(guildId, channelId);
    if (signal.aborted) {
      throw new ConnectionError('failed', 'Connection attempt cancelled', guildId);
    }

    const player = this.manager.createPlayer({
      guildId,
      voiceChannelId: channelId,
      selfDeaf: this.options.selfDeaf ?? true,
      volume,
    });

    try {
      await player.connect();
    } catch (error) {
      await this.destroyQuietly(player);
      const message = error instanceof Error ? error.message : String(error);
      throw new ConnectionError('failed', `Could not join voice channel: ${message}`, guildId);
    }

    if (signal.aborted) {
      await this.destroyQuietly(player);
      throw new ConnectionError('failed', 'Connection attempt cancelled', guildId);
    }

    if (options.onDisconnect) {
      this.disconnectHandlers.set(guildId, options.onDisconnect);
    }
    this.logger.info({ guildId, channelId }, 'lavalink: voice connected');
    return { guildId, channelId };
  }

  async stream(handle: ConnectionHandle, locator: StreamLocator, listener: StreamListener): Promise<void> {
    const player = this.requirePlayer(handle);
    this.streams.set(handle.guildId, { token: locator.token, listener });
    await player.play({ track: { encoded: locator.token }, paused: false });
  }

  async pause(handle: ConnectionHandle): Promise<void> {
    const player = this.requirePlayer(handle);
    if (!player.paused) await player.pause();
  }

  async resume(handle: ConnectionHandle): Promise<void> {
    const player = this.requirePlayer(handle);
    if (player.paused) await player.resume();
  }

  async stopStream(handle: ConnectionHandle): Promise<void> {
    this.streams.delete(handle.guildId);
    const player = this.manager.getPlayer(handle.guildId);
    if (player) await player.stopPlaying(false, false);
  }

  async setVolume(handle: ConnectionHandle, volume: number): Promise<void> {
    await this.requirePlayer(handle).setVolume(volume);
  }

  async disconnect(handle: ConnectionHandle): Promise<void> {
    this.streams.delete(handle.guildId);
    this.disconnectHandlers.delete(handle.guildId);
    const player = this.manager.getPlayer(handle.guildId);
    if (player) {
      await player.destroy();
      this.logger.info({ guildId: handle.guildId }, 'lavalink: voice disconnected');
    }
  }

  private emit(guildId: string, token: string | undefined, event: StreamEvent): void {
    const active = this.streams.get(guildId);
    if (!active) return;
    // Late events of a replaced track carry the old encoded track
    if (token !== undefined && token !== active.token) return;
    active.listener(event);
  }

  private requirePlayer(handle: ConnectionHandle): Player {
    const player = this.manager.getPlayer(handle.guildId);
    if (!player) {
      throw new ConnectionError('failed', 'Voice connection is gone', handle.guildId);
    }
    return player;
  }

  private async destroyQuietly(player: Player): Promise<void> {
    try {
      await player.destroy();
    } catch (error) {
      this.logger.warn({ guildId: player.guildId, error }, 'lavalink: failed to destroy player');
    }
  }
}
