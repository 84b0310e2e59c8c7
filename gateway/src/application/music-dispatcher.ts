import {
  AudioError,
  isLoopMode,
  LOOP_MODES,
  type LoopMode,
  type PlaybackSession,
  type PlayResult,
  type SessionRegistry,
  type SessionSnapshot,
  type TrackDescriptor,
} from '@music-bot/audio';
import { createLogger, type Logger } from '@music-bot/logger';
import { GuildId } from '../domain/value-objects/guild-id.js';
import { SearchQuery } from '../domain/value-objects/search-query.js';
import { UserId } from '../domain/value-objects/user-id.js';
import { ValidationError, describeError } from '../errors.js';

/** Who issued a command and where they are. */
export interface CommandContext {
  guildId: string;
  userId: string;
  /** Voice channel the invoking user is in, if any. */
  voiceChannelId: string | null;
}

export type MusicCommand =
  | { name: 'play'; query: string }
  | { name: 'skip'; count: number }
  | { name: 'pause' }
  | { name: 'resume' }
  | { name: 'stop' }
  | { name: 'queue' }
  | { name: 'nowplaying' }
  | { name: 'loop'; mode: string }
  | { name: 'volume'; volume: number }
  | { name: 'remove'; position: number }
  | { name: 'move'; from: number; to: number }
  | { name: 'leave' }
  | { name: 'help' };

export type MusicReply =
  | { kind: 'queued'; track: TrackDescriptor; position: number; started: boolean }
  | { kind: 'skipped'; tracks: TrackDescriptor[] }
  | { kind: 'paused' }
  | { kind: 'resumed' }
  | { kind: 'stopped' }
  | { kind: 'left' }
  | { kind: 'queue'; snapshot: SessionSnapshot }
  | { kind: 'now_playing'; track: TrackDescriptor; snapshot: SessionSnapshot }
  | { kind: 'loop'; mode: LoopMode }
  | { kind: 'volume'; volume: number }
  | { kind: 'removed'; track: TrackDescriptor }
  | { kind: 'moved'; track: TrackDescriptor; position: number }
  | { kind: 'help'; prefix: string }
  | { kind: 'info'; message: string }
  | { kind: 'error'; message: string; errorId?: string };

export interface MusicDispatcherOptions {
  prefix?: string;
  leaveWhenAlone?: boolean;
  logger?: Logger;
}

const NOTHING_PLAYING: MusicReply = { kind: 'info', message: 'Nothing is playing right now.' };
const NOT_CONNECTED: MusicReply = { kind: 'info', message: "I'm not in a voice channel." };

/**
 * Command Dispatcher
 * Maps chat commands onto the guild's playback session and every outcome,
 * failures included, onto a reply. Never throws.
 */
export class MusicDispatcher {
  private readonly prefix: string;
  private readonly leaveWhenAlone: boolean;
  private readonly logger: Logger;

  constructor(
    private readonly registry: SessionRegistry,
    options: MusicDispatcherOptions = {},
  ) {
    this.prefix = options.prefix ?? '!';
    this.leaveWhenAlone = options.leaveWhenAlone ?? true;
    this.logger = options.logger ?? createLogger({ component: 'dispatcher' });
  }

  async execute(command: MusicCommand, context: CommandContext): Promise<MusicReply> {
    try {
      GuildId.from(context.guildId);
      UserId.from(context.userId);

      switch (command.name) {
        case 'play':
          return await this.play(context, command.query);
        case 'skip':
          return await this.skip(context, command.count);
        case 'pause':
          return await this.pause(context);
        case 'resume':
          return await this.resume(context);
        case 'stop':
          return await this.stop(context);
        case 'queue':
          return this.queueList(context);
        case 'nowplaying':
          return this.nowPlaying(context);
        case 'loop':
          return await this.setLoop(context, command.mode);
        case 'volume':
          return await this.volume(context, command.volume);
        case 'remove':
          return await this.remove(context, command.position);
        case 'move':
          return await this.move(context, command.from, command.to);
        case 'leave':
          return await this.leave(context);
        case 'help':
          return { kind: 'help', prefix: this.prefix };
      }
    } catch (error) {
      const described = describeError(error, { command: command.name, guildId: context.guildId, userId: context.userId }, this.logger);
      return { kind: 'error', ...described };
    }
  }

  async play(context: CommandContext, rawQuery: string): Promise<MusicReply> {
    const query = SearchQuery.from(rawQuery);
    if (!context.voiceChannelId) {
      throw new ValidationError('You need to be in a voice channel to play music.');
    }
    const request = { query: query.value, requestedBy: context.userId, voiceChannelId: context.voiceChannelId };

    let result: PlayResult;
    try {
      result = await this.registry.getOrCreate(context.guildId).play(request);
    } catch (error) {
      // The session idled out between lookup and play; a fresh one takes over
      if (!(error instanceof AudioError && error.code === 'SESSION_CLOSED')) throw error;
      result = await this.registry.getOrCreate(context.guildId).play(request);
    }

    this.logger.info(
      { guildId: context.guildId, userId: context.userId, title: result.track.title, position: result.position },
      'dispatcher: track queued',
    );
    return { kind: 'queued', track: result.track, position: result.position, started: result.started };
  }

  async skip(context: CommandContext, count: number = 1): Promise<MusicReply> {
    if (!Number.isInteger(count) || count < 1) {
      throw new ValidationError('Skip count must be a positive whole number.');
    }
    const session = this.activeSession(context.guildId);
    if (!session) return NOTHING_PLAYING;

    const tracks = await session.skip(count);
    return { kind: 'skipped', tracks };
  }

  async pause(context: CommandContext): Promise<MusicReply> {
    const session = this.registry.get(context.guildId);
    if (session && (await session.pause())) return { kind: 'paused' };
    return session?.state === 'paused' ? { kind: 'info', message: 'Playback is already paused.' } : NOTHING_PLAYING;
  }

  async resume(context: CommandContext): Promise<MusicReply> {
    const session = this.registry.get(context.guildId);
    if (session && (await session.resume())) return { kind: 'resumed' };
    return session?.state === 'playing'
      ? { kind: 'info', message: 'Playback is not paused.' }
      : { kind: 'info', message: 'Nothing is paused right now.' };
  }

  async stop(context: CommandContext): Promise<MusicReply> {
    const session = this.registry.get(context.guildId);
    if (!session) return NOTHING_PLAYING;
    await session.stop();
    return { kind: 'stopped' };
  }

  queueList(context: CommandContext): MusicReply {
    const snapshot = this.registry.get(context.guildId)?.snapshot();
    if (!snapshot || (!snapshot.current && snapshot.upcoming.length === 0)) {
      return { kind: 'info', message: 'The queue is empty.' };
    }
    return { kind: 'queue', snapshot };
  }

  nowPlaying(context: CommandContext): MusicReply {
    const snapshot = this.registry.get(context.guildId)?.snapshot();
    if (!snapshot?.current) return NOTHING_PLAYING;
    return { kind: 'now_playing', track: snapshot.current, snapshot };
  }

  async setLoop(context: CommandContext, mode: string): Promise<MusicReply> {
    const normalized = mode.trim().toLowerCase();
    if (!isLoopMode(normalized)) {
      throw new ValidationError(`Loop mode must be one of: ${LOOP_MODES.join(', ')}.`);
    }
    const session = this.registry.get(context.guildId);
    if (!session) return NOTHING_PLAYING;

    await session.setLoopMode(normalized);
    return { kind: 'loop', mode: normalized };
  }

  async volume(context: CommandContext, volume: number): Promise<MusicReply> {
    const session = this.registry.get(context.guildId);
    if (!session) return NOTHING_PLAYING;

    await session.setVolume(volume);
    return { kind: 'volume', volume };
  }

  /** `position` is 1-based over the upcoming tracks, as shown by the queue listing. */
  async remove(context: CommandContext, position: number): Promise<MusicReply> {
    const session = this.registry.get(context.guildId);
    if (!session) return { kind: 'info', message: 'The queue is empty.' };

    const track = await session.remove(this.toQueueIndex(session, position));
    return { kind: 'removed', track };
  }

  async move(context: CommandContext, from: number, to: number): Promise<MusicReply> {
    const session = this.registry.get(context.guildId);
    if (!session) return { kind: 'info', message: 'The queue is empty.' };

    const track = await session.move(this.toQueueIndex(session, from), this.toQueueIndex(session, to));
    return { kind: 'moved', track, position: to };
  }

  async leave(context: CommandContext): Promise<MusicReply> {
    const session = this.registry.get(context.guildId);
    if (!session) return NOT_CONNECTED;
    await session.leave();
    return { kind: 'left' };
  }

  /** Voice-channel-empty hook: the bot was left alone in its channel. */
  async onVoiceChannelEmpty(guildId: string): Promise<boolean> {
    if (!this.leaveWhenAlone) return false;
    const session = this.registry.get(guildId);
    if (!session) return false;

    this.logger.info({ guildId }, 'dispatcher: leaving empty voice channel');
    await session.leave();
    return true;
  }

  private activeSession(guildId: string): PlaybackSession | undefined {
    const session = this.registry.get(guildId);
    return session?.isActive ? session : undefined;
  }

  private toQueueIndex(session: PlaybackSession, position: number): number {
    if (!Number.isInteger(position) || position < 1) {
      throw new ValidationError('Queue positions start at 1.');
    }
    return session.isActive ? position : position - 1;
  }
}
