import { createLogger, type Logger } from '@music-bot/logger';
import { SessionBusyError } from '../errors.js';
import { GuildMutex, guildMutex as sharedGuildMutex } from '../guildMutex.js';
import { activeSessionsGauge } from '../metrics.js';
import type { TrackResolver } from '../resolver/resolver-adapter.js';
import type { VoiceTransport } from '../transport/voice-transport.js';
import { PlaybackSession, type SessionNotifier, type SessionOptions } from './playback-session.js';

// Registry bookkeeping is serialized as a whole, not per guild
const REGISTRY_LOCK_KEY = 'registry';

export interface SessionRegistryDeps {
  resolver: TrackResolver;
  transport: VoiceTransport;
  options?: Partial<SessionOptions>;
  notifier?: SessionNotifier;
  /** Lock shared by the sessions; registry bookkeeping uses its own. */
  mutex?: GuildMutex;
  logger?: Logger;
}

/**
 * One playback session per guild. Sessions remove themselves when they
 * are destroyed (leave, idle timeout).
 */
export class SessionRegistry {
  private readonly sessions = new Map<string, PlaybackSession>();
  private readonly registryLock = new GuildMutex();
  private readonly logger: Logger;

  constructor(private readonly deps: SessionRegistryDeps) {
    this.logger = deps.logger ?? createLogger({ component: 'session-registry' });
  }

  get size(): number {
    return this.sessions.size;
  }

  guildIds(): string[] {
    return [...this.sessions.keys()];
  }

  get(guildId: string): PlaybackSession | undefined {
    return this.sessions.get(guildId);
  }

  /** Idempotent: repeated calls for one guild return the same session. */
  getOrCreate(guildId: string): PlaybackSession {
    const existing = this.sessions.get(guildId);
    if (existing && !existing.isDestroyed) return existing;

    const session = new PlaybackSession({
      guildId,
      resolver: this.deps.resolver,
      transport: this.deps.transport,
      options: this.deps.options,
      notifier: this.deps.notifier,
      mutex: this.deps.mutex ?? sharedGuildMutex,
      logger: this.deps.logger,
      onDestroyed: (destroyed) => this.forget(destroyed),
    });
    this.sessions.set(guildId, session);
    activeSessionsGauge.set(this.sessions.size);
    this.logger.info({ guildId, sessions: this.sessions.size }, 'registry: session created');
    return session;
  }

  /**
   * Destroys and removes an idle session.
   * @throws SessionBusyError while the session is connecting, playing or paused
   */
  async remove(guildId: string): Promise<boolean> {
    return this.registryLock.run(REGISTRY_LOCK_KEY, async () => {
      const session = this.sessions.get(guildId);
      if (!session) return false;
      if (!session.isIdle) {
        throw new SessionBusyError(guildId, session.state);
      }
      await session.destroy();
      this.forget(session);
      return true;
    });
  }

  /** Leaves every guild; used on process shutdown. */
  async shutdown(): Promise<void> {
    const sessions = [...this.sessions.values()];
    this.logger.info({ sessions: sessions.length }, 'registry: shutting down');
    const results = await Promise.allSettled(sessions.map((session) => session.leave()));
    results.forEach((result, index) => {
      if (result.status === 'rejected') {
        this.logger.warn({ guildId: sessions[index]?.guildId, error: result.reason }, 'registry: session failed to leave');
      }
    });
    this.sessions.clear();
    activeSessionsGauge.set(0);
  }

  private forget(session: PlaybackSession): void {
    if (this.sessions.get(session.guildId) !== session) return;
    this.sessions.delete(session.guildId);
    activeSessionsGauge.set(this.sessions.size);
    this.logger.info({ guildId: session.guildId, sessions: this.sessions.size }, 'registry: session removed');
  }
}
