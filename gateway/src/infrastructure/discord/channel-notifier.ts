import type { Client } from 'discord.js';
import type { SessionNotice } from '@music-bot/audio';
import { createLogger, type Logger } from '@music-bot/logger';
import { renderNotice } from '../../presentation/ui/reply-renderer.js';

/**
 * Posts playback events to the text channel a guild last used for a command.
 */
export class ChannelNotifier {
  private readonly channels = new Map<string, string>();
  private readonly logger: Logger;

  constructor(
    private readonly client: Client,
    logger?: Logger,
  ) {
    this.logger = logger ?? createLogger({ component: 'channel-notifier' });
  }

  bind(guildId: string, channelId: string): void {
    this.channels.set(guildId, channelId);
  }

  forget(guildId: string): void {
    this.channels.delete(guildId);
  }

  readonly notify = async (guildId: string, notice: SessionNotice): Promise<void> => {
    const text = renderNotice(notice);
    const channelId = this.channels.get(guildId);
    if (!text || !channelId) return;

    const channel = await this.client.channels.fetch(channelId);
    if (!channel?.isSendable()) {
      this.logger.debug({ guildId, channelId }, 'notifier: channel is not sendable');
      return;
    }
    await channel.send(text);
  };
}
