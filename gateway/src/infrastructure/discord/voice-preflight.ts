import type { Client } from 'discord.js';
import { ConnectionError, type VoicePreflight } from '@music-bot/audio';

/**
 * Checks a voice channel before the player joins it, so permission and
 * capacity problems surface as ConnectionError kinds instead of a timeout.
 */
export function createVoicePreflight(client: Client): VoicePreflight {
  return async (guildId, channelId) => {
    const channel = await client.channels.fetch(channelId).catch(() => null);
    if (!channel || !channel.isVoiceBased() || channel.guildId !== guildId) {
      throw new ConnectionError('failed', 'Voice channel not found', guildId);
    }

    const botId = client.user?.id;
    const alreadyInside = botId !== undefined && channel.members.has(botId);
    if (channel.full && !alreadyInside) {
      throw new ConnectionError('channel_full', 'Voice channel is full', guildId);
    }
    if (!channel.joinable) {
      throw new ConnectionError('permission_denied', 'Missing permission to join the voice channel', guildId);
    }
  };
}
