import type { VoiceState } from 'discord.js';
import { logger } from '@music-bot/logger';
import type { MusicDispatcher } from '../application/music-dispatcher.js';

/**
 * Fires the dispatcher's empty-channel hook when the last human leaves the
 * channel the bot is in.
 */
export function createVoiceStateHandler(dispatcher: MusicDispatcher): (oldState: VoiceState, newState: VoiceState) => Promise<void> {
  return async (oldState, newState) => {
    const leftChannel = oldState.channel;
    if (!leftChannel || oldState.channelId === newState.channelId) return;

    const botChannelId = oldState.guild.members.me?.voice.channelId;
    if (leftChannel.id !== botChannelId) return;

    const humans = leftChannel.members.filter((member) => !member.user.bot);
    if (humans.size > 0) return;

    logger.info({ guildId: oldState.guild.id, channelId: leftChannel.id }, 'Voice channel is empty');
    await dispatcher.onVoiceChannelEmpty(oldState.guild.id);
  };
}
