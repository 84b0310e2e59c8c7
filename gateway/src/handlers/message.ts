import type { Message } from 'discord.js';
import { logger } from '@music-bot/logger';
import type { MusicDispatcher } from '../application/music-dispatcher.js';
import type { ChannelNotifier } from '../infrastructure/discord/channel-notifier.js';
import { parseCommand } from '../presentation/command-parser.js';
import { renderReply } from '../presentation/ui/reply-renderer.js';

export interface MessageHandlerContext {
  dispatcher: MusicDispatcher;
  notifier: ChannelNotifier;
  prefix: string;
}

export function createMessageHandler(context: MessageHandlerContext): (message: Message) => Promise<void> {
  const { dispatcher, notifier, prefix } = context;

  return async (message) => {
    if (message.author.bot || !message.inGuild()) return;

    const parsed = parseCommand(message.content, prefix);
    if (!parsed) return;

    if (parsed.type === 'usage') {
      await message.reply(parsed.message);
      return;
    }

    notifier.bind(message.guildId, message.channelId);
    logger.debug({ guildId: message.guildId, userId: message.author.id, command: parsed.command.name }, 'Command received');

    const reply = await dispatcher.execute(parsed.command, {
      guildId: message.guildId,
      userId: message.author.id,
      voiceChannelId: message.member?.voice.channelId ?? null,
    });

    if (reply.kind === 'left') notifier.forget(message.guildId);
    await message.reply(renderReply(reply));
  };
}
