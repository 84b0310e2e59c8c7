import { Client, Events, GatewayIntentBits, GatewayOpcodes } from 'discord.js';
import {
  LavalinkMediaLookup,
  LavalinkVoiceTransport,
  ResolverAdapter,
  SessionRegistry,
  createLavalinkManager,
  initManager,
  leastUsedNode,
  type LavalinkConnectionOptions,
} from '@music-bot/audio';
import { env, toPlaybackSettings } from '@music-bot/config';
import { logger, serializeError } from '@music-bot/logger';
import { MusicDispatcher } from './application/music-dispatcher.js';
import { createMessageHandler } from './handlers/message.js';
import { createVoiceStateHandler } from './handlers/voice-state.js';
import { ChannelNotifier } from './infrastructure/discord/channel-notifier.js';
import { createVoicePreflight } from './infrastructure/discord/voice-preflight.js';

/**
 * Composition Root
 * Wires discord.js, Lavalink and the playback core together.
 */
export class GatewayApplication {
  private readonly client: Client;
  private readonly registry: SessionRegistry;
  private readonly lavalink: LavalinkConnectionOptions = {
    host: env.LAVALINK_HOST,
    port: env.LAVALINK_PORT,
    password: env.LAVALINK_PASSWORD,
    secure: env.LAVALINK_SECURE,
    defaultSearchPlatform: env.DEFAULT_SEARCH_PLATFORM,
  };

  constructor() {
    this.client = new Client({
      intents: [
        GatewayIntentBits.Guilds,
        GatewayIntentBits.GuildMessages,
        GatewayIntentBits.GuildVoiceStates,
        GatewayIntentBits.MessageContent,
      ],
    });

    const client = this.client;
    // Lavalink only ever asks the gateway for voice state updates
    const manager = createLavalinkManager(this.lavalink, (guildId, payload) => {
      client.guilds.cache.get(guildId)?.shard.send({ op: GatewayOpcodes.VoiceStateUpdate, d: payload.d });
    });

    const settings = toPlaybackSettings(env);
    const notifier = new ChannelNotifier(client);
    this.registry = new SessionRegistry({
      resolver: new ResolverAdapter(new LavalinkMediaLookup(leastUsedNode(manager)), {
        timeoutMs: settings.resolutionTimeoutMs,
        allowedHosts: env.ALLOWED_SOURCE_HOSTS,
      }),
      transport: new LavalinkVoiceTransport(manager, { preflight: createVoicePreflight(client) }),
      options: settings,
      notifier: notifier.notify,
    });

    const dispatcher = new MusicDispatcher(this.registry, {
      prefix: env.COMMAND_PREFIX,
      leaveWhenAlone: env.LEAVE_WHEN_ALONE,
    });
    const onMessage = createMessageHandler({ dispatcher, notifier, prefix: env.COMMAND_PREFIX });
    const onVoiceState = createVoiceStateHandler(dispatcher);

    client.on('raw', (packet: Parameters<typeof manager.sendRawData>[0]) => {
      manager.sendRawData(packet).catch((error: unknown) => {
        logger.warn({ error: serializeError(error) }, 'Failed to forward voice packet to Lavalink');
      });
    });

    client.once(Events.ClientReady, (ready) => {
      logger.info({ tag: ready.user.tag, guilds: ready.guilds.cache.size }, 'Bot logged in successfully');
      initManager(manager, this.lavalink, { id: ready.user.id, username: ready.user.username }).catch((error: unknown) => {
        logger.error({ error: serializeError(error) }, 'Failed to initialize Lavalink');
      });
    });

    client.on(Events.MessageCreate, (message) => {
      onMessage(message).catch((error: unknown) => {
        logger.error({ error: serializeError(error), guildId: message.guildId }, 'Message handling failed');
      });
    });

    client.on(Events.VoiceStateUpdate, (oldState, newState) => {
      onVoiceState(oldState, newState).catch((error: unknown) => {
        logger.error({ error: serializeError(error), guildId: oldState.guild.id }, 'Voice state handling failed');
      });
    });
  }

  async start(): Promise<void> {
    await this.client.login(env.DISCORD_TOKEN);
  }

  async shutdown(): Promise<void> {
    await this.registry.shutdown();
    await this.client.destroy();
    logger.info('Gateway shut down');
  }
}
