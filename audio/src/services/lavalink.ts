import { setTimeout as delay } from 'node:timers/promises';
import { LavalinkManager, type GuildShardPayload, type LavalinkNode, type SearchPlatform } from 'lavalink-client';
import { logger } from '@music-bot/logger';

export type SendToShardFn = (guildId: string, payload: GuildShardPayload) => void | Promise<void>;

export interface LavalinkConnectionOptions {
  host: string;
  port: number;
  password: string;
  secure: boolean;
  defaultSearchPlatform: SearchPlatform;
}

export function createLavalinkManager(options: LavalinkConnectionOptions, sendToShard: SendToShardFn): LavalinkManager {
  const manager = new LavalinkManager({
    nodes: [
      {
        id: 'main',
        host: options.host,
        port: options.port,
        authorization: options.password,
        secure: options.secure,
      },
    ],
    sendToShard: async (guildId, payload) => {
      await sendToShard(guildId, payload);
    },
    playerOptions: {
      defaultSearchPlatform: options.defaultSearchPlatform,
    },
  });

  manager.nodeManager.on('connect', (node: LavalinkNode) => logger.info({ node: node.id }, 'lavalink: node connected'));
  manager.nodeManager.on('error', (node: LavalinkNode, error: Error) =>
    logger.error({ node: node.id, error: { name: error.name, message: error.message } }, 'lavalink: node error'),
  );

  return manager;
}

/** Polls the node's REST `/v4/info` until it answers. */
export async function waitForLavalinkRestReady(options: LavalinkConnectionOptions, maxWaitMs: number = 60_000): Promise<boolean> {
  const deadline = Date.now() + maxWaitMs;
  const url = `${options.secure ? 'https' : 'http'}://${options.host}:${options.port}/v4/info`;

  while (Date.now() < deadline) {
    try {
      const res = await fetch(url, { headers: { Authorization: options.password } });
      if (res.ok) {
        logger.info('lavalink: REST API ready');
        return true;
      }
      logger.debug({ status: res.status }, 'lavalink: REST API not ready yet');
    } catch (error) {
      logger.debug(
        { error: error instanceof Error ? error.message : String(error), timeRemaining: deadline - Date.now() },
        'lavalink: waiting for REST API',
      );
    }
    await delay(1000);
  }

  logger.error({ maxWaitMs }, 'lavalink: REST API failed to become ready within timeout');
  return false;
}

export async function initManager(
  manager: LavalinkManager,
  options: LavalinkConnectionOptions,
  botUser: { id: string; username: string },
): Promise<void> {
  await waitForLavalinkRestReady(options);
  await manager.init({ id: botUser.id, username: botUser.username });
}
