import { logger, serializeError } from '@music-bot/logger';
import { GatewayApplication } from './main.js';

async function start(): Promise<void> {
  const app = new GatewayApplication();

  const shutdown = (signal: string) => {
    logger.info({ signal }, 'Shutting down');
    app
      .shutdown()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        logger.error({ error: serializeError(error) }, 'Shutdown failed');
        process.exit(1);
      });
  };

  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));

  process.on('unhandledRejection', (reason) => {
    logger.error({ reason }, 'Unhandled Rejection');
  });

  process.on('uncaughtException', (error) => {
    logger.fatal({ error: serializeError(error) }, 'Uncaught Exception');
    process.exit(1);
  });

  await app.start();
}

start().catch((error: unknown) => {
  logger.error({ error: serializeError(error) }, 'Failed to start gateway');
  process.exit(1);
});
