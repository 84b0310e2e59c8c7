import { pino, type Logger } from 'pino';

export type { Logger } from 'pino';

export const logger: Logger = pino({
  level: process.env.LOG_LEVEL || 'info',
  base: { service: process.env.SERVICE_NAME || 'music-bot' },
});

/**
 * Child logger carrying fixed bindings, e.g. `createLogger({ component: 'registry' })`.
 */
export function createLogger(bindings: Record<string, unknown>): Logger {
  return logger.child(bindings);
}

export function serializeError(error: unknown): { name: string; message: string; stack?: string } {
  if (error instanceof Error) {
    return { name: error.name, message: error.message, stack: error.stack };
  }
  return { name: 'Unknown', message: String(error) };
}
