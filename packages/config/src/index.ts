import { config as loadDotenv } from 'dotenv';
import { z } from 'zod';

// `.env` never overrides variables already present in the process environment
loadDotenv();

const booleanFlag = (defaultValue: boolean) =>
  z
    .enum(['true', 'false', '1', '0'])
    .default(defaultValue ? 'true' : 'false')
    .transform((value) => value === 'true' || value === '1');

const csvList = z
  .string()
  .optional()
  .transform((value) =>
    value
      ? value
          .split(',')
          .map((entry) => entry.trim().toLowerCase())
          .filter((entry) => entry.length > 0)
      : [],
  );

const envSchema = z.object({
  DISCORD_TOKEN: z.string().min(1),
  COMMAND_PREFIX: z.string().min(1).max(5).default('!'),
  // Lavalink
  LAVALINK_HOST: z.string().default('localhost'),
  LAVALINK_PORT: z.coerce.number().int().positive().default(2333),
  LAVALINK_PASSWORD: z.string().min(1),
  LAVALINK_SECURE: booleanFlag(false),
  DEFAULT_SEARCH_PLATFORM: z.enum(['ytsearch', 'ytmsearch', 'scsearch']).default('ytsearch'),
  // Playback
  MAX_QUEUE_LENGTH: z.coerce.number().int().positive().default(100),
  IDLE_TIMEOUT_SECONDS: z.coerce.number().nonnegative().default(120),
  RESOLUTION_TIMEOUT_SECONDS: z.coerce.number().positive().default(15),
  CONNECTION_TIMEOUT_SECONDS: z.coerce.number().positive().default(15),
  MAX_CONSECUTIVE_RESOLUTION_FAILURES: z.coerce.number().int().positive().default(3),
  RESOLUTION_RETRIES: z.coerce.number().int().nonnegative().default(2),
  DEFAULT_VOLUME: z.coerce.number().int().min(0).max(200).default(100),
  ALLOWED_SOURCE_HOSTS: csvList,
  LEAVE_WHEN_ALONE: booleanFlag(true),
  // Observability
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
});

export type Env = z.infer<typeof envSchema>;

export function parseEnv(source: NodeJS.ProcessEnv): Env {
  return envSchema.parse(source);
}

export const env: Env = parseEnv(process.env);

export interface PlaybackSettings {
  maxQueueLength: number;
  idleTimeoutMs: number;
  resolutionTimeoutMs: number;
  connectionTimeoutMs: number;
  maxConsecutiveResolutionFailures: number;
  resolutionRetries: number;
  defaultVolume: number;
}

export function toPlaybackSettings(config: Env): PlaybackSettings {
  return {
    maxQueueLength: config.MAX_QUEUE_LENGTH,
    idleTimeoutMs: Math.round(config.IDLE_TIMEOUT_SECONDS * 1000),
    resolutionTimeoutMs: Math.round(config.RESOLUTION_TIMEOUT_SECONDS * 1000),
    connectionTimeoutMs: Math.round(config.CONNECTION_TIMEOUT_SECONDS * 1000),
    maxConsecutiveResolutionFailures: config.MAX_CONSECUTIVE_RESOLUTION_FAILURES,
    resolutionRetries: config.RESOLUTION_RETRIES,
    defaultVolume: config.DEFAULT_VOLUME,
  };
}
