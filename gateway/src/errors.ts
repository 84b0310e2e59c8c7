import {
  AudioError,
  ConnectionError,
  OperationCancelledError,
  QueueError,
  ResolutionError,
  SessionBusyError,
} from '@music-bot/audio';
import { logger as rootLogger, serializeError, type Logger } from '@music-bot/logger';

export class AppError extends Error {
  constructor(
    message: string,
    public code: string,
  ) {
    super(message);
    this.name = 'AppError';
    Error.captureStackTrace(this, this.constructor);
  }
}

export class ValidationError extends AppError {
  constructor(message: string) {
    super(message, 'VALIDATION_ERROR');
    this.name = 'ValidationError';
  }
}

export interface DescribedError {
  message: string;
  /** Set for unexpected errors; the same id is logged with the stack. */
  errorId?: string;
}

function resolutionMessage(error: ResolutionError): string {
  switch (error.kind) {
    case 'not_found':
      return `❌ ${error.message}`;
    case 'unsupported':
      return `❌ Can't play that: ${error.message}`;
    case 'transient':
      return '⚠️ The music service is having trouble right now. Please try again in a moment.';
  }
}

function connectionMessage(error: ConnectionError): string {
  switch (error.kind) {
    case 'permission_denied':
      return "❌ I don't have permission to join your voice channel.";
    case 'channel_full':
      return '❌ Your voice channel is full.';
    case 'timeout':
      return '⚠️ Joining the voice channel timed out. Please try again.';
    case 'failed':
      return "⚠️ I couldn't join your voice channel. Please try again.";
  }
}

/**
 * Turns any error thrown by a command into a user-facing message.
 * Domain errors are described; anything else is logged with an error id.
 */
export function describeError(error: unknown, context: Record<string, unknown> = {}, logger: Logger = rootLogger): DescribedError {
  if (error instanceof ValidationError) {
    return { message: `❌ ${error.message}` };
  }
  if (error instanceof ResolutionError) {
    return { message: resolutionMessage(error) };
  }
  if (error instanceof ConnectionError) {
    return { message: connectionMessage(error) };
  }
  if (error instanceof QueueError) {
    return {
      message: error.kind === 'queue_full' ? `❌ ${error.message}.` : '❌ There is no track at that position.',
    };
  }
  // Another command (stop, leave) cut this one short
  if (error instanceof OperationCancelledError) {
    return { message: '⏹️ Playback was stopped before that request finished.' };
  }
  if (error instanceof SessionBusyError) {
    return { message: '⚠️ Playback is busy in this server. Stop it first.' };
  }
  if (error instanceof AudioError && error.code === 'INVALID_VOLUME') {
    return { message: `❌ ${error.message}.` };
  }

  const errorId = Math.random().toString(36).substring(2, 15);
  logger.error({ errorId, error: serializeError(error), ...context }, 'Command failed unexpectedly');
  return { message: `Something went wrong. Please try again later. (Error ID: ${errorId})`, errorId };
}
