import { logger, serializeError } from '@music-bot/logger';

export class AudioError extends Error {
  constructor(
    message: string,
    public code: string,
    public guildId?: string,
    public isRetryable: boolean = false,
  ) {
    super(message);
    this.name = 'AudioError';
    Error.captureStackTrace(this, this.constructor);
  }
}

export type ResolutionErrorKind = 'not_found' | 'transient' | 'unsupported';

export class ResolutionError extends AudioError {
  constructor(
    public readonly kind: ResolutionErrorKind,
    message: string,
    public readonly query?: string,
    guildId?: string,
  ) {
    super(message, `RESOLUTION_${kind.toUpperCase()}`, guildId, kind === 'transient');
    this.name = 'ResolutionError';
  }

  static notFound(query: string): ResolutionError {
    return new ResolutionError('not_found', `No results for "${query}"`, query);
  }

  static unsupported(query: string, reason: string): ResolutionError {
    return new ResolutionError('unsupported', reason, query);
  }

  static transient(query: string, reason: string): ResolutionError {
    return new ResolutionError('transient', reason, query);
  }
}

export type ConnectionErrorKind = 'timeout' | 'permission_denied' | 'channel_full' | 'failed';

export class ConnectionError extends AudioError {
  constructor(
    public readonly kind: ConnectionErrorKind,
    message: string,
    guildId?: string,
  ) {
    super(message, `CONNECTION_${kind.toUpperCase()}`, guildId, kind === 'timeout' || kind === 'failed');
    this.name = 'ConnectionError';
  }
}

export type QueueErrorKind = 'queue_full' | 'index_out_of_range';

export class QueueError extends AudioError {
  constructor(
    public readonly kind: QueueErrorKind,
    message: string,
    guildId?: string,
  ) {
    super(message, kind === 'queue_full' ? 'QUEUE_FULL' : 'INDEX_OUT_OF_RANGE', guildId);
    this.name = 'QueueError';
  }

  static full(limit: number): QueueError {
    return new QueueError('queue_full', `Queue is full (limit ${limit})`);
  }

  static outOfRange(index: number, length: number): QueueError {
    return new QueueError('index_out_of_range', `Position ${index} is out of range (queue length ${length})`);
  }
}

export class SessionBusyError extends AudioError {
  constructor(guildId: string, state: string) {
    super(`Session for guild ${guildId} is ${state}`, 'SESSION_BUSY', guildId);
    this.name = 'SessionBusyError';
  }
}

export class OperationCancelledError extends AudioError {
  constructor(operation: string, guildId?: string) {
    super(`${operation} was cancelled`, 'CANCELLED', guildId);
    this.name = 'OperationCancelledError';
  }
}

export function isCancellation(error: unknown): error is OperationCancelledError {
  return error instanceof OperationCancelledError;
}

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * Retry wrapper for operations that might fail temporarily.
 * Stops at the first non-retryable AudioError; back-off grows linearly with the attempt.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  maxAttempts: number = 3,
  delay: number = 1000,
  context?: string,
): Promise<T> {
  let lastError: Error = new Error('Unknown error');

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      lastError = error instanceof Error ? error : new Error(String(error));

      if (error instanceof AudioError && !error.isRetryable) {
        throw error;
      }

      if (attempt === maxAttempts) {
        logger.warn({ error: serializeError(lastError), context, attempt, maxAttempts }, 'Operation failed after all retry attempts');
        break;
      }

      logger.debug({ error: lastError.message, context, attempt, maxAttempts, delay }, 'Operation failed, retrying');
      if (delay > 0) {
        await sleep(delay * attempt);
      }
    }
  }

  throw lastError;
}

/**
 * Runs `operation` with an AbortSignal that fires on timeout or when `parent` aborts.
 * Timeout rejects with `onTimeout()`, parent abort with `onAbort()`; the operation
 * is expected to observe the signal at its next suspension point.
 */
export async function withTimeout<T>(
  operation: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  errors: { onTimeout: () => Error; onAbort: () => Error },
  parent?: AbortSignal,
): Promise<T> {
  if (parent?.aborted) {
    throw errors.onAbort();
  }

  const controller = new AbortController();
  const cleanup: { timer?: NodeJS.Timeout; detach?: () => void } = {};

  const guard = new Promise<never>((_, reject) => {
    cleanup.timer = setTimeout(() => {
      controller.abort();
      reject(errors.onTimeout());
    }, timeoutMs);

    if (parent) {
      const onParentAbort = () => {
        controller.abort();
        reject(errors.onAbort());
      };
      parent.addEventListener('abort', onParentAbort, { once: true });
      cleanup.detach = () => parent.removeEventListener('abort', onParentAbort);
    }
  });

  try {
    return await Promise.race([operation(controller.signal), guard]);
  } finally {
    clearTimeout(cleanup.timer);
    cleanup.detach?.();
  }
}
