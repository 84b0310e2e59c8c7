import type { ResolutionErrorKind } from '../errors.js';

/**
 * Classified lookup/playback failure reported by the media backend
 */
export interface ClassifiedLookupError {
  kind: ResolutionErrorKind;
  message: string;
}

/**
 * Classifies a backend exception (Lavalink `exception` payloads, thrown errors)
 * into the resolution taxonomy.
 *
 * - not_found: the item is gone (deleted, private, unavailable)
 * - unsupported: the item exists but cannot be played here (no source manager,
 *   region block, age gate, login wall)
 * - transient: network trouble and anything unrecognised
 */
export function classifyLookupError(error: unknown, severity?: string): ClassifiedLookupError {
  const errorMessage = extractErrorMessage(error);
  const lowerMessage = errorMessage.toLowerCase();

  if (
    lowerMessage.includes('no matching') ||
    lowerMessage.includes('unknown file format') ||
    lowerMessage.includes('not supported') ||
    lowerMessage.includes('unsupported')
  ) {
    return { kind: 'unsupported', message: 'Source is not supported' };
  }

  if (
    lowerMessage.includes('region') ||
    lowerMessage.includes('not available in your country') ||
    lowerMessage.includes('geoblocked') ||
    lowerMessage.includes('blocked')
  ) {
    return { kind: 'unsupported', message: 'Track is blocked in this region' };
  }

  if (
    lowerMessage.includes('verify your age') ||
    lowerMessage.includes('age-restricted') ||
    lowerMessage.includes('age restricted') ||
    lowerMessage.includes('sign in') ||
    lowerMessage.includes('login')
  ) {
    return { kind: 'unsupported', message: 'Track requires a signed-in account' };
  }

  if (
    lowerMessage.includes('temporarily unavailable') ||
    lowerMessage.includes('timeout') ||
    lowerMessage.includes('timed out') ||
    lowerMessage.includes('network') ||
    lowerMessage.includes('econnrefused') ||
    lowerMessage.includes('econnreset') ||
    lowerMessage.includes('enotfound') ||
    lowerMessage.includes('socket hang up')
  ) {
    return { kind: 'transient', message: 'Temporary network issue' };
  }

  if (
    lowerMessage.includes('unavailable') ||
    lowerMessage.includes('deleted') ||
    lowerMessage.includes('removed') ||
    lowerMessage.includes('private') ||
    lowerMessage.includes('no longer available')
  ) {
    return { kind: 'not_found', message: 'Track is unavailable or was removed' };
  }

  // Lavalink marks user-facing, expected failures as COMMON
  if (severity?.toUpperCase() === 'COMMON') {
    return { kind: 'not_found', message: errorMessage || 'Track could not be loaded' };
  }

  return { kind: 'transient', message: errorMessage || 'Unknown lookup failure' };
}

function extractErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  if (error && typeof error === 'object' && 'message' in error) {
    return String(error.message);
  }
  return String(error);
}
