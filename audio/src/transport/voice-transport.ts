import type { StreamLocator } from '../playback/track.js';

/**
 * Live voice connection. Owned by exactly one playback session.
 */
export interface ConnectionHandle {
  readonly guildId: string;
  readonly channelId: string;
}

export type StreamEvent =
  | { type: 'started' }
  | { type: 'finished' }
  | { type: 'error'; error: Error };

export type StreamListener = (event: StreamEvent) => void;

export interface ConnectOptions {
  guildId: string;
  volume: number;
  /** Aborted when the attempt times out or the session is stopped. */
  signal: AbortSignal;
  /** The platform dropped the connection (bot kicked, channel deleted). */
  onDisconnect?: (reason: string) => void;
}

/**
 * Voice Transport (Port)
 * Real-time audio connection to a voice channel; audio encoding and framing
 * belong to the implementation. `stream` reports progress through the
 * listener instead of blocking for the track's duration. Each call to
 * `stream` supersedes the previous listener of that connection.
 */
export interface VoiceTransport {
  connect(channelId: string, options: ConnectOptions): Promise<ConnectionHandle>;
  stream(handle: ConnectionHandle, locator: StreamLocator, listener: StreamListener): Promise<void>;
  pause(handle: ConnectionHandle): Promise<void>;
  resume(handle: ConnectionHandle): Promise<void>;
  stopStream(handle: ConnectionHandle): Promise<void>;
  setVolume(handle: ConnectionHandle, volume: number): Promise<void>;
  disconnect(handle: ConnectionHandle): Promise<void>;
}
