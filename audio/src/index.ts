export {
  AudioError,
  ConnectionError,
  OperationCancelledError,
  QueueError,
  ResolutionError,
  SessionBusyError,
  isCancellation,
  withRetry,
  withTimeout,
  type ConnectionErrorKind,
  type QueueErrorKind,
  type ResolutionErrorKind,
} from './errors.js';
export { GuildMutex, guildMutex } from './guildMutex.js';
export { audioMetricsRegistry } from './metrics.js';

export {
  LOOP_MODES,
  createTrack,
  formatDuration,
  hasLiveLocator,
  isLoopMode,
  withStreamLocator,
  type LoopMode,
  type StreamLocator,
  type TrackDescriptor,
} from './playback/track.js';
export { DEFAULT_MAX_QUEUE_LENGTH, TrackQueue } from './playback/track-queue.js';
export {
  DEFAULT_SESSION_OPTIONS,
  PlaybackSession,
  type PlayRequest,
  type PlayResult,
  type PlaybackSessionDeps,
  type SessionNotice,
  type SessionNotifier,
  type SessionOptions,
  type SessionSnapshot,
  type SessionState,
} from './playback/playback-session.js';
export { SessionRegistry, type SessionRegistryDeps } from './playback/session-registry.js';

export type { LookupMatch, LookupResult, MediaLookup } from './resolver/media-lookup.js';
export {
  DEFAULT_RESOLUTION_TIMEOUT_MS,
  ResolverAdapter,
  type ResolveOptions,
  type ResolverAdapterOptions,
  type TrackResolver,
} from './resolver/resolver-adapter.js';
export { classifyLookupError, type ClassifiedLookupError } from './resolver/lookup-error-classifier.js';
export {
  LavalinkMediaLookup,
  leastUsedNode,
  type LavalinkSearchNode,
  type LavalinkSearchResultLike,
  type SearchNodeProvider,
} from './resolver/lavalink-media-lookup.js';

export type {
  ConnectOptions,
  ConnectionHandle,
  StreamEvent,
  StreamListener,
  VoiceTransport,
} from './transport/voice-transport.js';
export { LavalinkVoiceTransport, type VoicePreflight } from './transport/lavalink-transport.js';
export {
  createLavalinkManager,
  initManager,
  waitForLavalinkRestReady,
  type LavalinkConnectionOptions,
  type SendToShardFn,
} from './services/lavalink.js';
