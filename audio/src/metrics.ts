import { Counter, Gauge, Registry } from 'prom-client';

export const audioMetricsRegistry = new Registry();

export const resolutionCounter = new Counter({
  name: 'audio_resolutions_total',
  help: 'Track resolutions by outcome',
  labelNames: ['outcome'],
  registers: [audioMetricsRegistry],
});

export const tracksStartedCounter = new Counter({
  name: 'audio_tracks_started_total',
  help: 'Tracks that started streaming',
  registers: [audioMetricsRegistry],
});

export const trackFailureCounter = new Counter({
  name: 'audio_track_failures_total',
  help: 'Tracks dropped from a queue because they could not be played',
  labelNames: ['reason'],
  registers: [audioMetricsRegistry],
});

export const activeSessionsGauge = new Gauge({
  name: 'audio_active_sessions',
  help: 'Playback sessions currently registered',
  registers: [audioMetricsRegistry],
});
