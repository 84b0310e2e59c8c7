export * from './music-dispatcher.js';
