export type { PlaybackBackendHandle } from './PlaybackBackend';
