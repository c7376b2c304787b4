/**
 * Configuration barrel export.
 *
 * Re-exports every centralized constant and the session config snapshot so
 * consumers can import from `src/config` instead of reaching into
 * individual config modules.
 */

export * from './TimingConfig';
export * from './PlaybackConfig';
export * from './SessionConfig';
