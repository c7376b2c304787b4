/**
 * Playback session core - public API
 */

export * from './core/session';
export * from './core/playlist';
export * from './core/scheduler';
export * from './core/backend';
export * from './core/types';
export * from './config';
export {
  AppError,
  ResolutionError,
  BackendError,
  PersistenceError,
  ValidationError,
  toAppError,
  describeError,
} from './core/errors';
export type { ResolutionFailure, BackendFailure } from './core/errors';
export type { Disposable } from './core/ManagerBase';
export { EventEmitter } from './utils/EventEmitter';
export type { EventMap } from './utils/EventEmitter';
export { Logger, LogLevel, parseLogLevel } from './utils/Logger';
export type { LogSink } from './utils/Logger';
