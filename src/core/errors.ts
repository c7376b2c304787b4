/**
 * Base error class for all session errors.
 * Provides an optional error code for programmatic handling.
 */
export class AppError extends Error {
  constructor(
    message: string,
    public readonly code?: string
  ) {
    super(message);
    this.name = 'AppError';
  }
}

/** Why a stream URL could not be obtained. */
export type ResolutionFailure = 'network' | 'auth' | 'not_found' | 'timeout' | 'unknown';

/**
 * Error raised while obtaining a playable stream URL for a media item
 * (e.g., network failure, expired credentials, item removed from the server).
 */
export class ResolutionError extends AppError {
  constructor(
    detail: string,
    public readonly reason: ResolutionFailure = 'unknown'
  ) {
    super(detail, 'RESOLUTION_ERROR');
    this.name = 'ResolutionError';
  }
}

/** Why the playback backend rejected a command. */
export type BackendFailure = 'unsupported_codec' | 'permission' | 'out_of_memory' | 'generic';

/**
 * Error raised by the playback backend when a command or query fails.
 */
export class BackendError extends AppError {
  constructor(
    detail: string,
    public readonly reason: BackendFailure = 'generic'
  ) {
    super(detail, 'BACKEND_ERROR');
    this.name = 'BackendError';
  }
}

/**
 * Error raised when progress or markers cannot be written locally or
 * pushed to a remote play queue. Never fatal to playback.
 */
export class PersistenceError extends AppError {
  constructor(detail: string) {
    super(detail, 'PERSISTENCE_ERROR');
    this.name = 'PersistenceError';
  }
}

/**
 * Error thrown when invalid arguments or configuration are passed in
 * (e.g., wrong type, out of range, missing required field).
 */
export class ValidationError extends AppError {
  constructor(
    detail: string,
    public readonly issues: readonly string[] = []
  ) {
    super(detail, 'VALIDATION_ERROR');
    this.name = 'ValidationError';
  }
}

/**
 * Normalize anything thrown into an `AppError`, keeping typed subclasses as-is.
 */
export function toAppError(err: unknown): AppError {
  if (err instanceof AppError) return err;
  if (err instanceof Error) {
    const wrapped = new AppError(err.message);
    wrapped.stack = err.stack;
    return wrapped;
  }
  return new AppError(String(err));
}

/** Human-readable message for logs and user-facing notices. */
export function describeError(err: unknown): string {
  return toAppError(err).message;
}
