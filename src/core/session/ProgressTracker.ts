/**
 * ProgressTracker - decides when progress is written and whether a
 * saved position is resumed.
 *
 * Pure policy: it never performs I/O. The session asks it on every tick
 * and executes the decision against the progress store.
 */

import type { Scheduler } from '../scheduler/Scheduler';
import type { SessionConfig } from '../../config/SessionConfig';
import {
  percentComplete,
  type PlaybackProgress,
  type PlayerState,
  type RemotePlaybackState,
} from '../types/playback';

export type ProgressPolicyConfig = Pick<
  SessionConfig,
  'autoResume' | 'resumeThresholdMs' | 'progressUpdateIntervalMs' | 'watchedRatio' | 'completionRatio'
>;

/** Outcome of a per-tick persistence check */
export interface PersistDecision {
  persist: boolean;
  watched: boolean;
}

export class ProgressTracker {
  private config: ProgressPolicyConfig;
  private lastPersistAt: number;

  constructor(
    private readonly clock: Pick<Scheduler, 'now'>,
    config: ProgressPolicyConfig
  ) {
    this.config = { ...config };
    this.lastPersistAt = clock.now();
  }

  updateConfig(config: ProgressPolicyConfig): void {
    this.config = { ...config };
  }

  /**
   * Resume iff auto-resume is on, the saved position is strictly past the
   * threshold, the item is not near completion and not marked watched.
   */
  shouldResume(progress: PlaybackProgress | null): progress is PlaybackProgress {
    if (!progress || !this.config.autoResume) return false;
    if (progress.watched) return false;
    if (progress.positionMs <= this.config.resumeThresholdMs) return false;
    return percentComplete(progress) < this.config.completionRatio;
  }

  isWatched(positionMs: number, durationMs: number): boolean {
    if (durationMs <= 0) return false;
    return positionMs / durationMs > this.config.watchedRatio;
  }

  /**
   * Periodic check. Persist when watched or when the update interval has
   * elapsed since the last write; never for unknown durations.
   * A positive decision restarts the interval.
   */
  evaluate(positionMs: number, durationMs: number): PersistDecision {
    if (durationMs <= 0) return { persist: false, watched: false };

    const watched = this.isWatched(positionMs, durationMs);
    const elapsed = this.clock.now() - this.lastPersistAt;
    const persist = watched || elapsed >= this.config.progressUpdateIntervalMs;
    if (persist) {
      this.lastPersistAt = this.clock.now();
    }
    return { persist, watched };
  }

  /**
   * Snapshot for an out-of-band write (pause, stop, navigation).
   * Null when the duration is unknown.
   */
  snapshot(positionMs: number, durationMs: number): PlaybackProgress | null {
    if (durationMs <= 0) return null;
    this.lastPersistAt = this.clock.now();
    return { positionMs, durationMs, watched: this.isWatched(positionMs, durationMs) };
  }

  /** Restart the interval, e.g. when a new item loads */
  resetSaveTimer(): void {
    this.lastPersistAt = this.clock.now();
  }
}

/**
 * Map a local transport state to the remote queue vocabulary.
 * Watched items report `stopped`; states with no remote meaning map to null.
 */
export function remoteStateFor(state: PlayerState, watched: boolean): RemotePlaybackState | null {
  if (watched) return 'stopped';
  switch (state) {
    case 'playing':
      return 'playing';
    case 'paused':
      return 'paused';
    case 'stopped':
      return 'stopped';
    case 'loading':
      return 'buffering';
    case 'idle':
    case 'error':
      return null;
  }
}
