/**
 * Shared playback domain types.
 */

/** Opaque media item identifier, compared by value */
export type MediaItemId = string;

/** Transport state as last reported by the backend or set by a session action */
export type PlayerState = 'idle' | 'loading' | 'playing' | 'paused' | 'stopped' | 'error';

export type MarkerKind = 'intro' | 'credits';

/** A skippable chapter window, `[startMs, endMs)` */
export interface ChapterMarker {
  readonly startMs: number;
  readonly endMs: number;
  readonly kind: MarkerKind;
}

/** Optional intro/credits markers for one item */
export interface MarkerPair {
  intro: ChapterMarker | null;
  credits: ChapterMarker | null;
}

export const EMPTY_MARKERS: Readonly<MarkerPair> = Object.freeze({ intro: null, credits: null });

/** Saved playback progress for one item */
export interface PlaybackProgress {
  positionMs: number;
  durationMs: number;
  watched: boolean;
}

/**
 * Fraction of the item already played, capped at 1.
 * Returns 0 when the duration is unknown.
 */
export function percentComplete(progress: Pick<PlaybackProgress, 'positionMs' | 'durationMs'>): number {
  if (progress.durationMs <= 0) return 0;
  return Math.min(progress.positionMs / progress.durationMs, 1);
}

export type TrackKind = 'audio' | 'subtitle';

export interface MediaTrack {
  id: number;
  kind: TrackKind;
  label: string;
}

export interface VideoDimensions {
  width: number;
  height: number;
}

/** Direction for single-frame stepping */
export type FrameStepDirection = 'forward' | 'backward';

/** Playback state vocabulary understood by remote play queues */
export type RemotePlaybackState = 'playing' | 'paused' | 'stopped' | 'buffering';
