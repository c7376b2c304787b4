/**
 * Contract between the session core and a decode/render engine.
 *
 * The engine runs out of band; every call returns a promise and any call
 * may reject with a `BackendError`. The handle never pushes state changes,
 * so callers re-query after each command.
 *
 * Implementations are chosen by the host at construction; the session is
 * written against this interface only.
 */

import type {
  FrameStepDirection,
  MediaTrack,
  PlayerState,
  TrackKind,
  VideoDimensions,
} from '../types/playback';

export interface PlaybackBackendHandle {
  /** Load a stream URL without starting playback */
  load(url: string): Promise<void>;
  play(): Promise<void>;
  pause(): Promise<void>;
  stop(): Promise<void>;
  seek(positionMs: number): Promise<void>;
  /** Volume in [0, 1] */
  setVolume(volume: number): Promise<void>;
  setSpeed(speed: number): Promise<void>;

  /** Current position, or null when nothing is loaded */
  getPosition(): Promise<number | null>;
  /** Media duration, or null while unknown */
  getDuration(): Promise<number | null>;
  getState(): Promise<PlayerState>;
  /** Video size, or null before the first frame is decoded */
  getDimensions(): Promise<VideoDimensions | null>;

  getTracks(kind: TrackKind): Promise<MediaTrack[]>;
  getCurrentTrack(kind: TrackKind): Promise<number | null>;
  /** Select a track; `null` disables subtitles */
  selectTrack(kind: TrackKind, id: number | null): Promise<void>;

  frameStep(direction: FrameStepDirection): Promise<void>;
}
