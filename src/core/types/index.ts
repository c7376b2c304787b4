export type {
  MediaItemId,
  PlayerState,
  MarkerKind,
  ChapterMarker,
  MarkerPair,
  PlaybackProgress,
  TrackKind,
  MediaTrack,
  VideoDimensions,
  FrameStepDirection,
  RemotePlaybackState,
} from './playback';
export { EMPTY_MARKERS, percentComplete } from './playback';
