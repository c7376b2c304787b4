export { SingleItemContext, SeriesContext, PlayQueueContext } from './PlaylistContext';
export type {
  PlaylistContext,
  PlaylistContextKind,
  EpisodeInfo,
  QueueItem,
  RemoteQueueInfo,
  SeriesContextOptions,
  PlayQueueContextOptions,
} from './PlaylistContext';
