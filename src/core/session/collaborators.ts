/**
 * Interfaces of the services a playback session depends on.
 *
 * Network clients, repositories and remote queue APIs live outside the
 * core; the host wires concrete implementations in at construction.
 */

import type {
  MarkerPair,
  MediaItemId,
  PlaybackProgress,
  RemotePlaybackState,
} from '../types/playback';
import type { RemoteQueueInfo } from '../playlist/PlaylistContext';

/** Obtains a playable URL for an item, consulting any local stream cache first */
export interface StreamResolver {
  resolveStream(mediaId: MediaItemId): Promise<string>;
}

/** Local progress repository */
export interface ProgressStore {
  loadProgress(mediaId: MediaItemId, userId: string): Promise<PlaybackProgress | null>;
  saveProgress(mediaId: MediaItemId, positionMs: number, durationMs: number, watched: boolean): Promise<void>;
}

/** Remote source of intro/credits markers */
export interface MarkerSource {
  fetchMarkers(mediaId: MediaItemId): Promise<MarkerPair>;
}

/** Local marker cache so markers are fetched from the server only once */
export interface MarkerRepository {
  /** Stored markers, or null when the item has never been fetched */
  getMarkers(mediaId: MediaItemId): Promise<MarkerPair | null>;
  storeMarkers(mediaId: MediaItemId, markers: MarkerPair): Promise<void>;
}

/** Pushes progress to a server-side play queue */
export interface RemoteProgressSync {
  syncProgress(
    queue: RemoteQueueInfo,
    mediaId: MediaItemId,
    positionMs: number,
    durationMs: number,
    state: RemotePlaybackState
  ): Promise<void>;
}

export interface SessionCollaborators {
  streams: StreamResolver;
  progress: ProgressStore;
  markerSource?: MarkerSource;
  markerRepository?: MarkerRepository;
  remoteSync?: RemoteProgressSync;
}
