/**
 * PlaylistContext - the ordered traversal a media item is played within.
 *
 * Features:
 * - Previous/next lookup for manual navigation
 * - Auto-play eligibility
 * - Optional correlation with a server-side play queue for progress sync
 *
 * Entries are stored as a flat array addressed by index; a context never
 * references other contexts or parent records, so cloning is shallow.
 */

import type { MediaItemId } from '../types/playback';
import { ValidationError } from '../errors';

/** Server-side play queue the local traversal mirrors */
export interface RemoteQueueInfo {
  queueId: number;
  version: number;
  /** Queue item currently selected on the server */
  selectedItemId: number;
  sourceUri?: string | null;
  shuffled: boolean;
}

interface PlaylistEntry {
  id: MediaItemId;
  title: string;
  durationMs?: number | null;
  /** Matching item in the remote queue, when one exists */
  remoteQueueItemId?: number | null;
}

export interface EpisodeInfo extends PlaylistEntry {
  seasonNumber: number;
  episodeNumber: number;
  watched: boolean;
  playbackPositionMs?: number | null;
}

export interface QueueItem extends PlaylistEntry {
  mediaType: string;
}

export type PlaylistContextKind = 'single' | 'series' | 'playQueue';

abstract class PlaylistContextBase<T extends PlaylistEntry> {
  abstract readonly kind: PlaylistContextKind;

  protected selectedRemoteItemId: number | null;

  protected constructor(
    protected readonly entries: readonly T[],
    protected index: number,
    protected readonly autoPlayNext: boolean,
    private readonly remoteQueue: RemoteQueueInfo | null
  ) {
    if (entries.length > 0 && (!Number.isInteger(index) || index < 0 || index >= entries.length)) {
      throw new ValidationError(`Playlist index ${index} out of range (0-${entries.length - 1})`);
    }
    this.selectedRemoteItemId = remoteQueue?.selectedItemId ?? null;
  }

  get currentIndex(): number {
    return this.index;
  }

  get length(): number {
    return this.entries.length;
  }

  get current(): T | null {
    return this.entries[this.index] ?? null;
  }

  hasNext(): boolean {
    return this.index + 1 < this.entries.length;
  }

  hasPrevious(): boolean {
    return this.entries.length > 0 && this.index > 0;
  }

  getNext(): MediaItemId | null {
    return this.hasNext() ? (this.entries[this.index + 1]?.id ?? null) : null;
  }

  getPrevious(): MediaItemId | null {
    return this.hasPrevious() ? (this.entries[this.index - 1]?.id ?? null) : null;
  }

  isAutoPlayEnabled(): boolean {
    return this.autoPlayNext;
  }

  getRemoteQueue(): RemoteQueueInfo | null {
    if (!this.remoteQueue) return null;
    return { ...this.remoteQueue, selectedItemId: this.selectedRemoteItemId ?? this.remoteQueue.selectedItemId };
  }

  /**
   * Point the context at `id`. Returns false when the item is not part
   * of this traversal. Keeps the remote queue selection in step.
   */
  updateCurrentIndex(id: MediaItemId): boolean {
    const newIndex = this.entries.findIndex((e) => e.id === id);
    if (newIndex === -1) return false;

    this.index = newIndex;
    const remoteItemId = this.entries[newIndex]?.remoteQueueItemId;
    if (remoteItemId != null) {
      this.selectedRemoteItemId = remoteItemId;
    }
    return true;
  }

  /** Display label for the current position, empty when there is nothing to show */
  abstract describePosition(): string;

  abstract clone(): PlaylistContext;
}

/**
 * A standalone item with no navigation.
 */
export class SingleItemContext extends PlaylistContextBase<PlaylistEntry> {
  readonly kind = 'single' as const;

  constructor() {
    super([], 0, false, null);
  }

  describePosition(): string {
    return '';
  }

  clone(): SingleItemContext {
    return new SingleItemContext();
  }
}

export interface SeriesContextOptions {
  title: string;
  episodes: readonly EpisodeInfo[];
  currentIndex: number;
  autoPlayNext?: boolean;
  remoteQueue?: RemoteQueueInfo | null;
}

/**
 * Episodes of one show in playback order.
 */
export class SeriesContext extends PlaylistContextBase<EpisodeInfo> {
  readonly kind = 'series' as const;
  readonly title: string;

  constructor(options: SeriesContextOptions) {
    if (options.episodes.length === 0) {
      throw new ValidationError(`Series "${options.title}" has no episodes`);
    }
    super(options.episodes, options.currentIndex, options.autoPlayNext ?? true, options.remoteQueue ?? null);
    this.title = options.title;
  }

  get episodes(): readonly EpisodeInfo[] {
    return this.entries;
  }

  /** Episode that auto-play would load next */
  getNextEpisode(): EpisodeInfo | null {
    return this.hasNext() ? (this.entries[this.index + 1] ?? null) : null;
  }

  describePosition(): string {
    const episode = this.current;
    if (!episode) return '';
    return `${this.title} - S${episode.seasonNumber}E${episode.episodeNumber} - Episode ${this.index + 1} of ${this.entries.length}`;
  }

  clone(): SeriesContext {
    return new SeriesContext({
      title: this.title,
      episodes: this.entries,
      currentIndex: this.index,
      autoPlayNext: this.autoPlayNext,
      remoteQueue: this.getRemoteQueue(),
    });
  }
}

export interface PlayQueueContextOptions {
  remoteQueue: RemoteQueueInfo;
  items: readonly QueueItem[];
  currentIndex: number;
  autoPlayNext?: boolean;
}

/**
 * Mixed items (movies, playlists) backed by a server-side play queue.
 */
export class PlayQueueContext extends PlaylistContextBase<QueueItem> {
  readonly kind = 'playQueue' as const;
  private readonly queue: RemoteQueueInfo;

  constructor(options: PlayQueueContextOptions) {
    if (options.items.length === 0) {
      throw new ValidationError('Play queue has no items');
    }
    super(options.items, options.currentIndex, options.autoPlayNext ?? true, options.remoteQueue);
    this.queue = options.remoteQueue;
  }

  get items(): readonly QueueItem[] {
    return this.entries;
  }

  describePosition(): string {
    const item = this.current;
    if (!item) return '';
    return `${item.title} - Item ${this.index + 1} of ${this.entries.length}`;
  }

  clone(): PlayQueueContext {
    return new PlayQueueContext({
      remoteQueue: { ...this.queue, selectedItemId: this.selectedRemoteItemId ?? this.queue.selectedItemId },
      items: this.entries,
      currentIndex: this.index,
      autoPlayNext: this.autoPlayNext,
    });
  }
}

export type PlaylistContext = SingleItemContext | SeriesContext | PlayQueueContext;
