/**
 * Test utilities and fixtures
 */

import { SeriesContext, type EpisodeInfo, type RemoteQueueInfo } from '../src/core/playlist';

/**
 * Let every already-settled promise chain run to completion.
 * Fakes resolve immediately, so one macrotask turn drains them.
 */
export function flushPromises(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

/** Episodes `ep-1` .. `ep-<count>` of season 1 */
export function createEpisodes(count: number): EpisodeInfo[] {
  return Array.from({ length: count }, (_, i) => ({
    id: `ep-${i + 1}`,
    title: `Episode ${i + 1}`,
    seasonNumber: 1,
    episodeNumber: i + 1,
    watched: false,
    remoteQueueItemId: 100 + i,
  }));
}

export function createSeries(
  currentIndex: number,
  options: { count?: number; autoPlayNext?: boolean; remoteQueue?: RemoteQueueInfo | null } = {}
): SeriesContext {
  return new SeriesContext({
    title: 'Test Show',
    episodes: createEpisodes(options.count ?? 3),
    currentIndex,
    autoPlayNext: options.autoPlayNext ?? true,
    remoteQueue: options.remoteQueue ?? null,
  });
}

export const TEST_REMOTE_QUEUE: RemoteQueueInfo = {
  queueId: 7,
  version: 1,
  selectedItemId: 100,
  sourceUri: null,
  shuffled: false,
};
