/**
 * MarkerResolver - looks up intro/credits markers for an item.
 *
 * The local repository is consulted first; markers are fetched from the
 * remote source only when the repository has none, and stored back.
 * Any failure yields empty markers: skip prompts are optional.
 */

import type { MarkerRepository, MarkerSource } from './collaborators';
import { EMPTY_MARKERS, type MarkerPair, type MediaItemId } from '../types/playback';
import { describeError } from '../errors';
import { Logger } from '../../utils/Logger';

const log = new Logger('MarkerResolver');

export class MarkerResolver {
  constructor(
    private readonly repository: MarkerRepository | undefined,
    private readonly source: MarkerSource | undefined
  ) {}

  async resolve(mediaId: MediaItemId): Promise<MarkerPair> {
    const cached = await this.readCached(mediaId);
    if (cached && (cached.intro || cached.credits)) {
      return cached;
    }
    if (!this.source) {
      return cached ?? { ...EMPTY_MARKERS };
    }

    let fetched: MarkerPair;
    try {
      fetched = await this.source.fetchMarkers(mediaId);
    } catch (err) {
      log.warn(`Failed to fetch markers for ${mediaId}: ${describeError(err)}`);
      return { ...EMPTY_MARKERS };
    }

    if (this.repository) {
      try {
        await this.repository.storeMarkers(mediaId, fetched);
      } catch (err) {
        log.warn(`Failed to store markers for ${mediaId}: ${describeError(err)}`);
      }
    }
    return fetched;
  }

  private async readCached(mediaId: MediaItemId): Promise<MarkerPair | null> {
    if (!this.repository) return null;
    try {
      return await this.repository.getMarkers(mediaId);
    } catch (err) {
      log.warn(`Failed to read stored markers for ${mediaId}: ${describeError(err)}`);
      return null;
    }
  }
}
