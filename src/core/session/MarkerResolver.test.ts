import { describe, it, expect, vi } from 'vitest';
import { MarkerResolver } from './MarkerResolver';
import type { MarkerRepository, MarkerSource } from './collaborators';
import type { MarkerPair } from '../types/playback';

const markers: MarkerPair = {
  intro: { startMs: 10_000, endMs: 25_000, kind: 'intro' },
  credits: null,
};

function createRepository(stored: MarkerPair | null): MarkerRepository {
  return {
    getMarkers: vi.fn().mockResolvedValue(stored),
    storeMarkers: vi.fn().mockResolvedValue(undefined),
  };
}

function createSource(result: MarkerPair | Error): MarkerSource {
  return {
    fetchMarkers: result instanceof Error ? vi.fn().mockRejectedValue(result) : vi.fn().mockResolvedValue(result),
  };
}

describe('MarkerResolver', () => {
  it('MRK-001: uses stored markers without fetching', async () => {
    const repository = createRepository(markers);
    const source = createSource(markers);
    const resolver = new MarkerResolver(repository, source);

    await expect(resolver.resolve('ep-1')).resolves.toEqual(markers);
    expect(source.fetchMarkers).not.toHaveBeenCalled();
  });

  it('MRK-002: fetches and stores back when nothing is stored', async () => {
    const repository = createRepository(null);
    const source = createSource(markers);
    const resolver = new MarkerResolver(repository, source);

    await expect(resolver.resolve('ep-1')).resolves.toEqual(markers);
    expect(source.fetchMarkers).toHaveBeenCalledWith('ep-1');
    expect(repository.storeMarkers).toHaveBeenCalledWith('ep-1', markers);
  });

  it('MRK-003: refetches when both stored markers are missing', async () => {
    const repository = createRepository({ intro: null, credits: null });
    const source = createSource(markers);
    const resolver = new MarkerResolver(repository, source);

    await expect(resolver.resolve('ep-1')).resolves.toEqual(markers);
    expect(source.fetchMarkers).toHaveBeenCalledTimes(1);
  });

  it('MRK-004: fetch failures yield empty markers', async () => {
    const repository = createRepository(null);
    const resolver = new MarkerResolver(repository, createSource(new Error('offline')));

    await expect(resolver.resolve('ep-1')).resolves.toEqual({ intro: null, credits: null });
    expect(repository.storeMarkers).not.toHaveBeenCalled();
  });

  it('MRK-005: store failures still return the fetched markers', async () => {
    const repository = createRepository(null);
    vi.mocked(repository.storeMarkers).mockRejectedValue(new Error('disk full'));
    const resolver = new MarkerResolver(repository, createSource(markers));

    await expect(resolver.resolve('ep-1')).resolves.toEqual(markers);
  });

  it('MRK-006: repository read failures fall through to the source', async () => {
    const repository = createRepository(null);
    vi.mocked(repository.getMarkers).mockRejectedValue(new Error('locked'));
    const resolver = new MarkerResolver(repository, createSource(markers));

    await expect(resolver.resolve('ep-1')).resolves.toEqual(markers);
  });

  it('MRK-007: without collaborators there are no markers', async () => {
    const resolver = new MarkerResolver(undefined, undefined);
    await expect(resolver.resolve('ep-1')).resolves.toEqual({ intro: null, credits: null });
  });
});
