import { describe, it, expect, vi, beforeEach, type Mock } from 'vitest';
import { AutoPlayScheduler, type AutoPlayCallbacks } from './AutoPlayScheduler';
import { ManualScheduler } from '../scheduler/ManualScheduler';
import { SingleItemContext } from '../playlist/PlaylistContext';
import { createSeries } from '../../../test/utils';

const DURATION = 1_200_000;

describe('AutoPlayScheduler', () => {
  let scheduler: ManualScheduler;
  let callbacks: { [K in keyof AutoPlayCallbacks]: Mock<AutoPlayCallbacks[K]> };
  let autoPlay: AutoPlayScheduler;

  beforeEach(() => {
    scheduler = new ManualScheduler();
    callbacks = {
      advance: vi.fn<AutoPlayCallbacks['advance']>(),
      navigateAway: vi.fn<AutoPlayCallbacks['navigateAway']>(),
      notice: vi.fn<AutoPlayCallbacks['notice']>(),
    };
    autoPlay = new AutoPlayScheduler(
      scheduler,
      { completionRatio: 0.95, autoPlayNextDelayMs: 3000, endOfPlaylistDelayMs: 5000 },
      callbacks
    );
  });

  it('AUTO-001: advances to the next episode 3s after crossing 95%', () => {
    const series = createSeries(0);

    expect(autoPlay.update(1_140_000, DURATION, series)).toBeNull();
    expect(autoPlay.update(1_141_000, DURATION, series)).toEqual({ kind: 'advance', nextId: 'ep-2', delayMs: 3000 });

    scheduler.advanceBy(2999);
    expect(callbacks.advance).not.toHaveBeenCalled();
    scheduler.advanceBy(1);
    expect(callbacks.advance).toHaveBeenCalledWith('ep-2');
    expect(callbacks.notice).not.toHaveBeenCalled();
  });

  it('AUTO-002: triggers only once per playback', () => {
    const series = createSeries(0);
    autoPlay.update(1_150_000, DURATION, series);
    expect(autoPlay.update(1_160_000, DURATION, series)).toBeNull();
    expect(scheduler.pendingCount).toBe(1);
  });

  it('AUTO-003: last episode navigates away after 5s without loading next', () => {
    const series = createSeries(2);

    expect(autoPlay.update(1_150_000, DURATION, series)).toEqual({ kind: 'navigateAway', delayMs: 5000 });
    expect(callbacks.notice).toHaveBeenCalledWith('End of series');

    scheduler.advanceBy(4999);
    expect(callbacks.navigateAway).not.toHaveBeenCalled();
    scheduler.advanceBy(1);
    expect(callbacks.navigateAway).toHaveBeenCalledTimes(1);
    expect(callbacks.advance).not.toHaveBeenCalled();
  });

  it('AUTO-004: does nothing without a context or with auto-play off', () => {
    expect(autoPlay.update(1_150_000, DURATION, null)).toBeNull();
    autoPlay.cancel();
    expect(autoPlay.update(1_150_000, DURATION, new SingleItemContext())).toBeNull();
    autoPlay.cancel();
    expect(autoPlay.update(1_150_000, DURATION, createSeries(0, { autoPlayNext: false }))).toBeNull();

    expect(scheduler.pendingCount).toBe(0);
    expect(callbacks.notice).not.toHaveBeenCalled();
  });

  it('AUTO-005: cancel drops the pending action and re-arms', () => {
    const series = createSeries(0);
    autoPlay.update(1_150_000, DURATION, series);
    autoPlay.cancel();

    expect(autoPlay.hasTriggered).toBe(false);
    expect(autoPlay.hasPendingAction).toBe(false);
    scheduler.runAll();
    expect(callbacks.advance).not.toHaveBeenCalled();

    expect(autoPlay.update(1_150_000, DURATION, series)?.kind).toBe('advance');
  });

  it('AUTO-006: ignores unknown durations', () => {
    expect(autoPlay.update(1_150_000, 0, createSeries(0))).toBeNull();
    expect(autoPlay.hasTriggered).toBe(false);
  });
});
