import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { TimerScheduler, cancelHandle } from './Scheduler';
import { ManualScheduler } from './ManualScheduler';

describe('TimerScheduler', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('SCHED-001: fires once after the delay', () => {
    const scheduler = new TimerScheduler();
    const callback = vi.fn();
    const handle = scheduler.scheduleOnce(1000, callback);

    vi.advanceTimersByTime(999);
    expect(callback).not.toHaveBeenCalled();
    expect(handle.active).toBe(true);

    vi.advanceTimersByTime(1);
    expect(callback).toHaveBeenCalledTimes(1);
    expect(handle.active).toBe(false);
  });

  it('SCHED-002: cancel prevents the callback and is idempotent', () => {
    const scheduler = new TimerScheduler();
    const callback = vi.fn();
    const handle = scheduler.scheduleOnce(500, callback);

    handle.cancel();
    handle.cancel();
    vi.advanceTimersByTime(1000);

    expect(callback).not.toHaveBeenCalled();
    expect(handle.active).toBe(false);
  });

  it('SCHED-003: cancelling after firing is a no-op', () => {
    const scheduler = new TimerScheduler();
    const callback = vi.fn();
    const handle = scheduler.scheduleOnce(10, callback);

    vi.advanceTimersByTime(10);
    expect(() => handle.cancel()).not.toThrow();
    expect(callback).toHaveBeenCalledTimes(1);
  });

  it('now() follows the system clock', () => {
    vi.setSystemTime(new Date('2024-05-01T00:00:00Z'));
    expect(new TimerScheduler().now()).toBe(Date.parse('2024-05-01T00:00:00Z'));
  });
});

describe('ManualScheduler', () => {
  let scheduler: ManualScheduler;

  beforeEach(() => {
    scheduler = new ManualScheduler();
  });

  it('SCHED-004: fires tasks only when the clock reaches them', () => {
    const callback = vi.fn();
    scheduler.scheduleOnce(2000, callback);

    scheduler.advanceBy(1999);
    expect(callback).not.toHaveBeenCalled();
    expect(scheduler.now()).toBe(1999);

    scheduler.advanceBy(1);
    expect(callback).toHaveBeenCalledTimes(1);
    expect(scheduler.pendingCount).toBe(0);
  });

  it('SCHED-005: fires in due order, ties in scheduling order', () => {
    const order: string[] = [];
    scheduler.scheduleOnce(300, () => order.push('c'));
    scheduler.scheduleOnce(100, () => order.push('a'));
    scheduler.scheduleOnce(100, () => order.push('b'));

    scheduler.advanceBy(300);

    expect(order).toEqual(['a', 'b', 'c']);
  });

  it('SCHED-006: callbacks see the clock at their due time', () => {
    const seen: number[] = [];
    scheduler.scheduleOnce(250, () => seen.push(scheduler.now()));

    scheduler.advanceBy(1000);

    expect(seen).toEqual([250]);
    expect(scheduler.now()).toBe(1000);
  });

  it('SCHED-007: tasks scheduled during an advance fire within the same advance', () => {
    const callback = vi.fn();
    scheduler.scheduleOnce(100, () => {
      scheduler.scheduleOnce(100, callback);
    });

    scheduler.advanceBy(200);

    expect(callback).toHaveBeenCalledTimes(1);
  });

  it('SCHED-008: cancelled tasks never fire and cancellation is idempotent', () => {
    const callback = vi.fn();
    const handle = scheduler.scheduleOnce(100, callback);

    handle.cancel();
    handle.cancel();
    scheduler.advanceBy(500);

    expect(callback).not.toHaveBeenCalled();
    expect(scheduler.pendingCount).toBe(0);
  });

  it('pendingDelays reports original delays in scheduling order', () => {
    scheduler.scheduleOnce(4000, () => {});
    scheduler.scheduleOnce(1000, () => {});

    expect(scheduler.pendingDelays()).toEqual([4000, 1000]);
  });

  it('runAll drains every pending task', () => {
    const callback = vi.fn();
    scheduler.scheduleOnce(60_000, callback);

    scheduler.runAll();

    expect(callback).toHaveBeenCalledTimes(1);
    expect(scheduler.now()).toBe(60_000);
  });

  it('starts from the given time', () => {
    expect(new ManualScheduler(5000).now()).toBe(5000);
  });
});

describe('cancelHandle', () => {
  it('cancels a handle and returns null', () => {
    const scheduler = new ManualScheduler();
    const callback = vi.fn();
    const handle = scheduler.scheduleOnce(10, callback);

    expect(cancelHandle(handle)).toBeNull();
    scheduler.advanceBy(10);
    expect(callback).not.toHaveBeenCalled();
  });

  it('accepts null', () => {
    expect(cancelHandle(null)).toBeNull();
  });
});
