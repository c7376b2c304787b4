/**
 * Timer abstraction used by every session sub-machine.
 *
 * Sub-machines never call `setTimeout` directly; they receive a `Scheduler`
 * so tests can substitute a fast-forwardable fake.
 */

/**
 * Handle to a pending one-shot callback.
 * `cancel()` is idempotent: cancelling a fired or already-cancelled
 * handle does nothing.
 */
export interface CancellableHandle {
  cancel(): void;
  /** True until the callback has fired or the handle was cancelled */
  readonly active: boolean;
}

export interface Scheduler {
  /** Run `callback` once after `delayMs` milliseconds. */
  scheduleOnce(delayMs: number, callback: () => void): CancellableHandle;
  /** Current time in milliseconds on this scheduler's clock. */
  now(): number;
}

/** Cancel a possibly-absent handle and return null for reassignment. */
export function cancelHandle(handle: CancellableHandle | null): null {
  handle?.cancel();
  return null;
}

/**
 * Scheduler backed by the host event loop (`setTimeout` / `Date.now`).
 */
export class TimerScheduler implements Scheduler {
  scheduleOnce(delayMs: number, callback: () => void): CancellableHandle {
    let active = true;
    const timer: ReturnType<typeof setTimeout> = setTimeout(() => {
      if (!active) return;
      active = false;
      callback();
    }, Math.max(0, delayMs));

    return {
      cancel: () => {
        if (!active) return;
        active = false;
        clearTimeout(timer);
      },
      get active() {
        return active;
      },
    };
  }

  now(): number {
    return Date.now();
  }
}
