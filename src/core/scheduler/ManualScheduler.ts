import type { CancellableHandle, Scheduler } from './Scheduler';

interface PendingTask {
  id: number;
  dueAt: number;
  delayMs: number;
  callback: () => void;
  active: boolean;
}

/**
 * Deterministic scheduler whose clock only moves when told to.
 *
 * Used by tests and by hosts that drive the session from their own
 * frame clock. Tasks due at the same instant fire in scheduling order.
 */
export class ManualScheduler implements Scheduler {
  private currentTime: number;
  private nextId = 1;
  private tasks: PendingTask[] = [];

  constructor(startTime = 0) {
    this.currentTime = startTime;
  }

  now(): number {
    return this.currentTime;
  }

  scheduleOnce(delayMs: number, callback: () => void): CancellableHandle {
    const delay = Math.max(0, delayMs);
    const task: PendingTask = {
      id: this.nextId++,
      dueAt: this.currentTime + delay,
      delayMs: delay,
      callback,
      active: true,
    };
    this.tasks.push(task);

    return {
      cancel: () => {
        if (!task.active) return;
        task.active = false;
        this.tasks = this.tasks.filter((t) => t !== task);
      },
      get active() {
        return task.active;
      },
    };
  }

  /**
   * Move the clock forward, firing every task that falls due on the way,
   * including tasks scheduled by callbacks during the advance.
   */
  advanceBy(ms: number): void {
    const target = this.currentTime + ms;
    for (;;) {
      const next = this.nextDue();
      if (!next || next.dueAt > target) break;
      this.currentTime = next.dueAt;
      this.tasks = this.tasks.filter((t) => t !== next);
      next.active = false;
      next.callback();
    }
    this.currentTime = target;
  }

  /** Fire everything pending, however far in the future. */
  runAll(): void {
    for (;;) {
      const next = this.nextDue();
      if (!next) return;
      this.advanceBy(next.dueAt - this.currentTime);
    }
  }

  /** Number of tasks still waiting to fire. */
  get pendingCount(): number {
    return this.tasks.length;
  }

  /** Original delays of the waiting tasks, in scheduling order. */
  pendingDelays(): number[] {
    return [...this.tasks].sort((a, b) => a.id - b.id).map((t) => t.delayMs);
  }

  private nextDue(): PendingTask | undefined {
    let best: PendingTask | undefined;
    for (const task of this.tasks) {
      if (!best || task.dueAt < best.dueAt || (task.dueAt === best.dueAt && task.id < best.id)) {
        best = task;
      }
    }
    return best;
  }
}
