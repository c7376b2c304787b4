/**
 * AutoPlayScheduler - advances to the next item once playback nears the end.
 *
 * Fires at most once per load when progress crosses the completion ratio.
 * With a next item the advance is delayed so the viewer can see the
 * credits start; at the end of the traversal the session navigates away.
 */

import { cancelHandle, type CancellableHandle, type Scheduler } from '../scheduler/Scheduler';
import type { SessionConfig } from '../../config/SessionConfig';
import type { PlaylistContext } from '../playlist/PlaylistContext';
import type { MediaItemId } from '../types/playback';
import { Logger } from '../../utils/Logger';

const log = new Logger('AutoPlayScheduler');

export type AutoPlayConfig = Pick<SessionConfig, 'completionRatio' | 'autoPlayNextDelayMs' | 'endOfPlaylistDelayMs'>;

/** Actions the scheduler asks its owner to perform */
export interface AutoPlayCallbacks {
  advance(nextId: MediaItemId): void;
  navigateAway(): void;
  notice(message: string): void;
}

export type AutoPlayAction =
  | { kind: 'advance'; nextId: MediaItemId; delayMs: number }
  | { kind: 'navigateAway'; delayMs: number };

export class AutoPlayScheduler {
  private config: AutoPlayConfig;
  private triggered = false;
  private pending: CancellableHandle | null = null;

  constructor(
    private readonly scheduler: Scheduler,
    config: AutoPlayConfig,
    private readonly callbacks: AutoPlayCallbacks
  ) {
    this.config = { ...config };
  }

  updateConfig(config: AutoPlayConfig): void {
    this.config = { ...config };
  }

  get hasTriggered(): boolean {
    return this.triggered;
  }

  get hasPendingAction(): boolean {
    return this.pending?.active ?? false;
  }

  /**
   * Feed the latest position. Returns the action scheduled on the
   * crossing tick, null otherwise.
   */
  update(positionMs: number, durationMs: number, context: PlaylistContext | null): AutoPlayAction | null {
    if (this.triggered || durationMs <= 0) return null;
    if (positionMs / durationMs <= this.config.completionRatio) return null;

    this.triggered = true;
    if (!context || !context.isAutoPlayEnabled()) return null;

    this.pending = cancelHandle(this.pending);
    const nextId = context.getNext();

    if (nextId !== null) {
      const delayMs = this.config.autoPlayNextDelayMs;
      log.info(`Auto-playing ${nextId} in ${delayMs}ms`);
      this.pending = this.scheduler.scheduleOnce(delayMs, () => {
        this.pending = null;
        this.callbacks.advance(nextId);
      });
      return { kind: 'advance', nextId, delayMs };
    }

    const delayMs = this.config.endOfPlaylistDelayMs;
    log.info(`End of ${context.kind}, leaving in ${delayMs}ms`);
    this.callbacks.notice(context.kind === 'series' ? 'End of series' : 'End of queue');
    this.pending = this.scheduler.scheduleOnce(delayMs, () => {
      this.pending = null;
      this.callbacks.navigateAway();
    });
    return { kind: 'navigateAway', delayMs };
  }

  /** Clear the pending action and re-arm the trigger */
  cancel(): void {
    this.pending = cancelHandle(this.pending);
    this.triggered = false;
  }
}
