/**
 * ControlVisibilityMachine - shows and hides the player controls from
 * pointer activity.
 *
 * States: `hidden`, `visible` (inactivity timer running) and `hovering`
 * (pointer over the controls, no timer). Every timer carries a token so a
 * callback that races a state change is ignored.
 */

import { EventEmitter, type EventMap } from '../../utils/EventEmitter';
import { cancelHandle, type CancellableHandle, type Scheduler } from '../scheduler/Scheduler';
import type { SessionConfig } from '../../config/SessionConfig';
import type { Disposable } from '../ManagerBase';

export type ControlState = 'hidden' | 'visible' | 'hovering';

export type ControlVisibilityConfig = Pick<SessionConfig, 'controlsInactivityTimeoutMs' | 'pointerMoveThresholdPx'>;

export interface ControlVisibilityEvents extends EventMap {
  visibilityChanged: { visible: boolean };
}

interface Point {
  x: number;
  y: number;
}

export class ControlVisibilityMachine extends EventEmitter<ControlVisibilityEvents> implements Disposable {
  private config: ControlVisibilityConfig;
  private _state: ControlState = 'visible';
  private timer: CancellableHandle | null = null;
  private timerToken = 0;
  private lastPointer: Point | null = null;
  private overlayOpen = false;

  constructor(
    private readonly scheduler: Scheduler,
    config: ControlVisibilityConfig
  ) {
    super();
    this.config = { ...config };
    this.startTimer();
  }

  updateConfig(config: ControlVisibilityConfig): void {
    this.config = { ...config };
  }

  get state(): ControlState {
    return this._state;
  }

  get visible(): boolean {
    return this._state !== 'hidden';
  }

  get isOverlayOpen(): boolean {
    return this.overlayOpen;
  }

  pointerEnter(): void {
    if (this._state === 'hidden') {
      this.transition('visible');
    }
  }

  /** Ignored while a secondary overlay (track menu, popover) is open */
  pointerLeave(): void {
    if (this.overlayOpen) return;
    this.transition('hidden');
  }

  pointerMove(x: number, y: number, overControls: boolean): void {
    switch (this._state) {
      case 'hidden':
        if (this.movedPastThreshold(x, y)) {
          this.transition('visible');
        }
        break;
      case 'visible':
        this.lastPointer = { x, y };
        if (overControls) {
          this.transition('hovering');
        } else {
          this.startTimer();
        }
        break;
      case 'hovering':
        this.lastPointer = { x, y };
        if (!overControls) {
          this.transition('visible');
        }
        break;
    }
  }

  toggle(): void {
    this.transition(this._state === 'hidden' ? 'visible' : 'hidden');
  }

  setOverlayOpen(open: boolean): void {
    this.overlayOpen = open;
  }

  dispose(): void {
    this.cancelTimer();
    this.removeAllListeners();
  }

  /**
   * The first move always counts; later moves must cover the threshold
   * distance from the last counted position.
   */
  private movedPastThreshold(x: number, y: number): boolean {
    const last = this.lastPointer;
    if (last && Math.hypot(x - last.x, y - last.y) < this.config.pointerMoveThresholdPx) {
      return false;
    }
    this.lastPointer = { x, y };
    return true;
  }

  private transition(next: ControlState): void {
    const wasVisible = this.visible;
    this._state = next;

    if (next === 'visible') {
      this.startTimer();
    } else {
      this.cancelTimer();
    }

    if (wasVisible !== this.visible) {
      this.emit('visibilityChanged', { visible: this.visible });
    }
  }

  private startTimer(): void {
    this.cancelTimer();
    const token = this.timerToken;
    this.timer = this.scheduler.scheduleOnce(this.config.controlsInactivityTimeoutMs, () => {
      this.timer = null;
      if (token !== this.timerToken || this._state !== 'visible') return;
      this.transition('hidden');
    });
  }

  private cancelTimer(): void {
    this.timerToken++;
    this.timer = cancelHandle(this.timer);
  }
}
