/**
 * SkipMarkerManager - tracks the intro and credits windows of the current
 * item and decides when to show a skip prompt or skip automatically.
 *
 * A shown prompt hides itself after `skipPromptTimeoutMs` and stays hidden
 * until the position leaves its window and comes back.
 */

import { EventEmitter, type EventMap } from '../../utils/EventEmitter';
import type { SessionConfig } from '../../config/SessionConfig';
import type { Disposable } from '../ManagerBase';
import { cancelHandle, type CancellableHandle, type Scheduler } from '../scheduler/Scheduler';
import type { ChapterMarker, MarkerKind } from '../types/playback';
import { Logger } from '../../utils/Logger';

const log = new Logger('SkipMarkerManager');

export type SkipPolicyConfig = Pick<
  SessionConfig,
  | 'skipIntroEnabled'
  | 'skipCreditsEnabled'
  | 'autoSkipIntro'
  | 'autoSkipCredits'
  | 'minimumMarkerDurationMs'
  | 'skipPromptTimeoutMs'
>;

export interface SkipVisibilityChange {
  kind: MarkerKind;
  visible: boolean;
}

/** Result of feeding a new position to the manager */
export interface SkipDecision {
  /** Position to seek to when a window was auto-skipped */
  seekTo: number | null;
  changes: SkipVisibilityChange[];
}

export interface SkipMarkerEvents extends EventMap {
  visibilityChanged: SkipVisibilityChange;
}

interface SkipWindow {
  marker: ChapterMarker | null;
  visible: boolean;
  dismissed: boolean;
  /** Prompt timed out during the current stay in the window */
  expired: boolean;
  hideTimer: CancellableHandle | null;
}

const MARKER_KINDS: readonly MarkerKind[] = ['intro', 'credits'];

/**
 * A prompt is shown while the position lies in `[startMs, endMs)` and the
 * user has not dismissed it.
 */
export function isVisibleAt(positionMs: number, marker: ChapterMarker | null, dismissed: boolean): boolean {
  if (!marker || dismissed) return false;
  return positionMs >= marker.startMs && positionMs < marker.endMs;
}

function emptyWindow(): SkipWindow {
  return { marker: null, visible: false, dismissed: false, expired: false, hideTimer: null };
}

export class SkipMarkerManager extends EventEmitter<SkipMarkerEvents> implements Disposable {
  private config: SkipPolicyConfig;
  private windows: Record<MarkerKind, SkipWindow> = {
    intro: emptyWindow(),
    credits: emptyWindow(),
  };

  constructor(
    private readonly scheduler: Scheduler,
    config: SkipPolicyConfig
  ) {
    super();
    this.config = { ...config };
  }

  updateConfig(config: SkipPolicyConfig): void {
    this.config = { ...config };
  }

  /** Install markers for a new item; dismissals from the previous item are forgotten */
  loadMarkers(intro: ChapterMarker | null, credits: ChapterMarker | null): void {
    this.clearMarkers();
    this.windows.intro.marker = intro;
    this.windows.credits.marker = credits;
    log.debug(`Markers loaded: intro=${intro !== null} credits=${credits !== null}`);
  }

  clearMarkers(): void {
    for (const kind of MARKER_KINDS) {
      const window = this.windows[kind];
      window.marker = null;
      window.dismissed = false;
      window.expired = false;
      this.setVisible(kind, false);
    }
  }

  getMarker(kind: MarkerKind): ChapterMarker | null {
    return this.windows[kind].marker;
  }

  isVisible(kind: MarkerKind): boolean {
    return this.windows[kind].visible;
  }

  isDismissed(kind: MarkerKind): boolean {
    return this.windows[kind].dismissed;
  }

  update(positionMs: number): SkipDecision {
    const changes: SkipVisibilityChange[] = [];
    let seekTo: number | null = null;

    for (const kind of MARKER_KINDS) {
      const window = this.windows[kind];
      const { marker } = window;

      if (seekTo === null && marker && this.shouldAutoSkip(kind, marker) && isVisibleAt(positionMs, marker, window.dismissed)) {
        log.info(`Auto-skipping ${kind} to ${marker.endMs}ms`);
        window.dismissed = true;
        seekTo = marker.endMs;
      }

      const inWindow = isVisibleAt(positionMs, marker, window.dismissed);
      if (!inWindow) window.expired = false;
      const visible = this.promptEnabled(kind) && inWindow && !window.expired;
      if (this.setVisible(kind, visible)) {
        changes.push({ kind, visible });
      }
    }

    return { seekTo, changes };
  }

  /**
   * Explicit skip. Dismisses the window and returns the position to seek
   * to, or null when the item has no such marker.
   */
  skip(kind: MarkerKind): number | null {
    const window = this.windows[kind];
    if (!window.marker) return null;
    window.dismissed = true;
    this.setVisible(kind, false);
    return window.marker.endMs;
  }

  dispose(): void {
    for (const kind of MARKER_KINDS) {
      const window = this.windows[kind];
      window.hideTimer = cancelHandle(window.hideTimer);
    }
    this.removeAllListeners();
  }

  private promptEnabled(kind: MarkerKind): boolean {
    return kind === 'intro' ? this.config.skipIntroEnabled : this.config.skipCreditsEnabled;
  }

  private shouldAutoSkip(kind: MarkerKind, marker: ChapterMarker): boolean {
    const enabled = kind === 'intro' ? this.config.autoSkipIntro : this.config.autoSkipCredits;
    return enabled && marker.endMs - marker.startMs >= this.config.minimumMarkerDurationMs;
  }

  /** Returns true when the visibility actually changed */
  private setVisible(kind: MarkerKind, visible: boolean): boolean {
    const window = this.windows[kind];
    if (window.visible === visible) return false;
    window.visible = visible;
    window.hideTimer = cancelHandle(window.hideTimer);
    if (visible && this.config.skipPromptTimeoutMs > 0) {
      window.hideTimer = this.scheduler.scheduleOnce(this.config.skipPromptTimeoutMs, () => this.expire(kind));
    }
    this.emit('visibilityChanged', { kind, visible });
    return true;
  }

  private expire(kind: MarkerKind): void {
    const window = this.windows[kind];
    window.hideTimer = null;
    window.expired = true;
    log.debug(`Skip ${kind} prompt timed out`);
    this.setVisible(kind, false);
  }
}
