/**
 * PlaybackSession - drives one playback surface.
 *
 * Receives external events (load requests, 1 Hz ticks, pointer input,
 * transport commands), runs the sub-machines and executes their
 * decisions against the backend handle and the collaborators.
 *
 * Every load bumps a generation counter. Asynchronous results that
 * arrive after a newer load started are dropped.
 */

import { EventEmitter, type EventMap } from '../../utils/EventEmitter';
import { Logger } from '../../utils/Logger';
import { parseSessionConfig, resolveSessionConfig, type SessionConfig } from '../../config/SessionConfig';
import {
  CONTROLS_HEIGHT_PADDING,
  DEFAULT_PLAYBACK_SPEED,
  FORWARD_STEP_MS,
  MAX_WINDOW_WIDTH,
  MAX_PLAYBACK_SPEED,
  MIN_PLAYBACK_SPEED,
  REWIND_STEP_MS,
  SPEED_DOWN_FACTOR,
  SPEED_UP_FACTOR,
  VOLUME_STEP,
} from '../../config/PlaybackConfig';
import { TICK_INTERVAL_MS } from '../../config/TimingConfig';
import { AppError, describeError, toAppError } from '../errors';
import type { Disposable } from '../ManagerBase';
import type { PlaybackBackendHandle } from '../backend/PlaybackBackend';
import { cancelHandle, TimerScheduler, type CancellableHandle, type Scheduler } from '../scheduler/Scheduler';
import type { PlaylistContext } from '../playlist/PlaylistContext';
import type {
  FrameStepDirection,
  MarkerKind,
  MediaItemId,
  MediaTrack,
  PlaybackProgress,
  PlayerState,
  TrackKind,
} from '../types/playback';
import type { SessionCollaborators } from './collaborators';
import { ProgressTracker, remoteStateFor } from './ProgressTracker';
import { RetrySupervisor } from './RetrySupervisor';
import { SkipMarkerManager } from './SkipMarkerManager';
import { MarkerResolver } from './MarkerResolver';
import { AutoPlayScheduler } from './AutoPlayScheduler';
import { ControlVisibilityMachine } from './ControlVisibilityMachine';

const log = new Logger('PlaybackSession');

/** Events emitted by PlaybackSession */
export interface PlaybackSessionEvents extends EventMap {
  stateChanged: { state: PlayerState; previous: PlayerState };
  loading: { mediaId: MediaItemId };
  mediaLoaded: { mediaId: MediaItemId; durationMs: number; resumedAtMs: number | null };
  navigateBack: undefined;
  /** Load retries exhausted or the backend failed; the host offers retryLoad() and navigateBack() */
  error: { message: string; error: AppError };
  windowResizeRequested: { width: number; height: number };
  /** Short user-facing message (toast) */
  notice: { message: string };
  controlsVisibilityChanged: { visible: boolean };
  skipVisibilityChanged: { kind: MarkerKind; visible: boolean };
}

export interface PlaybackSessionOptions {
  backend: PlaybackBackendHandle;
  collaborators: SessionCollaborators;
  /** Full snapshot or overrides on top of the defaults */
  config?: Partial<SessionConfig>;
  /** Defaults to a `setTimeout` based scheduler */
  scheduler?: Scheduler;
}

interface LoadRequest {
  mediaId: MediaItemId;
  context: PlaylistContext | null;
}

const FORCED_PERSIST_STATES: ReadonlySet<PlayerState> = new Set<PlayerState>(['playing', 'paused', 'stopped']);

/**
 * Largest window that shows the whole frame at most MAX_WINDOW_WIDTH wide,
 * plus room for the controls bar. Null for unusable dimensions.
 */
export function computeWindowSize(width: number, height: number): { width: number; height: number } | null {
  if (width <= 0 || height <= 0) return null;
  const maxWidth = Math.min(MAX_WINDOW_WIDTH, width);
  const scale = maxWidth / width;
  return { width: maxWidth, height: Math.floor(height * scale) + CONTROLS_HEIGHT_PADDING };
}

export class PlaybackSession extends EventEmitter<PlaybackSessionEvents> implements Disposable {
  private readonly backend: PlaybackBackendHandle;
  private readonly collaborators: SessionCollaborators;
  private readonly scheduler: Scheduler;
  private config: SessionConfig;

  private readonly progressTracker: ProgressTracker;
  private readonly retry: RetrySupervisor;
  private readonly skipMarkers: SkipMarkerManager;
  private readonly markerResolver: MarkerResolver;
  private readonly autoPlay: AutoPlayScheduler;
  private readonly controls: ControlVisibilityMachine;

  private _state: PlayerState = 'idle';
  private _position = 0;
  private _duration = 0;
  private _volume = 1;
  private _muted = false;
  private _speed = DEFAULT_PLAYBACK_SPEED;
  private _errorMessage: string | null = null;
  private _currentMediaId: MediaItemId | null = null;
  private _context: PlaylistContext | null = null;

  private generation = 0;
  private lastLoad: LoadRequest | null = null;
  private scrubbing = false;
  /** True from the start of a load until it plays or fails for good, retries included */
  private loadInFlight = false;
  /** State seen by the last tick, for forced persistence on transitions */
  private lastTickState: PlayerState = 'idle';
  private tickHandle: CancellableHandle | null = null;
  private tickInFlight = false;
  private disposed = false;

  constructor(options: PlaybackSessionOptions) {
    super();
    this.backend = options.backend;
    this.collaborators = options.collaborators;
    this.scheduler = options.scheduler ?? new TimerScheduler();
    this.config = resolveSessionConfig(options.config);

    this.progressTracker = new ProgressTracker(this.scheduler, this.config);
    this.retry = new RetrySupervisor(this.scheduler, this.config);
    this.skipMarkers = new SkipMarkerManager(this.scheduler, this.config);
    this.markerResolver = new MarkerResolver(this.collaborators.markerRepository, this.collaborators.markerSource);
    this.autoPlay = new AutoPlayScheduler(this.scheduler, this.config, {
      advance: (nextId) => {
        this.navigateTo(nextId).catch((err) => log.error('Auto-play advance failed:', err));
      },
      navigateAway: () => this.navigateBack(),
      notice: (message) => this.emit('notice', { message }),
    });
    this.controls = new ControlVisibilityMachine(this.scheduler, this.config);

    this.skipMarkers.on('visibilityChanged', (change) => this.emit('skipVisibilityChanged', change));
    this.controls.on('visibilityChanged', (change) => this.emit('controlsVisibilityChanged', change));
  }

  // ---------------------------------------------------------------------------
  // Produced surface
  // ---------------------------------------------------------------------------

  get state(): PlayerState {
    return this._state;
  }

  get position(): number {
    return this._position;
  }

  get duration(): number {
    return this._duration;
  }

  get volume(): number {
    return this._volume;
  }

  get muted(): boolean {
    return this._muted;
  }

  get speed(): number {
    return this._speed;
  }

  get isScrubbing(): boolean {
    return this.scrubbing;
  }

  get controlsVisible(): boolean {
    return this.controls.visible;
  }

  get skipIntroVisible(): boolean {
    return this.skipMarkers.isVisible('intro');
  }

  get skipCreditsVisible(): boolean {
    return this.skipMarkers.isVisible('credits');
  }

  get errorMessage(): string | null {
    return this._errorMessage;
  }

  get currentMediaId(): MediaItemId | null {
    return this._currentMediaId;
  }

  get playlistContext(): PlaylistContext | null {
    return this._context;
  }

  /** Position label of the current item within its traversal */
  get positionLabel(): string {
    return this._context?.describePosition() ?? '';
  }

  get currentConfig(): Readonly<SessionConfig> {
    return this.config;
  }

  // ---------------------------------------------------------------------------
  // Loading
  // ---------------------------------------------------------------------------

  /** Load a standalone item */
  load(mediaId: MediaItemId): Promise<void> {
    return this.loadWithContext(mediaId, null);
  }

  /** Load an item within a traversal; the context is owned by the session from here on */
  loadWithContext(mediaId: MediaItemId, context: PlaylistContext | null): Promise<void> {
    this.retry.reset();
    this.lastLoad = { mediaId, context };
    this._context = context;
    return this.runLoad(mediaId);
  }

  /** "Retry" affordance after a terminal load error */
  retryLoad(): Promise<void> {
    if (!this.lastLoad) {
      log.debug('Nothing to retry');
      return Promise.resolve();
    }
    const { mediaId, context } = this.lastLoad;
    return this.loadWithContext(mediaId, context);
  }

  private async runLoad(mediaId: MediaItemId): Promise<void> {
    if (this.disposed) return;
    const generation = ++this.generation;

    this.loadInFlight = true;
    this.retry.cancel();
    this.autoPlay.cancel();
    this._position = 0;
    this._duration = 0;
    this.scrubbing = false;
    this.skipMarkers.clearMarkers();
    this._currentMediaId = mediaId;
    this._errorMessage = null;
    this.lastTickState = 'loading';
    this.progressTracker.resetSaveTimer();

    this.setState('loading');
    this.emit('loading', { mediaId });
    log.info(`Loading ${mediaId}`);

    this.markerResolver
      .resolve(mediaId)
      .then((markers) => {
        if (generation !== this.generation) return;
        this.skipMarkers.loadMarkers(markers.intro, markers.credits);
      })
      .catch((err) => log.warn(`Marker resolution failed: ${describeError(err)}`));

    try {
      const url = await this.collaborators.streams.resolveStream(mediaId);
      if (generation !== this.generation) return;
      await this.backend.load(url);
    } catch (err) {
      if (generation !== this.generation) return;
      this.handleLoadFailure(mediaId, err);
      return;
    }
    if (generation !== this.generation) return;

    await this.finishLoad(mediaId, generation);
  }

  private async finishLoad(mediaId: MediaItemId, generation: number): Promise<void> {
    const resumedAtMs = await this.applyResume(mediaId, generation);
    if (generation !== this.generation) return;

    const dimensions = await this.backend.getDimensions().catch((err: unknown) => {
      log.warn(`Dimension query failed: ${describeError(err)}`);
      return null;
    });
    if (generation !== this.generation) return;
    const windowSize = dimensions ? computeWindowSize(dimensions.width, dimensions.height) : null;
    if (windowSize) {
      this.emit('windowResizeRequested', windowSize);
    }

    try {
      await this.backend.play();
    } catch (err) {
      log.warn(`Play after load failed: ${describeError(err)}`);
    }
    if (generation !== this.generation) return;

    const duration = await this.backend.getDuration().catch((err: unknown) => {
      log.debug(`Duration query failed: ${describeError(err)}`);
      return null;
    });
    if (generation !== this.generation) return;
    if (duration !== null && duration > 0) {
      this._duration = duration;
    }

    await this.refreshState();
    if (generation !== this.generation) return;

    this.loadInFlight = false;
    log.info(`Loaded ${mediaId}`);
    this.emit('mediaLoaded', { mediaId, durationMs: this._duration, resumedAtMs });
  }

  /** Seek to the saved position once when the resume policy says so */
  private async applyResume(mediaId: MediaItemId, generation: number): Promise<number | null> {
    let saved: PlaybackProgress | null;
    try {
      saved = await this.collaborators.progress.loadProgress(mediaId, this.config.userId);
    } catch (err) {
      log.warn(`Could not read saved progress for ${mediaId}: ${describeError(err)}`);
      return null;
    }
    if (generation !== this.generation || !this.progressTracker.shouldResume(saved)) return null;

    log.info(`Resuming ${mediaId} at ${saved.positionMs}ms`);
    try {
      await this.backend.seek(saved.positionMs);
    } catch (err) {
      log.warn(`Resume seek failed: ${describeError(err)}`);
      return null;
    }
    this._position = saved.positionMs;
    return saved.positionMs;
  }

  private handleLoadFailure(mediaId: MediaItemId, err: unknown): void {
    const error = toAppError(err);
    log.warn(`Load of ${mediaId} failed: ${error.message}`);

    const outcome = this.retry.onFailure(() => {
      this.runLoad(mediaId).catch((retryErr) => log.error('Retry failed:', retryErr));
    });
    if (outcome.kind === 'scheduled') return;

    this.loadInFlight = false;
    this.fail(outcome.message, error);
  }

  /** Enter the error state; only retryLoad() or a fresh load leaves it */
  private fail(message: string, error: AppError): void {
    this._errorMessage = message;
    this.setState('error');
    this.emit('error', { message, error });
  }

  // ---------------------------------------------------------------------------
  // Periodic update
  // ---------------------------------------------------------------------------

  /** Run `tick()` every second on the session scheduler */
  startTicking(): void {
    if (this.tickHandle || this.disposed) return;
    this.scheduleTick();
  }

  stopTicking(): void {
    this.tickHandle = cancelHandle(this.tickHandle);
  }

  private scheduleTick(): void {
    this.tickHandle = this.scheduler.scheduleOnce(TICK_INTERVAL_MS, () => {
      this.scheduleTick();
      this.tick().catch((err) => log.error('Tick failed:', err));
    });
  }

  /**
   * Query the backend and drive the sub-machines from the new position.
   * Skipped while a load sequence runs, after the session failed, and
   * while a previous tick is still waiting on the backend. A backend that
   * reports `loading` (buffering) keeps being ticked.
   *
   * Position and duration queries that fail count as unknown; a failed
   * state query puts the session in `error`.
   */
  async tick(): Promise<void> {
    if (this.disposed || this.tickInFlight || !this._currentMediaId) return;
    if (this.loadInFlight || this._errorMessage !== null) return;

    const generation = this.generation;
    this.tickInFlight = true;
    let position: number | null;
    let duration: number | null;
    let state: PlayerState;
    try {
      [position, duration, state] = await Promise.all([
        this.backend.getPosition().catch((err: unknown) => {
          log.debug(`Position query failed: ${describeError(err)}`);
          return null;
        }),
        this.backend.getDuration().catch((err: unknown) => {
          log.debug(`Duration query failed: ${describeError(err)}`);
          return null;
        }),
        this.backend.getState(),
      ]);
    } catch (err) {
      if (generation !== this.generation) return;
      const error = toAppError(err);
      log.error(`Backend state query failed: ${error.message}`);
      this.fail(`Playback failed: ${error.message}`, error);
      return;
    } finally {
      this.tickInFlight = false;
    }
    if (generation !== this.generation) return;

    if (duration !== null && duration > 0) this._duration = duration;
    if (position !== null && !this.scrubbing) this._position = position;
    this.setState(state);

    const currentPosition = this._position;
    const decision = this.skipMarkers.update(currentPosition);
    if (decision.seekTo !== null) {
      await this.seek(decision.seekTo);
      if (generation !== this.generation) return;
    }

    this.autoPlay.update(this._position, this._duration, this._context);

    if (state !== this.lastTickState && FORCED_PERSIST_STATES.has(state)) {
      this.lastTickState = state;
      this.persistSnapshot(state);
      return;
    }
    this.lastTickState = state;

    const { persist, watched } = this.progressTracker.evaluate(this._position, this._duration);
    if (persist) {
      this.persist(this._position, this._duration, watched, state);
    }
  }

  // ---------------------------------------------------------------------------
  // Persistence
  // ---------------------------------------------------------------------------

  private persistSnapshot(state: PlayerState): void {
    const snapshot = this.progressTracker.snapshot(this._position, this._duration);
    if (!snapshot) return;
    this.persist(snapshot.positionMs, snapshot.durationMs, snapshot.watched, state);
  }

  /** Fire-and-forget write to the local store plus the remote queue, if any */
  private persist(positionMs: number, durationMs: number, watched: boolean, state: PlayerState): void {
    const mediaId = this._currentMediaId;
    if (!mediaId || durationMs <= 0) return;

    this.collaborators.progress
      .saveProgress(mediaId, positionMs, durationMs, watched)
      .catch((err) => log.warn(`Failed to save progress for ${mediaId}: ${describeError(err)}`));

    const queue = this._context?.getRemoteQueue();
    const remoteSync = this.collaborators.remoteSync;
    const remoteState = remoteStateFor(state, watched);
    if (!queue || !remoteSync || !remoteState) return;

    remoteSync
      .syncProgress(queue, mediaId, positionMs, durationMs, remoteState)
      .catch((err) => log.warn(`Remote progress sync failed: ${describeError(err)}`));
  }

  // ---------------------------------------------------------------------------
  // Transport
  // ---------------------------------------------------------------------------

  play(): Promise<void> {
    return this.command('play', () => this.backend.play());
  }

  pause(): Promise<void> {
    return this.command('pause', () => this.backend.pause());
  }

  togglePlayPause(): Promise<void> {
    return this._state === 'playing' ? this.pause() : this.play();
  }

  /** Persists final progress, then stops the backend */
  stop(): Promise<void> {
    this.persistSnapshot('stopped');
    return this.command('stop', () => this.backend.stop());
  }

  seek(positionMs: number): Promise<void> {
    const target = this.clampPosition(positionMs);
    this._position = target;
    return this.command('seek', () => this.backend.seek(target));
  }

  seekRelative(deltaMs: number): Promise<void> {
    return this.seek(this._position + deltaMs);
  }

  rewind(): Promise<void> {
    return this.seekRelative(-REWIND_STEP_MS);
  }

  forward(): Promise<void> {
    return this.seekRelative(FORWARD_STEP_MS);
  }

  setVolume(volume: number): Promise<void> {
    const clamped = Math.round(Math.min(1, Math.max(0, volume)) * 100) / 100;
    this._volume = clamped;
    this._muted = false;
    return this.command('setVolume', () => this.backend.setVolume(clamped));
  }

  volumeUp(): Promise<void> {
    return this.setVolume(this._volume + VOLUME_STEP);
  }

  volumeDown(): Promise<void> {
    return this.setVolume(this._volume - VOLUME_STEP);
  }

  /** Silence output without forgetting the volume level */
  toggleMute(): Promise<void> {
    if (this._muted) {
      return this.setVolume(this._volume);
    }
    this._muted = true;
    return this.command('mute', () => this.backend.setVolume(0));
  }

  setSpeed(speed: number): Promise<void> {
    if (!Number.isFinite(speed) || speed <= 0) {
      log.warn(`Ignoring invalid playback speed ${speed}`);
      return Promise.resolve();
    }
    this._speed = speed;
    return this.command('setSpeed', () => this.backend.setSpeed(speed));
  }

  /** Ten percent faster, up to MAX_PLAYBACK_SPEED */
  speedUp(): Promise<void> {
    return this.stepSpeed(SPEED_UP_FACTOR);
  }

  /** Ten percent slower, down to MIN_PLAYBACK_SPEED */
  speedDown(): Promise<void> {
    return this.stepSpeed(SPEED_DOWN_FACTOR);
  }

  private stepSpeed(factor: number): Promise<void> {
    const scaled = Math.round(this._speed * factor * 100) / 100;
    const next = Math.min(MAX_PLAYBACK_SPEED, Math.max(MIN_PLAYBACK_SPEED, scaled));
    return next === this._speed ? Promise.resolve() : this.setSpeed(next);
  }

  resetSpeed(): Promise<void> {
    return this.setSpeed(DEFAULT_PLAYBACK_SPEED);
  }

  frameStep(direction: FrameStepDirection): Promise<void> {
    return this.command('frameStep', () => this.backend.frameStep(direction));
  }

  // ---------------------------------------------------------------------------
  // Tracks
  // ---------------------------------------------------------------------------

  setTrack(kind: TrackKind, id: number | null): Promise<void> {
    return this.command('selectTrack', () => this.backend.selectTrack(kind, id));
  }

  async getTracks(kind: TrackKind): Promise<MediaTrack[]> {
    try {
      return await this.backend.getTracks(kind);
    } catch (err) {
      log.warn(`Could not list ${kind} tracks: ${describeError(err)}`);
      return [];
    }
  }

  /**
   * Select the track after the current one, wrapping around.
   * Subtitles include an "off" step before the first track.
   * Resolves to the selected id.
   */
  async cycleTrack(kind: TrackKind): Promise<number | null> {
    const tracks = await this.getTracks(kind);
    const ids: (number | null)[] = tracks.map((track) => track.id);
    if (kind === 'subtitle') ids.unshift(null);
    if (ids.length === 0) return null;

    let current: number | null = null;
    try {
      current = await this.backend.getCurrentTrack(kind);
    } catch (err) {
      log.warn(`Could not read current ${kind} track: ${describeError(err)}`);
    }

    const next = ids[(ids.indexOf(current) + 1) % ids.length] ?? null;
    await this.setTrack(kind, next);
    return next;
  }

  // ---------------------------------------------------------------------------
  // Scrubbing
  // ---------------------------------------------------------------------------

  beginScrub(): void {
    this.scrubbing = true;
  }

  /** Finish a scrub, seeking to the released position when one is given */
  endScrub(positionMs?: number): Promise<void> {
    this.scrubbing = false;
    return positionMs === undefined ? Promise.resolve() : this.seek(positionMs);
  }

  // ---------------------------------------------------------------------------
  // Navigation
  // ---------------------------------------------------------------------------

  previous(): Promise<void> {
    const target = this._context?.getPrevious() ?? null;
    if (target === null) {
      log.debug('No previous item');
      return Promise.resolve();
    }
    return this.navigateTo(target);
  }

  next(): Promise<void> {
    const target = this._context?.getNext() ?? null;
    if (target === null) {
      log.debug('No next item');
      return Promise.resolve();
    }
    return this.navigateTo(target);
  }

  private navigateTo(mediaId: MediaItemId): Promise<void> {
    const context = this._context?.clone() ?? null;
    if (context && !context.updateCurrentIndex(mediaId)) {
      log.warn(`${mediaId} is not part of the current playlist`);
      return Promise.resolve();
    }
    this.persistSnapshot('stopped');
    return this.loadWithContext(mediaId, context);
  }

  /**
   * Best-effort final write, then cancel every pending timer and drop
   * in-flight results. The session can be reused with a new load.
   */
  stopForNavigation(): void {
    this.persistSnapshot('stopped');
    this.generation++;
    this.loadInFlight = false;
    this.retry.cancel();
    this.autoPlay.cancel();
    this.stopTicking();
  }

  navigateBack(): void {
    this.stopForNavigation();
    this.emit('navigateBack', undefined);
  }

  // ---------------------------------------------------------------------------
  // Skip markers
  // ---------------------------------------------------------------------------

  skipIntro(): Promise<void> {
    return this.skipTo('intro');
  }

  skipCredits(): Promise<void> {
    return this.skipTo('credits');
  }

  private skipTo(kind: MarkerKind): Promise<void> {
    const target = this.skipMarkers.skip(kind);
    if (target === null) {
      log.debug(`No ${kind} marker to skip`);
      return Promise.resolve();
    }
    return this.seek(target);
  }

  // ---------------------------------------------------------------------------
  // Controls
  // ---------------------------------------------------------------------------

  pointerEnter(): void {
    this.controls.pointerEnter();
  }

  pointerLeave(): void {
    this.controls.pointerLeave();
  }

  pointerMove(x: number, y: number, overControls: boolean): void {
    this.controls.pointerMove(x, y, overControls);
  }

  toggleControls(): void {
    this.controls.toggle();
  }

  /** Keeps controls on screen while a track menu or popover is open */
  setOverlayOpen(open: boolean): void {
    this.controls.setOverlayOpen(open);
  }

  // ---------------------------------------------------------------------------
  // Configuration & lifecycle
  // ---------------------------------------------------------------------------

  /**
   * Apply a newer configuration snapshot. Returns false when the snapshot
   * is not newer than the current one. Throws `ValidationError` when invalid.
   */
  onConfigChanged(snapshot: SessionConfig): boolean {
    const next = parseSessionConfig(snapshot);
    if (next.version <= this.config.version) {
      log.debug(`Ignoring config version ${next.version} (current ${this.config.version})`);
      return false;
    }

    this.config = next;
    this.progressTracker.updateConfig(next);
    this.retry.updateConfig(next);
    this.skipMarkers.updateConfig(next);
    this.autoPlay.updateConfig(next);
    this.controls.updateConfig(next);
    log.info(`Applied config version ${next.version}`);
    return true;
  }

  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;
    this.generation++;
    this.retry.reset();
    this.autoPlay.cancel();
    this.stopTicking();
    this.controls.dispose();
    this.skipMarkers.dispose();
    this.removeAllListeners();
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  /** Run a backend command, log a failure, then re-query the real state */
  private async command(name: string, action: () => Promise<void>): Promise<void> {
    if (this.disposed) return;
    try {
      await action();
    } catch (err) {
      log.warn(`${name} failed: ${describeError(err)}`);
    }
    await this.refreshState();
  }

  private async refreshState(): Promise<void> {
    const generation = this.generation;
    let state: PlayerState;
    try {
      state = await this.backend.getState();
    } catch (err) {
      log.warn(`State query failed: ${describeError(err)}`);
      return;
    }
    if (generation !== this.generation || this.disposed) return;
    this.setState(state);
  }

  private clampPosition(positionMs: number): number {
    const lower = Math.max(0, positionMs);
    return this._duration > 0 ? Math.min(lower, this._duration) : lower;
  }

  private setState(next: PlayerState): void {
    if (next === this._state) return;
    const previous = this._state;
    this._state = next;
    log.debug(`State ${previous} -> ${next}`);
    this.emit('stateChanged', { state: next, previous });
  }
}
