/**
 * Centralized playback-related constants.
 *
 * Completion ratios, speed steps, seek steps and window sizing used by
 * the session controller and its sub-machines.
 */

/**
 * Fraction of the duration past which an item counts as watched
 * and progress is persisted on every tick.
 */
export const DEFAULT_WATCHED_RATIO = 0.9;

/**
 * Fraction of the duration past which an item is considered complete:
 * resume is skipped and auto-play fires.
 */
export const DEFAULT_COMPLETION_RATIO = 0.95;

/** Factor applied by speedUp() */
export const SPEED_UP_FACTOR = 1.1;

/** Factor applied by speedDown() */
export const SPEED_DOWN_FACTOR = 0.9;

/** Slowest speed reachable with speedDown() */
export const MIN_PLAYBACK_SPEED = 0.25;

/** Fastest speed reachable with speedUp() */
export const MAX_PLAYBACK_SPEED = 4;

/** Normal playback speed */
export const DEFAULT_PLAYBACK_SPEED = 1;

/** Step applied by rewind() */
export const REWIND_STEP_MS = 10_000;

/** Step applied by forward() */
export const FORWARD_STEP_MS = 10_000;

/** Step applied by volumeUp()/volumeDown() */
export const VOLUME_STEP = 0.1;

/** Widest window requested when sizing to the video */
export const MAX_WINDOW_WIDTH = 1920;

/** Extra height reserved below the video for the control bar */
export const CONTROLS_HEIGHT_PADDING = 100;
