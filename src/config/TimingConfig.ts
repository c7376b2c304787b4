/**
 * Centralized timing-related constants.
 *
 * Grace delays, backoff and inactivity timeouts used across the session.
 * Import from here (or via `src/config`) rather than scattering magic
 * numbers throughout source files.
 */

/** Interval (ms) at which the host is expected to call tick() */
export const TICK_INTERVAL_MS = 1000;

/** Delay (ms) before auto-play loads the next item */
export const AUTO_PLAY_NEXT_DELAY_MS = 3000;

/** Delay (ms) before leaving the player after the last item ends */
export const END_OF_PLAYLIST_DELAY_MS = 5000;

/** Base delay (ms) of the retry backoff; attempt n waits base * 2^(n-1) */
export const RETRY_BASE_DELAY_MS = 1000;

/** Default number of load retries before a terminal error */
export const DEFAULT_MAX_RETRY_ATTEMPTS = 3;

/** Inactivity (ms) after which on-screen controls hide */
export const CONTROLS_INACTIVITY_TIMEOUT_MS = 3000;

/** Minimum pointer travel (px) that counts as activity while controls are hidden */
export const POINTER_MOVE_THRESHOLD_PX = 5;

/** Time (ms) a skip intro/credits prompt stays up before hiding itself; 0 keeps it up */
export const SKIP_PROMPT_TIMEOUT_MS = 5000;
