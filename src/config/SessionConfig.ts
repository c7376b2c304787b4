/**
 * Versioned configuration snapshot injected into a playback session.
 *
 * The session never reads global settings; the host passes a snapshot at
 * construction and a newer one through `onConfigChanged()`.
 */

import { z } from 'zod';
import { ValidationError } from '../core/errors';
import { DEFAULT_COMPLETION_RATIO, DEFAULT_WATCHED_RATIO } from './PlaybackConfig';
import {
  AUTO_PLAY_NEXT_DELAY_MS,
  CONTROLS_INACTIVITY_TIMEOUT_MS,
  DEFAULT_MAX_RETRY_ATTEMPTS,
  END_OF_PLAYLIST_DELAY_MS,
  POINTER_MOVE_THRESHOLD_PX,
  RETRY_BASE_DELAY_MS,
  SKIP_PROMPT_TIMEOUT_MS,
} from './TimingConfig';

const ratio = z.number().gt(0).lte(1);
const durationMs = z.number().int().nonnegative();

export const sessionConfigSchema = z.object({
  /** Monotonic snapshot version; stale snapshots are ignored */
  version: z.number().int().nonnegative(),
  /** User whose saved progress is read at load */
  userId: z.string().min(1),

  autoResume: z.boolean(),
  /** Saved positions at or below this are not resumed */
  resumeThresholdMs: durationMs,
  /** Minimum time between periodic progress writes */
  progressUpdateIntervalMs: durationMs.min(1000),
  watchedRatio: ratio,
  completionRatio: ratio,

  maxRetryAttempts: z.number().int().min(0).max(10),
  retryBaseDelayMs: durationMs.min(1),

  skipIntroEnabled: z.boolean(),
  skipCreditsEnabled: z.boolean(),
  autoSkipIntro: z.boolean(),
  autoSkipCredits: z.boolean(),
  /** Markers shorter than this never auto-skip */
  minimumMarkerDurationMs: durationMs,
  /** A shown skip prompt hides after this long; 0 keeps it until the window ends */
  skipPromptTimeoutMs: durationMs,

  autoPlayNextDelayMs: durationMs,
  endOfPlaylistDelayMs: durationMs,

  controlsInactivityTimeoutMs: durationMs.min(1),
  pointerMoveThresholdPx: z.number().nonnegative(),
});

export type SessionConfig = z.infer<typeof sessionConfigSchema>;

/** Default configuration */
export const DEFAULT_SESSION_CONFIG: Readonly<SessionConfig> = Object.freeze({
  version: 0,
  userId: 'default',
  autoResume: true,
  resumeThresholdMs: 10_000,
  progressUpdateIntervalMs: 10_000,
  watchedRatio: DEFAULT_WATCHED_RATIO,
  completionRatio: DEFAULT_COMPLETION_RATIO,
  maxRetryAttempts: DEFAULT_MAX_RETRY_ATTEMPTS,
  retryBaseDelayMs: RETRY_BASE_DELAY_MS,
  skipIntroEnabled: true,
  skipCreditsEnabled: true,
  autoSkipIntro: false,
  autoSkipCredits: false,
  minimumMarkerDurationMs: 5000,
  skipPromptTimeoutMs: SKIP_PROMPT_TIMEOUT_MS,
  autoPlayNextDelayMs: AUTO_PLAY_NEXT_DELAY_MS,
  endOfPlaylistDelayMs: END_OF_PLAYLIST_DELAY_MS,
  controlsInactivityTimeoutMs: CONTROLS_INACTIVITY_TIMEOUT_MS,
  pointerMoveThresholdPx: POINTER_MOVE_THRESHOLD_PX,
});

/**
 * Validate a complete snapshot.
 * Throws `ValidationError` listing every failing field as `path: message`.
 */
export function parseSessionConfig(input: unknown): SessionConfig {
  const result = sessionConfigSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ValidationError(`Invalid session config: ${issues.join('; ')}`, issues);
  }
  return result.data;
}

/**
 * Build a validated snapshot from defaults plus overrides.
 */
export function resolveSessionConfig(
  overrides: Partial<SessionConfig> = {},
  base: Readonly<SessionConfig> = DEFAULT_SESSION_CONFIG
): SessionConfig {
  return parseSessionConfig({ ...base, ...overrides });
}
