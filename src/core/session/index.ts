/**
 * Session Module - playback session controller and its sub-machines
 */

export { PlaybackSession, computeWindowSize } from './PlaybackSession';
export type { PlaybackSessionEvents, PlaybackSessionOptions } from './PlaybackSession';

export { ProgressTracker, remoteStateFor } from './ProgressTracker';
export type { ProgressPolicyConfig, PersistDecision } from './ProgressTracker';

export { RetrySupervisor, RETRY_EXHAUSTED_MESSAGE } from './RetrySupervisor';
export type { RetryPolicyConfig, RetryOutcome } from './RetrySupervisor';

export { SkipMarkerManager, isVisibleAt } from './SkipMarkerManager';
export type { SkipPolicyConfig, SkipDecision, SkipVisibilityChange, SkipMarkerEvents } from './SkipMarkerManager';

export { MarkerResolver } from './MarkerResolver';

export { AutoPlayScheduler } from './AutoPlayScheduler';
export type { AutoPlayConfig, AutoPlayCallbacks, AutoPlayAction } from './AutoPlayScheduler';

export { ControlVisibilityMachine } from './ControlVisibilityMachine';
export type { ControlState, ControlVisibilityConfig, ControlVisibilityEvents } from './ControlVisibilityMachine';

export type {
  StreamResolver,
  ProgressStore,
  MarkerSource,
  MarkerRepository,
  RemoteProgressSync,
  SessionCollaborators,
} from './collaborators';
