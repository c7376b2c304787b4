export type { CancellableHandle, Scheduler } from './Scheduler';
export { TimerScheduler, cancelHandle } from './Scheduler';
export { ManualScheduler } from './ManualScheduler';
