/**
 * Shared lifecycle contract for the session's sub-machines.
 *
 * Every manager that owns timers or subscriptions releases them
 * deterministically when the session is torn down.
 */
export interface Disposable {
  /** Release all resources held by this object. Safe to call more than once. */
  dispose(): void;
}
