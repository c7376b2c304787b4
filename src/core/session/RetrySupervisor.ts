/**
 * RetrySupervisor - bounded exponential-backoff replay of a failed load.
 *
 * Failure N (1-based, up to maxAttempts) schedules the replay after
 * baseDelay * 2^(N-1). The next failure past the limit is terminal and
 * resets the count so a later manual retry starts from scratch.
 */

import { cancelHandle, type CancellableHandle, type Scheduler } from '../scheduler/Scheduler';
import type { SessionConfig } from '../../config/SessionConfig';
import { Logger } from '../../utils/Logger';

const log = new Logger('RetrySupervisor');

export const RETRY_EXHAUSTED_MESSAGE = 'Failed to load media after multiple attempts. Please try again later.';

export type RetryPolicyConfig = Pick<SessionConfig, 'maxRetryAttempts' | 'retryBaseDelayMs'>;

export type RetryOutcome =
  | { kind: 'scheduled'; attempt: number; delayMs: number }
  | { kind: 'exhausted'; message: string };

export class RetrySupervisor {
  private attempt = 0;
  private pending: CancellableHandle | null = null;
  private config: RetryPolicyConfig;

  constructor(
    private readonly scheduler: Scheduler,
    config: RetryPolicyConfig
  ) {
    this.config = { ...config };
  }

  updateConfig(config: RetryPolicyConfig): void {
    this.config = { ...config };
  }

  /** Failures recorded since the last reset */
  get attemptCount(): number {
    return this.attempt;
  }

  get hasPendingRetry(): boolean {
    return this.pending?.active ?? false;
  }

  /**
   * Record a failure. Either schedules `replay` (replacing any pending
   * retry) or reports that the attempts are used up.
   */
  onFailure(replay: () => void): RetryOutcome {
    if (this.attempt >= this.config.maxRetryAttempts) {
      log.warn(`Giving up after ${this.attempt} retries`);
      this.reset();
      return { kind: 'exhausted', message: RETRY_EXHAUSTED_MESSAGE };
    }

    this.attempt += 1;
    const delayMs = this.config.retryBaseDelayMs * 2 ** (this.attempt - 1);
    this.pending = cancelHandle(this.pending);
    log.info(`Scheduling retry #${this.attempt} in ${delayMs}ms`);

    this.pending = this.scheduler.scheduleOnce(delayMs, () => {
      this.pending = null;
      replay();
    });
    return { kind: 'scheduled', attempt: this.attempt, delayMs };
  }

  /** Cancel any pending retry and zero the count. Every fresh load calls this. */
  reset(): void {
    this.pending = cancelHandle(this.pending);
    this.attempt = 0;
  }

  /** Drop the pending retry but keep the count */
  cancel(): void {
    this.pending = cancelHandle(this.pending);
  }
}
