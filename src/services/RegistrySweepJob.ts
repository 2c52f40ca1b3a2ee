/**
 * Registry Sweep Job
 *
 * Removes expired registrations on a fixed interval, independent of
 * lookups, so users who never come back do not accumulate in memory.
 *
 * @module services/RegistrySweepJob
 */

import type { RegistrationRegistry } from './RegistrationRegistry.js';
import type { SecureLogger } from './SecureLogger.js';

// =============================================================================
// Job Constants
// =============================================================================

/** Default sweep interval (30 seconds) */
export const DEFAULT_SWEEP_INTERVAL_MS = 30 * 1000;

/** Job name for logging */
export const JOB_NAME = 'registry-sweep';

// =============================================================================
// Implementation
// =============================================================================

export class RegistrySweepJob {
  private readonly intervalMs: number;
  private intervalHandle: NodeJS.Timeout | null = null;

  constructor(
    private readonly registry: RegistrationRegistry,
    private readonly logger: SecureLogger,
    intervalMs: number = DEFAULT_SWEEP_INTERVAL_MS
  ) {
    this.intervalMs = intervalMs;
  }

  /**
   * Start the scheduled sweep
   */
  start(): void {
    if (this.intervalHandle) {
      this.logger.record('job.already_started', { job: JOB_NAME }, 'warn');
      return;
    }

    this.logger.record('job.started', { job: JOB_NAME, intervalMs: this.intervalMs });

    this.intervalHandle = setInterval(() => {
      this.run();
    }, this.intervalMs);
    // The bot's polling loop keeps the process alive, not this timer
    this.intervalHandle.unref();
  }

  /**
   * Stop the scheduled sweep
   */
  stop(): void {
    if (this.intervalHandle) {
      clearInterval(this.intervalHandle);
      this.intervalHandle = null;
      this.logger.record('job.stopped', { job: JOB_NAME });
    }
  }

  /**
   * Run a single sweep
   *
   * @returns Entries removed
   */
  run(): number {
    const removed = this.registry.sweep();
    this.logger.record('job.completed', { job: JOB_NAME, removed }, 'debug');
    return removed;
  }

  isStarted(): boolean {
    return this.intervalHandle !== null;
  }
}
