/**
 * Scheduler contracts shared by the timer-backed and virtual schedulers
 */

/**
 * Handle to a single scheduled callback
 */
export interface ScheduledCommand {
  /** Scheduler-local id, increasing in scheduling order */
  readonly id: number;
  /** Clock time at which the callback becomes due */
  readonly dueAt: number;
  /** True until the callback has fired or been cancelled */
  readonly pending: boolean;
  /** Cancel the callback. Safe to call after it fired or was cancelled. */
  cancel(): void;
}

/**
 * Runs callbacks after a delay on the event loop
 *
 * All calls, and all callbacks, happen on one execution context. A cancelled
 * callback never fires.
 */
export interface Scheduler {
  /** Current clock time in milliseconds */
  now(): number;
  /**
   * Schedule a callback
   *
   * @param delayMs - Minimum delay before the callback runs
   * @param callback - Function to run once
   * @throws {RangeError} If delayMs is negative, not finite or above MAX_DELAY_MS
   */
  schedule(delayMs: number, callback: () => void): ScheduledCommand;
  /** Cancel every callback that has not fired yet */
  cancelAll(): void;
  /** Number of callbacks that have not fired or been cancelled */
  readonly pendingCount: number;
}

/**
 * Longest delay setTimeout honours; Node fires anything longer after 1ms
 */
export const MAX_DELAY_MS = 2_147_483_647;

/**
 * Reject delays the scheduler cannot honour
 */
export function assertValidDelay(delayMs: number): void {
  if (!Number.isFinite(delayMs) || delayMs < 0) {
    throw new RangeError(
      `Delay must be a non-negative finite number of milliseconds, got ${delayMs}`,
    );
  }
  if (delayMs > MAX_DELAY_MS) {
    throw new RangeError(
      `Delay must be at most ${MAX_DELAY_MS}ms, got ${delayMs}`,
    );
  }
}
