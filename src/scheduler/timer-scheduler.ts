/**
 * Timer Scheduler
 *
 * Schedules callbacks with setTimeout on the Node.js event loop and keeps
 * track of every outstanding timer so they can be cancelled together.
 */

import {
  assertValidDelay,
  type ScheduledCommand,
  type Scheduler,
} from "./types.js";

/**
 * TimerScheduler class
 *
 * @example
 * ```ts
 * const scheduler = new TimerScheduler();
 *
 * const command = scheduler.schedule(300, () => console.log("fired"));
 * command.cancel(); // never logs
 *
 * scheduler.schedule(100, () => showSpinner());
 * scheduler.cancelAll();
 * ```
 */
export class TimerScheduler implements Scheduler {
  private timers: Map<number, NodeJS.Timeout> = new Map();
  private nextId = 1;

  /** Monotonic milliseconds, unaffected by wall-clock changes */
  now(): number {
    return performance.now();
  }

  schedule(delayMs: number, callback: () => void): ScheduledCommand {
    assertValidDelay(delayMs);

    const id = this.nextId++;
    const timers = this.timers;

    const command: ScheduledCommand = {
      id,
      dueAt: this.now() + delayMs,
      get pending() {
        return timers.has(id);
      },
      cancel: () => this.cancel(id),
    };

    const timer = setTimeout(() => {
      // Cancelled after the timer was already queued to run
      if (!this.timers.delete(id)) return;
      callback();
    }, delayMs);

    this.timers.set(id, timer);
    return command;
  }

  /**
   * Cancel a single scheduled callback
   *
   * @param id - Id of the command to cancel
   */
  cancel(id: number): void {
    const timer = this.timers.get(id);
    if (timer) {
      clearTimeout(timer);
      this.timers.delete(id);
    }
  }

  cancelAll(): void {
    for (const timer of this.timers.values()) {
      clearTimeout(timer);
    }
    this.timers.clear();
  }

  get pendingCount(): number {
    return this.timers.size;
  }
}
