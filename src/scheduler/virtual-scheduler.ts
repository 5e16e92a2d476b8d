/**
 * Virtual Scheduler
 *
 * A manually driven clock. Nothing runs until the owner advances time, which
 * makes latch behaviour reproducible in simulations and tests.
 */

import {
  assertValidDelay,
  type ScheduledCommand,
  type Scheduler,
} from "./types.js";

interface VirtualEntry {
  id: number;
  dueAt: number;
  callback: () => void;
}

/**
 * VirtualScheduler class
 *
 * Due callbacks run in due-time order, ties in the order they were scheduled.
 * The clock is moved to each callback's due time before it runs, so code that
 * reads `now()` inside a callback sees the exact firing time.
 *
 * @example
 * ```ts
 * const scheduler = new VirtualScheduler();
 * scheduler.schedule(300, () => console.log(scheduler.now())); // logs 300
 *
 * scheduler.advanceBy(299); // nothing yet
 * scheduler.advanceBy(1);   // fires
 * ```
 */
export class VirtualScheduler implements Scheduler {
  private entries: Map<number, VirtualEntry> = new Map();
  private nextId = 1;
  private clock: number;

  /**
   * @param startTime - Initial clock value (default: 0)
   */
  constructor(startTime: number = 0) {
    this.clock = startTime;
  }

  now(): number {
    return this.clock;
  }

  schedule(delayMs: number, callback: () => void): ScheduledCommand {
    assertValidDelay(delayMs);

    const id = this.nextId++;
    const dueAt = this.clock + delayMs;
    const entries = this.entries;

    this.entries.set(id, { id, dueAt, callback });

    return {
      id,
      dueAt,
      get pending() {
        return entries.has(id);
      },
      cancel: () => {
        entries.delete(id);
      },
    };
  }

  cancelAll(): void {
    this.entries.clear();
  }

  get pendingCount(): number {
    return this.entries.size;
  }

  /**
   * Due time of the next pending callback, or null when nothing is pending
   */
  nextDueAt(): number | null {
    return this.peek()?.dueAt ?? null;
  }

  /**
   * Move the clock forward, running every callback that falls due
   *
   * @param ms - Milliseconds to advance
   * @returns Number of callbacks that ran
   * @throws {RangeError} If ms is negative
   */
  advanceBy(ms: number): number {
    if (!Number.isFinite(ms) || ms < 0) {
      throw new RangeError(`Cannot advance a virtual clock by ${ms}ms`);
    }
    return this.advanceTo(this.clock + ms);
  }

  /**
   * Move the clock to an absolute time, running every callback due by then
   *
   * @param time - Target clock time
   * @returns Number of callbacks that ran
   * @throws {RangeError} If time is earlier than the current clock
   */
  advanceTo(time: number): number {
    if (time < this.clock) {
      throw new RangeError(
        `Cannot move a virtual clock back from ${this.clock} to ${time}`,
      );
    }

    let ran = 0;
    let next = this.peek();
    while (next && next.dueAt <= time) {
      this.runEntry(next);
      ran++;
      next = this.peek();
    }

    this.clock = time;
    return ran;
  }

  /**
   * Run pending callbacks until none remain
   *
   * @param limit - Maximum number of callbacks to run (default: 10000)
   * @returns Number of callbacks that ran
   * @throws {Error} If callbacks keep rescheduling past the limit
   */
  runAll(limit: number = 10_000): number {
    let ran = 0;
    let next = this.peek();
    while (next) {
      if (ran >= limit) {
        throw new Error(
          `Virtual scheduler still has ${this.entries.size} pending callback(s) after running ${limit}`,
        );
      }
      this.runEntry(next);
      ran++;
      next = this.peek();
    }
    return ran;
  }

  private runEntry(entry: VirtualEntry): void {
    this.entries.delete(entry.id);
    this.clock = Math.max(this.clock, entry.dueAt);
    entry.callback();
  }

  private peek(): VirtualEntry | undefined {
    let earliest: VirtualEntry | undefined;
    for (const entry of this.entries.values()) {
      if (
        !earliest ||
        entry.dueAt < earliest.dueAt ||
        (entry.dueAt === earliest.dueAt && entry.id < earliest.id)
      ) {
        earliest = entry;
      }
    }
    return earliest;
  }
}
