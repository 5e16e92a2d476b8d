/**
 * Refresh Latch
 *
 * Debounces a busy/refreshing signal for a loading indicator.
 *
 * If a refresh takes less time than `delayTime`, the indicator is never shown.
 * If it takes longer, the indicator is shown for at least `minShowTime`
 * counted from the moment it was shown, or for as long as the refresh keeps
 * running, whichever is longer.
 */

import {
  InvalidConfigurationError,
  UseAfterDisposeError,
  type ConfigurationIssue,
} from "../errors.js";
import {
  MAX_DELAY_MS,
  type ScheduledCommand,
  type Scheduler,
} from "../scheduler/types.js";
import { TimerScheduler } from "../scheduler/timer-scheduler.js";
import {
  describeTransition,
  getDefaultDiagnosticLogger,
  type DiagnosticLogger,
  type DiagnosticMeta,
} from "./diagnostics.js";

/**
 * Receives show (true) and hide (false) emissions
 */
export type RefreshSink = (shown: boolean) => void;

/**
 * Where a latch is in its show/hide cycle
 *
 * - idle: nothing shown, nothing pending
 * - pending-show: busy, show queued behind the delay
 * - shown: show emitted, nothing pending
 * - pending-hide: no longer busy, hide queued behind the minimum show time
 */
export type LatchPhase = "idle" | "pending-show" | "shown" | "pending-hide";

/**
 * Fixed latch configuration
 */
export interface LatchConfig {
  /** Milliseconds the signal must stay busy before show is emitted */
  readonly delayTime: number;
  /** Milliseconds show must stay active before hide is emitted */
  readonly minShowTime: number;
  /** Emission callback */
  readonly sink: RefreshSink;
}

/**
 * Collaborators a latch can be given
 */
export interface RefreshLatchOptions {
  /** Scheduler for delayed emissions (default: a private TimerScheduler) */
  scheduler?: Scheduler;
  /** Logger for diagnostics (default: the "RefreshLatch" context logger) */
  logger?: DiagnosticLogger;
  /** Name included in diagnostics and errors */
  label?: string;
  /** Start with debugging enabled */
  debug?: boolean;
}

/**
 * Mutable latch state
 */
interface LatchState {
  isBusy: boolean;
  /** Clock time show was last emitted, null while hidden */
  timeShown: number | null;
}

/**
 * RefreshLatch class
 *
 * All calls must come from the event loop the latch was created on; the
 * latch does no locking of its own. At most one emission is pending at any
 * time, and every state-changing call cancels it before scheduling anew.
 *
 * The constructor takes milliseconds; `createRefreshLatch` also accepts
 * duration strings and applies the default timings.
 *
 * @example
 * ```ts
 * const latch = new RefreshLatch(
 *   { delayTime: 300, minShowTime: 700, sink: (shown) => spinner.toggle(shown) },
 * );
 *
 * latch.setBusy(true);
 * await refresh();
 * latch.setBusy(false);
 * ```
 */
export class RefreshLatch {
  private readonly config: LatchConfig;
  private readonly scheduler: Scheduler;
  private readonly logger: DiagnosticLogger | undefined;
  private readonly label: string | undefined;

  private state: LatchState = { isBusy: false, timeShown: null };
  private pending: ScheduledCommand | null = null;
  private debug = false;
  private isDisposed = false;

  /**
   * @throws {InvalidConfigurationError} If a timing is negative or not finite,
   * or the sink is not a function
   */
  constructor(config: LatchConfig, options: RefreshLatchOptions = {}) {
    const issues = checkConfig(config);
    if (issues.length > 0) {
      throw new InvalidConfigurationError(
        `Invalid refresh latch configuration: ${issues.map((i) => `${i.path}: ${i.message}`).join("; ")}`,
        issues,
      );
    }

    this.config = { ...config };
    this.scheduler = options.scheduler ?? new TimerScheduler();
    this.logger = options.logger;
    this.label = options.label;

    if (options.debug) {
      this.enableDebugging();
    }
  }

  /**
   * Last value passed to setBusy() or force()
   */
  get isBusy(): boolean {
    return this.state.isBusy;
  }

  get phase(): LatchPhase {
    if (this.hasPendingCommand) {
      return this.state.isBusy ? "pending-show" : "pending-hide";
    }
    return this.state.timeShown === null ? "idle" : "shown";
  }

  get hasPendingCommand(): boolean {
    return this.pending?.pending ?? false;
  }

  get disposed(): boolean {
    return this.isDisposed;
  }

  get delayTime(): number {
    return this.config.delayTime;
  }

  get minShowTime(): number {
    return this.config.minShowTime;
  }

  /**
   * Set whether the underlying operation is busy
   *
   * Busy queues show() after the delay time. Not busy hides: immediately
   * when show has been active for the minimum show time, otherwise once it
   * has. A refresh that ends before show fired emits nothing at all.
   *
   * Setting the same value twice is a no-op.
   *
   * @throws {UseAfterDisposeError} If the latch has been disposed
   */
  setBusy(busy: boolean): void {
    this.assertUsable("setBusy");

    if (this.state.isBusy === busy) {
      this.log({ transition: "no-op-ignored", busy });
      return;
    }

    this.clearCommand();
    this.state.isBusy = busy;

    if (busy) {
      this.queueShow();
      return;
    }

    const { timeShown } = this.state;
    if (timeShown !== null) {
      this.queueHide(timeShown);
    }
    // Show never fired: the pending show was cancelled above, nothing to hide
  }

  /**
   * Force the latch into a state
   *
   * Clears any queued command and emits show or hide immediately,
   * ignoring the delay and minimum show times.
   *
   * @throws {UseAfterDisposeError} If the latch has been disposed
   */
  force(busy: boolean): void {
    this.assertUsable("force");

    this.clearCommand();
    this.state.isBusy = busy;

    if (busy) {
      this.show();
    } else {
      this.hide();
    }
  }

  /**
   * Enable noisy debugging
   *
   * @returns This latch
   * @throws {UseAfterDisposeError} If the latch has been disposed
   */
  enableDebugging(): this {
    this.assertUsable("enableDebugging");
    this.debug = true;
    this.log({ transition: "debugging-enabled" });
    return this;
  }

  /**
   * Cancel any queued command and retire the latch
   *
   * @throws {UseAfterDisposeError} If the latch was already disposed
   */
  dispose(): void {
    this.assertUsable("dispose");
    this.clearCommand();
    this.isDisposed = true;
    this.log({ transition: "disposed" });
  }

  private queueShow(): void {
    const delay = this.config.delayTime;
    this.log({ transition: "show-scheduled", delayMs: delay });
    this.queueCommand(delay, () => this.show());
  }

  private queueHide(timeShown: number): void {
    const elapsed = this.scheduler.now() - timeShown;
    if (elapsed < this.config.minShowTime) {
      const delay = this.config.minShowTime - elapsed;
      this.log({ transition: "hide-scheduled", delayMs: delay, elapsedMs: elapsed });
      this.queueCommand(delay, () => this.hide());
    } else {
      this.hide();
    }
  }

  private queueCommand(delay: number, command: () => void): void {
    const scheduled = this.scheduler.schedule(delay, () => {
      if (this.pending === scheduled) {
        this.pending = null;
      }
      command();
    });
    this.pending = scheduled;
  }

  private clearCommand(): void {
    if (!this.pending) return;
    this.log({ transition: "commands-cleared" });
    this.pending.cancel();
    this.pending = null;
  }

  private show(): void {
    this.state.timeShown = this.scheduler.now();
    this.log({ transition: "show-fired" });
    this.config.sink(true);
  }

  private hide(): void {
    this.state.timeShown = null;
    this.log({ transition: "hide-fired" });
    this.config.sink(false);
  }

  private assertUsable(operation: string): void {
    if (this.isDisposed) {
      throw new UseAfterDisposeError(operation, this.label);
    }
  }

  private log(meta: DiagnosticMeta): void {
    if (!this.debug) return;
    const logger = this.logger ?? getDefaultDiagnosticLogger();
    const entry = this.label ? { ...meta, label: this.label } : meta;
    logger.debug(describeTransition(entry), entry);
  }
}

function checkConfig(config: LatchConfig): ConfigurationIssue[] {
  const issues: ConfigurationIssue[] = [];
  for (const key of ["delayTime", "minShowTime"] as const) {
    const value = config[key];
    if (!Number.isFinite(value) || value < 0) {
      issues.push({
        path: key,
        message: `must be a non-negative number of milliseconds, got ${value}`,
      });
    } else if (value > MAX_DELAY_MS) {
      issues.push({
        path: key,
        message: `must be at most ${MAX_DELAY_MS}ms, got ${value}`,
      });
    }
  }
  if (typeof config.sink !== "function") {
    issues.push({ path: "sink", message: "must be a function" });
  }
  return issues;
}
