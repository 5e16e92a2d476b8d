/**
 * Refresh latch construction helpers
 *
 * Validated construction from user-facing options, with the default timings
 * of 300ms delay and 700ms minimum show time.
 */

import {
  DEFAULT_DELAY_TIME,
  DEFAULT_MIN_SHOW_TIME,
  latchOptionsSchema,
} from "../config/schema.js";
import type { LatchOptionsInput } from "../config/types.js";
import { InvalidConfigurationError } from "../errors.js";
import type { Scheduler } from "../scheduler/types.js";
import type { DurationInput } from "../utils/duration.js";
import type { DiagnosticLogger } from "./diagnostics.js";
import { RefreshLatch, type RefreshSink } from "./refresh-latch.js";

export { DEFAULT_DELAY_TIME, DEFAULT_MIN_SHOW_TIME };

/**
 * Collaborators passed alongside the timing options
 */
export interface LatchCollaborators {
  scheduler?: Scheduler;
  logger?: DiagnosticLogger;
  label?: string;
}

/**
 * Create a refresh latch from user options
 *
 * Durations may be milliseconds or strings such as "250ms" or "1.5s".
 * Debugging defaults to on when REFRESH_LATCH_DEBUG=true.
 *
 * @param options - Timing options, label and debug flag
 * @param sink - Receives true on show and false on hide
 * @param collaborators - Scheduler and logger overrides
 * @throws {InvalidConfigurationError} If an option is invalid
 *
 * @example
 * ```ts
 * const latch = createRefreshLatch(
 *   { delayTime: "200ms", minShowTime: "1s", label: "inbox" },
 *   (shown) => setSpinnerVisible(shown),
 * );
 * ```
 */
export function createRefreshLatch(
  options: LatchOptionsInput,
  sink: RefreshSink,
  collaborators: LatchCollaborators = {},
): RefreshLatch {
  const result = latchOptionsSchema.safeParse(options);
  if (!result.success) {
    const issues = result.error.errors.map((err) => ({
      path: err.path.join("."),
      message: err.message,
    }));
    throw new InvalidConfigurationError(
      `Invalid refresh latch configuration: ${issues.map((i) => `${i.path}: ${i.message}`).join("; ")}`,
      issues,
      result.error,
    );
  }
  const parsed = result.data;

  return new RefreshLatch(
    { delayTime: parsed.delayTime, minShowTime: parsed.minShowTime, sink },
    {
      scheduler: collaborators.scheduler,
      logger: collaborators.logger,
      label: collaborators.label ?? parsed.label,
      debug: parsed.debug ?? process.env["REFRESH_LATCH_DEBUG"] === "true",
    },
  );
}

/**
 * Create a refresh latch with the default delay and minimum show time
 */
export function newRefreshLatch(
  sink: RefreshSink,
  collaborators?: LatchCollaborators,
): RefreshLatch {
  return createRefreshLatch({}, sink, collaborators);
}

/**
 * Create a refresh latch with a custom delay and the default minimum show time
 *
 * @param delayTime - Delay before show, in milliseconds or as a duration string
 */
export function newRefreshLatchWithDelay(
  delayTime: DurationInput,
  sink: RefreshSink,
  collaborators?: LatchCollaborators,
): RefreshLatch {
  return createRefreshLatch({ delayTime }, sink, collaborators);
}

/**
 * Create a refresh latch with the default delay and a custom minimum show time
 *
 * @param minShowTime - Minimum show time, in milliseconds or as a duration string
 */
export function newRefreshLatchWithMinShowTime(
  minShowTime: DurationInput,
  sink: RefreshSink,
  collaborators?: LatchCollaborators,
): RefreshLatch {
  return createRefreshLatch({ minShowTime }, sink, collaborators);
}
