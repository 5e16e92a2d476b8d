/**
 * Scenario simulator
 *
 * Replays a scenario of busy/idle inputs through a real RefreshLatch on a
 * virtual clock and records what the latch emitted, and when.
 */

import type { Scenario, ScenarioAction } from "../config/types.js";
import { UseAfterDisposeError } from "../errors.js";
import type {
  DiagnosticLogger,
  DiagnosticMeta,
  LatchTransition,
} from "../latch/diagnostics.js";
import { RefreshLatch, type LatchPhase } from "../latch/refresh-latch.js";
import { VirtualScheduler } from "../scheduler/virtual-scheduler.js";

/**
 * One row of a simulation trace
 */
export type TraceEntry =
  | { time: number; kind: "input"; action: ScenarioAction }
  | { time: number; kind: "emit"; shown: boolean }
  | {
      time: number;
      kind: "diagnostic";
      transition: LatchTransition;
      message: string;
    }
  | { time: number; kind: "error"; action: ScenarioAction; message: string };

export interface SimulationSummary {
  shows: number;
  hides: number;
  /** Time from each show to the following hide, or to the end of the replay */
  visibleMs: number;
  /** Clock time the replay stopped at */
  endTime: number;
  finalPhase: LatchPhase | "disposed";
}

export interface SimulationResult {
  scenario: Scenario;
  trace: TraceEntry[];
  summary: SimulationSummary;
}

export interface SimulateOptions {
  /** Also forward latch diagnostics to this logger */
  logger?: DiagnosticLogger;
}

/**
 * Run a scenario to completion
 *
 * Steps run in order of their `at` time (steps at the same time keep their
 * file order). After the last step the clock runs until `until`, or until
 * nothing is pending when `until` is not set.
 *
 * Using a disposed latch is recorded as an "error" trace entry and the replay
 * continues.
 *
 * @example
 * ```ts
 * const { summary } = simulateScenario(validateScenario({
 *   steps: [{ at: 0, action: "busy" }, { at: 100, action: "idle" }],
 * }));
 * summary.shows; // 0
 * ```
 */
export function simulateScenario(
  scenario: Scenario,
  options: SimulateOptions = {},
): SimulationResult {
  const scheduler = new VirtualScheduler();
  const trace: TraceEntry[] = [];

  let shows = 0;
  let hides = 0;
  let visibleMs = 0;
  let shownSince: number | null = null;

  const recorder: DiagnosticLogger = {
    debug(message: string, meta: DiagnosticMeta) {
      trace.push({
        time: scheduler.now(),
        kind: "diagnostic",
        transition: meta.transition,
        message,
      });
      options.logger?.debug(message, meta);
    },
  };

  const latch = new RefreshLatch(
    {
      delayTime: scenario.delay_time,
      minShowTime: scenario.min_show_time,
      sink: (shown) => {
        const now = scheduler.now();
        trace.push({ time: now, kind: "emit", shown });
        if (shown) {
          shows++;
          shownSince ??= now;
        } else {
          hides++;
          if (shownSince !== null) {
            visibleMs += now - shownSince;
            shownSince = null;
          }
        }
      },
    },
    { scheduler, logger: recorder, label: scenario.name, debug: true },
  );

  const steps = [...scenario.steps].sort((a, b) => a.at - b.at);

  for (const step of steps) {
    scheduler.advanceTo(step.at);
    trace.push({ time: step.at, kind: "input", action: step.action });

    try {
      applyAction(latch, step.action);
    } catch (error) {
      if (!(error instanceof UseAfterDisposeError)) throw error;
      trace.push({
        time: step.at,
        kind: "error",
        action: step.action,
        message: error.message,
      });
    }
  }

  if (scenario.until !== undefined) {
    scheduler.advanceTo(scenario.until);
  } else {
    scheduler.runAll();
  }

  const endTime = scheduler.now();
  if (shownSince !== null) {
    visibleMs += endTime - shownSince;
  }

  return {
    scenario,
    trace,
    summary: {
      shows,
      hides,
      visibleMs,
      endTime,
      finalPhase: latch.disposed ? "disposed" : latch.phase,
    },
  };
}

function applyAction(latch: RefreshLatch, action: ScenarioAction): void {
  switch (action) {
    case "busy":
      latch.setBusy(true);
      break;
    case "idle":
      latch.setBusy(false);
      break;
    case "force-show":
      latch.force(true);
      break;
    case "force-hide":
      latch.force(false);
      break;
    case "dispose":
      latch.dispose();
      break;
  }
}
