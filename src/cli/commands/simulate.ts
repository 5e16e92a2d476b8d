/**
 * Simulate Command
 *
 * Replays a scenario through a refresh latch on a virtual clock and prints
 * when show and hide would have been emitted.
 */

import { ZodError } from "zod";
import { loadScenario, validateScenario } from "../../config/loader.js";
import type { Scenario } from "../../config/types.js";
import { simulateScenario } from "../../simulation/simulator.js";
import { parseSteps } from "../../simulation/steps.js";
import {
  formatSummary,
  formatTraceTable,
  formatValidationErrors,
  printError,
  printHeader,
} from "../utils/formatter.js";

export interface SimulateOptions {
  /** Inline steps, e.g. "0:busy,100:idle" */
  steps?: string;
  /** Override the scenario's delay time */
  delay?: string;
  /** Override the scenario's minimum show time */
  minShow?: string;
  /** Stop the replay at this time */
  until?: string;
  /** Print the result as JSON */
  json?: boolean;
  /** Include diagnostic rows in the trace table */
  verbose?: boolean;
}

/**
 * Simulate a scenario
 *
 * @param scenarioPath - Path to a scenario file (omit when using --steps)
 * @param options - Simulate options
 * @returns Exit code (0 for success, 1 for failure)
 */
export async function simulateCommand(
  scenarioPath: string | undefined,
  options: SimulateOptions = {},
): Promise<number> {
  if (scenarioPath && options.steps) {
    printError("Pass either a scenario file or --steps, not both");
    return 1;
  }
  if (!scenarioPath && !options.steps) {
    printError("Missing scenario - pass a scenario file or --steps");
    return 1;
  }

  try {
    const scenario = await resolveScenario(scenarioPath, options);
    const result = simulateScenario(scenario);

    if (options.json) {
      console.log(JSON.stringify(result, null, 2));
      return 0;
    }

    printHeader(scenario.name ?? scenarioPath ?? "inline scenario");
    console.log(
      `  Delay: ${scenario.delay_time}ms   Min show: ${scenario.min_show_time}ms`,
    );
    console.log();
    console.log(formatTraceTable(result.trace, options.verbose ?? false));
    console.log();
    for (const line of formatSummary(result.summary)) {
      console.log(line);
    }
    console.log();

    return 0;
  } catch (error) {
    if (error instanceof ZodError) {
      printError("Scenario validation failed");
      console.error(formatValidationErrors(error));
      return 1;
    }

    printError(
      `Failed to simulate scenario: ${error instanceof Error ? error.message : String(error)}`,
    );
    return 1;
  }
}

async function resolveScenario(
  scenarioPath: string | undefined,
  options: SimulateOptions,
): Promise<Scenario> {
  const base: Record<string, unknown> = scenarioPath
    ? { ...(await loadScenario(scenarioPath)) }
    : { steps: parseSteps(options.steps ?? "") };

  if (options.delay !== undefined) base["delay_time"] = options.delay;
  if (options.minShow !== undefined) base["min_show_time"] = options.minShow;
  if (options.until !== undefined) base["until"] = options.until;

  return validateScenario(base);
}
