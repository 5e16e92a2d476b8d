/**
 * Validate Command
 *
 * Validates a scenario file without running it.
 */

import { ZodError } from "zod";
import { loadScenario } from "../../config/loader.js";
import { formatDuration } from "../../utils/duration.js";
import {
  printSuccess,
  printError,
  formatValidationErrors,
} from "../utils/formatter.js";

/**
 * Validate scenario file
 *
 * @param scenarioPath - Path to scenario file
 * @returns Exit code (0 for success, 1 for failure)
 */
export async function validateCommand(scenarioPath: string): Promise<number> {
  try {
    const scenario = await loadScenario(scenarioPath);

    printSuccess(`Scenario is valid!`);
    console.log();
    console.log(`  Name: ${scenario.name ?? "(unnamed)"}`);
    console.log(`  Steps: ${scenario.steps.length}`);
    console.log(`  Delay: ${formatDuration(scenario.delay_time)}`);
    console.log(`  Min show: ${formatDuration(scenario.min_show_time)}`);
    if (scenario.until !== undefined) {
      console.log(`  Until: ${formatDuration(scenario.until)}`);
    }
    console.log();

    return 0;
  } catch (error) {
    if (error instanceof ZodError) {
      printError("Scenario validation failed");
      console.error(formatValidationErrors(error));
      return 1;
    }

    // Other errors (file not found, JSON parse error, etc.)
    printError(
      `Failed to validate scenario: ${error instanceof Error ? error.message : String(error)}`,
    );
    return 1;
  }
}
