import { readFile } from "fs/promises";
import { ScenarioLoadError } from "../errors.js";
import { scenarioSchema } from "./schema.js";
import type { Scenario } from "./types.js";

/**
 * Loads and validates a scenario file
 *
 * @param filePath - Path to the scenario JSON file
 * @returns Validated scenario with durations in milliseconds
 * @throws {ScenarioLoadError} If file cannot be read or parsed
 * @throws {ZodError} If scenario validation fails
 *
 * @example
 * ```ts
 * const scenario = await loadScenario('./scenarios/slow-refresh.json');
 * console.log(`Loaded ${scenario.steps.length} steps`);
 * ```
 */
export async function loadScenario(filePath: string): Promise<Scenario> {
  let fileContent: string;
  try {
    fileContent = await readFile(filePath, "utf-8");
  } catch (error) {
    throw new ScenarioLoadError(
      `Failed to read scenario from ${filePath}`,
      error instanceof Error ? error : undefined,
    );
  }

  let rawScenario: unknown;
  try {
    rawScenario = JSON.parse(fileContent);
  } catch (error) {
    throw new ScenarioLoadError(
      `Failed to parse JSON from ${filePath}`,
      error instanceof Error ? error : undefined,
    );
  }

  // ZodError propagates as-is for detailed validation messages
  return scenarioSchema.parse(rawScenario);
}

/**
 * Validates a scenario object without loading from file
 *
 * @param scenario - Raw scenario object to validate
 * @returns Validated scenario
 * @throws {ZodError} If scenario validation fails
 */
export function validateScenario(scenario: unknown): Scenario {
  return scenarioSchema.parse(scenario);
}
