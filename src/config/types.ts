import { z } from "zod";
import {
  latchOptionsSchema,
  scenarioActionSchema,
  scenarioSchema,
} from "./schema.js";

/**
 * Latch options as written by callers (durations may be strings)
 */
export type LatchOptionsInput = z.input<typeof latchOptionsSchema>;

/**
 * Latch options after validation (durations in milliseconds)
 */
export type LatchOptions = z.output<typeof latchOptionsSchema>;

/**
 * Scenario step action
 */
export type ScenarioAction = z.infer<typeof scenarioActionSchema>;

/**
 * Validated scenario (durations in milliseconds)
 */
export type Scenario = z.output<typeof scenarioSchema>;

/**
 * Single validated scenario step
 */
export type ScenarioStep = Scenario["steps"][number];
