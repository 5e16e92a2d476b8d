import { z } from "zod";
import { MAX_DELAY_MS } from "../scheduler/types.js";
import { parseDuration } from "../utils/duration.js";

/** Default delay before show is emitted, in milliseconds */
export const DEFAULT_DELAY_TIME = 300;

/** Default minimum time show stays active, in milliseconds */
export const DEFAULT_MIN_SHOW_TIME = 700;

/**
 * Schema for a duration: milliseconds or a duration string ("300ms", "1.5s")
 *
 * Always parses to milliseconds.
 */
export const durationSchema = z.union([
  z
    .number()
    .finite("Duration must be a finite number of milliseconds")
    .nonnegative("Duration must be non-negative")
    .max(MAX_DELAY_MS, `Duration must be at most ${MAX_DELAY_MS}ms`),
  z.string().transform((value, ctx) => {
    const ms = parseDuration(value);
    if (ms === null) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Invalid duration "${value}" - use milliseconds or a value like "300ms", "1.5s", "2m"`,
      });
      return z.NEVER;
    }
    if (ms > MAX_DELAY_MS) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Duration must be at most ${MAX_DELAY_MS}ms`,
      });
      return z.NEVER;
    }
    return ms;
  }),
]);

/**
 * Schema for options accepted by createRefreshLatch
 *
 * @example
 * ```ts
 * const options = latchOptionsSchema.parse({ delayTime: "250ms" });
 * // { delayTime: 250, minShowTime: 700 }
 * ```
 */
export const latchOptionsSchema = z
  .object({
    delayTime: durationSchema.default(DEFAULT_DELAY_TIME),
    minShowTime: durationSchema.default(DEFAULT_MIN_SHOW_TIME),
    label: z.string().min(1, "Label must not be empty").optional(),
    debug: z.boolean().optional(),
  })
  .strict();

/**
 * Actions a scenario step can take
 */
export const scenarioActionSchema = z.enum(
  ["busy", "idle", "force-show", "force-hide", "dispose"],
  {
    errorMap: () => ({
      message:
        "Expected 'busy', 'idle', 'force-show', 'force-hide' or 'dispose'",
    }),
  },
);

/**
 * Schema for a single scenario step
 */
const scenarioStepSchema = z.object({
  /** Time of the step from the start of the scenario */
  at: durationSchema,
  action: scenarioActionSchema,
});

/**
 * Schema for a scenario file replayed by the simulator
 *
 * @example
 * ```json
 * {
 *   "name": "slow refresh",
 *   "delay_time": 300,
 *   "min_show_time": "700ms",
 *   "steps": [
 *     { "at": 0, "action": "busy" },
 *     { "at": "500ms", "action": "idle" }
 *   ]
 * }
 * ```
 */
export const scenarioSchema = z
  .object({
    name: z.string().min(1, "Scenario name must not be empty").optional(),
    delay_time: durationSchema.default(DEFAULT_DELAY_TIME),
    min_show_time: durationSchema.default(DEFAULT_MIN_SHOW_TIME),
    steps: z
      .array(scenarioStepSchema)
      .min(1, "Scenario must contain at least one step"),
    /** Stop the replay at this time instead of when nothing is pending */
    until: durationSchema.optional(),
  })
  .strict()
  .refine(
    ({ until, steps }) =>
      until === undefined || steps.every((step) => step.at <= until),
    {
      message: "All steps must happen at or before 'until'",
      path: ["until"],
    },
  );
