/**
 * Duration helpers
 *
 * Latch timings are plain milliseconds internally. Config files and the CLI
 * also accept short duration strings such as "250ms", "1.5s" or "2m".
 */

/**
 * A duration given either as milliseconds or as a duration string
 */
export type DurationInput = number | string;

const UNIT_FACTORS: Record<string, number> = {
  ms: 1,
  s: 1000,
  m: 60 * 1000,
  h: 60 * 60 * 1000,
};

/**
 * Parse duration string to milliseconds
 * Supports: 250 (ms), 250ms, 1.5s, 2m, 1h
 *
 * @param duration - Duration string
 * @returns Milliseconds, or null if the string is not a valid duration
 *
 * @example
 * ```ts
 * parseDuration("1.5s"); // 1500
 * parseDuration("soon"); // null
 * ```
 */
export function parseDuration(duration: string): number | null {
  const match = duration.trim().match(/^(\d+(?:\.\d+)?)(ms|s|m|h)?$/);
  if (!match || !match[1]) return null;

  const value = parseFloat(match[1]);
  const factor = UNIT_FACTORS[match[2] ?? "ms"];
  if (factor === undefined) return null;

  return Math.round(value * factor);
}

/**
 * Format milliseconds for display
 *
 * @example
 * ```ts
 * formatDuration(700);  // "700ms"
 * formatDuration(1500); // "1.5s"
 * ```
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  if (ms < 60 * 1000) return `${parseFloat((ms / 1000).toFixed(3))}s`;
  return `${parseFloat((ms / 60000).toFixed(3))}m`;
}
