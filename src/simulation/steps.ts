/**
 * Inline step lists
 *
 * The CLI accepts steps as "time:action" pairs separated by commas, e.g.
 * "0:busy,100:idle" or "0:busy, 1.2s:idle".
 */

/**
 * Raw step as parsed from the command line, validated later by the scenario schema
 */
export interface RawStep {
  at: string;
  action: string;
}

/**
 * Parse an inline step list
 *
 * @param list - Comma-separated "time:action" pairs
 * @returns Raw steps in the order given
 * @throws {Error} If a pair has no time or no action
 *
 * @example
 * ```ts
 * parseSteps("0:busy,500ms:idle");
 * // [{ at: "0", action: "busy" }, { at: "500ms", action: "idle" }]
 * ```
 */
export function parseSteps(list: string): RawStep[] {
  const steps: RawStep[] = [];

  for (const token of list.split(",")) {
    const trimmed = token.trim();
    if (!trimmed) continue;

    const separator = trimmed.indexOf(":");
    const at = separator === -1 ? "" : trimmed.slice(0, separator).trim();
    const action = separator === -1 ? "" : trimmed.slice(separator + 1).trim();

    if (!at || !action) {
      throw new Error(
        `Invalid step "${trimmed}" - expected "time:action", e.g. "100:idle"`,
      );
    }

    steps.push({ at, action });
  }

  return steps;
}
