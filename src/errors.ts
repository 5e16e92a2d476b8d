/**
 * Error types for refresh latches
 */

/**
 * A single configuration problem
 */
export interface ConfigurationIssue {
  /** Dotted path of the offending option (e.g., "delayTime") */
  path: string;
  /** Human-readable description */
  message: string;
}

/**
 * Error thrown when a latch is constructed with unusable options
 *
 * @example
 * ```ts
 * try {
 *   createRefreshLatch({ delayTime: -1 }, sink);
 * } catch (error) {
 *   if (error instanceof InvalidConfigurationError) {
 *     console.error(error.issues);
 *   }
 * }
 * ```
 */
export class InvalidConfigurationError extends Error {
  constructor(
    message: string,
    public readonly issues: ConfigurationIssue[] = [],
    public override cause?: Error,
  ) {
    super(message);
    this.name = "InvalidConfigurationError";
  }
}

/**
 * Error thrown when a disposed latch is used again
 */
export class UseAfterDisposeError extends Error {
  constructor(
    public readonly operation: string,
    public readonly label?: string,
  ) {
    super(
      `Cannot call ${operation}() on disposed refresh latch${label ? ` "${label}"` : ""}`,
    );
    this.name = "UseAfterDisposeError";
  }
}

/**
 * Error thrown when a scenario file cannot be read or parsed
 */
export class ScenarioLoadError extends Error {
  constructor(
    message: string,
    public override cause?: Error,
  ) {
    super(message);
    this.name = "ScenarioLoadError";
  }
}
