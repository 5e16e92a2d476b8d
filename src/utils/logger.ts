import winston from "winston";

/**
 * Console log format with timestamp and colorized output
 */
const consoleFormat = winston.format.combine(
  winston.format.timestamp({ format: "YYYY-MM-DD HH:mm:ss.SSS" }),
  winston.format.errors({ stack: true }),
  winston.format.colorize(),
  winston.format.printf(
    ({ timestamp, level, message, stack, context, ...meta }) => {
      const contextStr = context ? ` [${String(context)}]` : "";
      const metaStr =
        Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : "";

      if (stack) {
        return `${String(timestamp)} [${level}]${contextStr}: ${String(message)}${metaStr}\n${String(stack)}`;
      }
      return `${String(timestamp)} [${level}]${contextStr}: ${String(message)}${metaStr}`;
    },
  ),
);

/**
 * Create a Winston logger instance
 *
 * @param options - Logger configuration options
 * @returns Configured Winston logger
 *
 * @example
 * ```ts
 * const logger = createLogger({ level: 'debug', context: 'Simulator' });
 * logger.debug('show scheduled', { delayMs: 300 });
 * ```
 */
export function createLogger(options: {
  level?: string;
  silent?: boolean;
  context?: string;
}): winston.Logger {
  return winston.createLogger({
    level: options.level ?? "info",
    silent: options.silent ?? false,
    transports: [
      new winston.transports.Console({
        format: consoleFormat,
        // Diagnostics go to stderr so CLI output on stdout stays clean
        stderrLevels: ["error", "warn", "info", "debug"],
      }),
    ],
    defaultMeta: options.context ? { context: options.context } : undefined,
  });
}

/**
 * Create a child logger with a specific context
 *
 * @param context - Context name (e.g., 'RefreshLatch', 'Simulator')
 * @returns Logger instance with context
 */
export function createContextLogger(context: string): winston.Logger {
  return logger.child({ context });
}

/**
 * Default logger instance for the package
 *
 * Uses environment variable LOG_LEVEL if set, otherwise defaults to 'info'.
 */
export const logger = createLogger({
  level: process.env["LOG_LEVEL"] ?? "info",
});
