/**
 * Diagnostic reporting for refresh latches
 *
 * Purely observational: a latch reports its transitions here when debugging
 * is enabled, and nothing reported affects timing or emissions.
 */

import type winston from "winston";
import { createLogger } from "../utils/logger.js";

/**
 * Kinds of transition a latch reports
 */
export type LatchTransition =
  | "debugging-enabled"
  | "no-op-ignored"
  | "commands-cleared"
  | "show-scheduled"
  | "hide-scheduled"
  | "show-fired"
  | "hide-fired"
  | "disposed";

/**
 * Structured data attached to each diagnostic message
 */
export interface DiagnosticMeta {
  transition: LatchTransition;
  label?: string;
  busy?: boolean;
  delayMs?: number;
  elapsedMs?: number;
}

/**
 * Minimal logging capability a latch needs
 *
 * A winston Logger satisfies this interface.
 */
export interface DiagnosticLogger {
  debug(message: string, meta: DiagnosticMeta): unknown;
}

/** Human-readable message for each transition */
const MESSAGES: Record<LatchTransition, string> = {
  "debugging-enabled": "Enabling debugging",
  "no-op-ignored": "setBusy() called with same state, ignore",
  "commands-cleared": "Clearing pending command",
  "show-scheduled": "Queueing show()",
  "hide-scheduled": "Queueing hide()",
  "show-fired": "show()",
  "hide-fired": "hide()",
  disposed: "Disposed",
};

export function describeTransition(meta: DiagnosticMeta): string {
  const base = MESSAGES[meta.transition];
  return meta.delayMs !== undefined
    ? `${base} to run in ${meta.delayMs}ms`
    : base;
}

let defaultLogger: winston.Logger | undefined;

/**
 * Logger used by latches that were not given one
 *
 * Logs at debug level regardless of LOG_LEVEL: enableDebugging() is the
 * switch for latch diagnostics.
 */
export function getDefaultDiagnosticLogger(): winston.Logger {
  defaultLogger ??= createLogger({ level: "debug", context: "RefreshLatch" });
  return defaultLogger;
}
