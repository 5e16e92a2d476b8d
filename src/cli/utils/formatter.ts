/**
 * CLI Output Formatter
 *
 * Utilities for pretty-printing CLI output with colors and tables.
 */

import chalk from "chalk";
import Table from "cli-table3";
import { ZodError } from "zod";
import type { SimulationSummary, TraceEntry } from "../../simulation/simulator.js";
import { formatDuration } from "../../utils/duration.js";

/**
 * Print a success message
 *
 * @param message - Success message
 */
export function printSuccess(message: string): void {
  console.log(chalk.green("✓"), message);
}

/**
 * Print an error message
 *
 * @param message - Error message
 */
export function printError(message: string): void {
  console.error(chalk.red("✗"), message);
}

/**
 * Print header with scenario name
 *
 * @param title - Scenario name
 */
export function printHeader(title: string): void {
  console.log();
  console.log(chalk.bold.cyan(`refresh-latch - ${title}`));
  console.log(chalk.gray("─".repeat(50)));
  console.log();
}

/**
 * Format Zod validation errors, one line per issue
 *
 * @param error - ZodError instance
 * @returns Formatted error string
 */
export function formatValidationErrors(error: ZodError): string {
  const output: string[] = [];
  output.push(`\n${chalk.red.bold("Scenario validation failed:")}\n`);

  for (const err of error.errors) {
    const path = err.path.length > 0 ? err.path.join(".") : "(root)";
    output.push(`  ${chalk.red("•")} ${chalk.bold(path)}: ${err.message}`);
  }

  return output.join("\n");
}

/**
 * Describe a trace entry's event column
 */
export function formatTraceEvent(entry: TraceEntry): string {
  switch (entry.kind) {
    case "input":
      return chalk.cyan(entry.action);
    case "emit":
      return entry.shown ? chalk.green("show") : chalk.yellow("hide");
    case "diagnostic":
      return chalk.gray(entry.transition);
    case "error":
      return chalk.red("error");
  }
}

/**
 * Describe a trace entry's detail column
 */
export function formatTraceDetail(entry: TraceEntry): string {
  switch (entry.kind) {
    case "input":
      return "input";
    case "emit":
      return entry.shown ? "sink(true)" : "sink(false)";
    case "diagnostic":
      return chalk.gray(entry.message);
    case "error":
      return chalk.red(entry.message);
  }
}

/**
 * Render a simulation trace as a table
 *
 * @param trace - Trace entries in order
 * @param verbose - Include diagnostic rows
 */
export function formatTraceTable(trace: TraceEntry[], verbose: boolean): string {
  const table = new Table({
    head: [chalk.white("Time"), chalk.white("Event"), chalk.white("Detail")],
    style: { head: [], border: [] },
  });

  for (const entry of trace) {
    if (entry.kind === "diagnostic" && !verbose) continue;
    table.push([
      `${entry.time}ms`,
      formatTraceEvent(entry),
      formatTraceDetail(entry),
    ]);
  }

  return table.toString();
}

/**
 * Render the summary lines printed under a trace
 */
export function formatSummary(summary: SimulationSummary): string[] {
  return [
    `  Shows:        ${summary.shows}`,
    `  Hides:        ${summary.hides}`,
    `  Visible for:  ${formatDuration(summary.visibleMs)}`,
    `  Ended at:     ${summary.endTime}ms`,
    `  Final phase:  ${summary.finalPhase}`,
  ];
}
