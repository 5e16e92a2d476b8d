/**
 * refresh-latch CLI
 *
 * Main CLI entry point using Commander.js
 */

import { Command } from "commander";
import { simulateCommand, type SimulateOptions } from "./commands/simulate.js";
import { validateCommand } from "./commands/validate.js";

/**
 * Create and configure the CLI program
 *
 * @returns Configured Commander program
 */
export function createCLI(): Command {
  const program = new Command();

  program
    .name("refresh-latch")
    .description(
      "Replay busy/refreshing signals through a refresh latch and see when the indicator shows",
    )
    .version("0.1.0");

  // Simulate command
  program
    .command("simulate")
    .description("Replay a scenario on a virtual clock and print the show/hide trace")
    .argument("[scenario]", "Path to a scenario JSON file")
    .option("-s, --steps <list>", 'Inline steps, e.g. "0:busy,100:idle"')
    .option("-d, --delay <duration>", "Delay before show (e.g., 300, 300ms, 0.5s)")
    .option("-m, --min-show <duration>", "Minimum show time (e.g., 700, 1s)")
    .option("-u, --until <duration>", "Stop the replay at this time")
    .option("--json", "Output the trace as JSON")
    .option("-v, --verbose", "Include latch diagnostics in the trace")
    .action(async (scenarioPath: string | undefined, options: SimulateOptions) => {
      const exitCode = await simulateCommand(scenarioPath, options);
      process.exit(exitCode);
    });

  // Validate command
  program
    .command("validate")
    .description("Validate a scenario file")
    .argument("<scenario>", "Path to a scenario JSON file")
    .action(async (scenarioPath: string) => {
      const exitCode = await validateCommand(scenarioPath);
      process.exit(exitCode);
    });

  return program;
}

/**
 * Run the CLI
 *
 * @param argv - Command line arguments
 */
export async function runCLI(argv: string[] = process.argv): Promise<void> {
  const program = createCLI();
  await program.parseAsync(argv);
}
