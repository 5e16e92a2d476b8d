#!/usr/bin/env node

/**
 * refresh-latch CLI Binary
 *
 * Executable entry point for the refresh-latch CLI.
 */

import { runCLI } from "../cli/index.js";

// Run the CLI with process arguments
runCLI(process.argv).catch((error: unknown) => {
  console.error("Unexpected error:", error);
  process.exit(1);
});
