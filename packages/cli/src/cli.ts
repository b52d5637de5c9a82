#!/usr/bin/env node

/**
 * datamap CLI entry point
 */

import { CommanderError } from "commander";
import { createProgram } from "./program.js";
import { mapSdkErrorToExitCode, formatCliError } from "./lib/errors.js";

async function main(): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(process.argv);
  } catch (err) {
    // Commander has already printed its own message (or help/version)
    if (err instanceof CommanderError) {
      process.exit(err.exitCode);
    }

    const verbose = program.opts().verbose === true;
    console.error(`Error: ${formatCliError(err, verbose)}`);
    process.exit(mapSdkErrorToExitCode(err));
  }
}

void main();
