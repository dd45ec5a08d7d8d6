#!/usr/bin/env node

/**
 * Span store CLI entry point
 */

import { CommanderError, InvalidArgumentError } from "commander";
import { createProgram } from "./program.js";
import { formatCliError, mapErrorToExitCode } from "./lib/errors.js";
import { isVerbose } from "./lib/env.js";

const program = createProgram();

// Top-level error handler
async function main(): Promise<void> {
  try {
    await program.parseAsync(process.argv);
  } catch (err) {
    // Commander has already printed its own parse errors, help and version
    if (err instanceof CommanderError && !(err instanceof InvalidArgumentError)) {
      process.exitCode = err.exitCode;
      return;
    }

    const verbose = program.opts().verbose === true || isVerbose();
    console.error(`Error: ${formatCliError(err, verbose)}`);
    process.exitCode = mapErrorToExitCode(err);
  }
}

await main();
