#!/usr/bin/env -S node --import tsx

/**
 * msgtrail CLI entry point
 */

import { CommanderError } from "commander";
import { createProgram } from "./program.js";
import { isVerbose } from "./lib/env.js";
import { mapErrorToExitCode, formatCliError } from "./lib/errors.js";
import type { GlobalOptions } from "./lib/trail.js";

async function main(): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(process.argv);
  } catch (err) {
    // Help and version also arrive here under exitOverride
    if (err instanceof CommanderError && err.exitCode === 0) {
      return;
    }

    const opts = program.opts<GlobalOptions>();
    const exitCode = mapErrorToExitCode(err);

    // Commander has already printed its own usage errors
    if (!(err instanceof CommanderError)) {
      console.error(`Error: ${formatCliError(err, isVerbose(opts.verbose))}`);
    }

    process.exitCode = exitCode;
  }
}

void main();
