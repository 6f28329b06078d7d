/**
 * Trail lifecycle for a single CLI invocation
 */

import type { Command } from "commander";
import { logger, openTrail } from "@msgtrail/sdk";
import type { Trail } from "@msgtrail/sdk";
import { isVerbose, resolveRoot } from "./env.js";
import { emitMetric } from "./telemetry.js";

/**
 * Global options shared by every command
 */
export type GlobalOptions = {
  root?: string;
  verbose?: boolean;
  quiet?: boolean;
};

export function globalOptions(program: Command): GlobalOptions {
  return program.opts<GlobalOptions>();
}

/**
 * Load the trail (replaying leftover crumbs), run fn, then close it so the
 * result is saved and the crumb directory compacted
 */
export async function withTrail<T>(
  program: Command,
  fn: (trail: Trail) => Promise<T> | T
): Promise<T> {
  const opts = globalOptions(program);
  const verbose = isVerbose(opts.verbose);
  const wasEnabled = logger.enabled;

  if (opts.quiet) {
    logger.setEnabled(false);
  }
  if (verbose) {
    logger.setLevel("debug");
  }

  try {
    const trail = openTrail({ root: resolveRoot(opts.root) });
    const loaded = await trail.load();

    if (loaded.replayed > 0 || loaded.discarded > 0) {
      emitMetric("cli.recovered", { ...loaded }, verbose);
    }

    const result = await fn(trail);
    await trail.close();
    return result;
  } finally {
    logger.setEnabled(wasEnabled);
    if (verbose) {
      logger.setLevel(undefined);
    }
  }
}
