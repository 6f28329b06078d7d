/**
 * Snapshot and diagnostics commands
 */

import type { Command } from "commander";
import { p95 } from "@msgtrail/sdk";
import { printJson } from "../lib/render.js";
import { withTiming } from "../lib/telemetry.js";
import { globalOptions, withTrail } from "../lib/trail.js";

export function registerMaintainCommands(program: Command): void {
  program
    .command("save")
    .description("Write a snapshot and compact crumbs")
    .option("--output <path>", "Also write the snapshot to this path")
    .action(async (options: { output?: string }) => {
      const opts = globalOptions(program);
      await withTiming(
        "cli.save",
        () =>
          withTrail(program, async (trail) => {
            const target = options.output ?? trail.options.snapshotPath;
            await trail.save(target);

            if (!opts.quiet) {
              console.log(`Saved ${trail.size} message(s) to ${target}`);
            }
          }),
        opts.verbose
      );
    });

  program
    .command("stats")
    .description("Show trail statistics")
    .option("--json", "Output as JSON for machine consumption")
    .action(async (options: { json?: boolean }) => {
      await withTiming(
        "cli.stats",
        () =>
          withTrail(program, async (trail) => {
            const stats = await trail.stats();

            if (options.json) {
              printJson(stats, { raw: true });
              return;
            }

            console.log(`Messages: ${stats.records}`);
            console.log(`Pending crumbs: ${stats.pendingCrumbs}`);
            console.log(`Snapshot: ${stats.snapshotPath}`);
            console.log(`Crumbs: ${stats.crumbDir}`);
            console.log(`Replayed on load: ${stats.metrics.crumbsReplayed}`);
            console.log(`Discarded on load: ${stats.metrics.crumbsDiscarded}`);
            console.log(`Load p95: ${p95(stats.metrics.loadTimeMs)}ms`);
          }),
        globalOptions(program).verbose
      );
    });
}
