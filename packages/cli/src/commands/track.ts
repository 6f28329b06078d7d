/**
 * Commands that change what the trail tracks
 */

import type { Command } from "commander";
import { createInterface } from "node:readline/promises";
import { parseRecord } from "@msgtrail/sdk";
import type { MessageRecord } from "@msgtrail/sdk";
import { parseJsonText, parseMessageId } from "../lib/arg.js";
import { readStdin, readJsonFile, isStdinTTY } from "../lib/io.js";
import { colorize } from "../lib/render.js";
import { CliError, EXIT_NOT_FOUND } from "../lib/errors.js";
import { withTiming } from "../lib/telemetry.js";
import { globalOptions, withTrail } from "../lib/trail.js";

interface AddOptions {
  file?: string;
  data?: string;
}

/**
 * Read the raw input of `add` from --file, --data or stdin
 */
async function readAddInput(options: AddOptions): Promise<unknown> {
  const sources = [options.file, options.data].filter(Boolean);
  if (sources.length > 1) {
    throw new CliError("Cannot use both --file and --data; choose one or use stdin");
  }

  if (options.file) {
    return readJsonFile(options.file);
  }
  if (options.data) {
    return parseJsonText(options.data, "--data");
  }

  if (isStdinTTY()) {
    throw new CliError("No input provided. Use --file, --data, or pipe JSON to stdin");
  }

  const stdin = await readStdin();
  if (!stdin.trim()) {
    throw new CliError("stdin is empty");
  }
  return parseJsonText(stdin, "stdin");
}

/**
 * One record or an array of them, oldest first
 */
function toRecords(input: unknown): MessageRecord[] {
  const items = Array.isArray(input) ? input : [input];
  return items.map((item) => parseRecord(item));
}

async function confirm(question: string): Promise<boolean> {
  const rl = createInterface({ input: process.stdin, output: process.stderr });
  try {
    return (await rl.question(question)).trim().toLowerCase() === "y";
  } finally {
    rl.close();
  }
}

export function registerTrackCommands(program: Command): void {
  program
    .command("add")
    .description("Track a message (or an array of messages, oldest first) as most recent")
    .option("--file <path>", "Read the record from a JSON file")
    .option("--data <json>", "Inline JSON record")
    .action(async (options: AddOptions) => {
      const opts = globalOptions(program);
      await withTiming(
        "cli.add",
        async () => {
          const records = toRecords(await readAddInput(options));

          await withTrail(program, async (trail) => {
            for (const record of records) {
              const known = trail.find(record.messageId) !== undefined;
              await trail.insert(record);

              if (!opts.quiet) {
                console.log(
                  known
                    ? `Already tracked ${record.messageId}`
                    : colorize(`Tracked ${record.messageId}`, "green")
                );
              }
            }
          });
        },
        opts.verbose
      );
    });

  program
    .command("mv")
    .description("Record that a message moved to another group")
    .argument("<messageId>", "Message id", parseMessageId)
    .argument("<group>", "New group")
    .action(async (messageId: string, group: string) => {
      const opts = globalOptions(program);
      await withTiming(
        "cli.mv",
        () =>
          withTrail(program, async (trail) => {
            if (!trail.find(messageId)) {
              throw new CliError(`Message not tracked: ${messageId}`, { exitCode: EXIT_NOT_FOUND });
            }

            await trail.updateLocation(messageId, group);

            if (!opts.quiet) {
              console.log(`Moved ${messageId} to ${group}`);
            }
          }),
        opts.verbose
      );
    });

  program
    .command("rm")
    .description("Forget a message")
    .argument("<messageId>", "Message id", parseMessageId)
    .action(async (messageId: string) => {
      const opts = globalOptions(program);
      await withTiming(
        "cli.rm",
        () =>
          withTrail(program, async (trail) => {
            if (!(await trail.remove(messageId))) {
              throw new CliError(`Message not tracked: ${messageId}`, { exitCode: EXIT_NOT_FOUND });
            }

            if (!opts.quiet) {
              console.log(`Forgot ${messageId}`);
            }
          }),
        opts.verbose
      );
    });

  program
    .command("clear")
    .description("Forget every message and delete all crumbs")
    .option("--force", "Clear without confirmation")
    .action(async (options: { force?: boolean }) => {
      const opts = globalOptions(program);

      if (!options.force) {
        if (!isStdinTTY()) {
          throw new CliError("Use --force to confirm clearing in non-interactive mode");
        }
        if (!(await confirm("Forget every tracked message? (y/N) "))) {
          throw new CliError("Aborted by user", { exitCode: 1 });
        }
      }

      await withTiming(
        "cli.clear",
        () =>
          withTrail(program, async (trail) => {
            const forgotten = trail.size;
            await trail.removeAll();

            if (!opts.quiet) {
              console.log(colorize(`Cleared ${forgotten} message(s)`, "yellow"));
            }
          }),
        opts.verbose
      );
    });
}
