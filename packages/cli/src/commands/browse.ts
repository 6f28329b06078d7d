/**
 * Read-side commands: lookups, listings and stepping through history
 */

import type { Command } from "commander";
import { byGroup } from "@msgtrail/sdk";
import type { MessageRecord, Trail } from "@msgtrail/sdk";
import { countParser, parseMessageId } from "../lib/arg.js";
import { printJson, printLines, formatRecordLine } from "../lib/render.js";
import { CliError, EXIT_NOT_FOUND } from "../lib/errors.js";
import { withTiming } from "../lib/telemetry.js";
import { globalOptions, withTrail } from "../lib/trail.js";

interface ListOptions {
  group?: string;
  limit?: number;
  json?: boolean;
}

function printRecords(records: MessageRecord[], json?: boolean): void {
  if (json) {
    printJson(records);
  } else {
    printLines(records.map(formatRecordLine));
  }
}

/**
 * Rotate, then show the record that is now current
 */
function step(program: Command, name: "prev" | "next", rotate: (trail: Trail) => void): void {
  program
    .command(name)
    .description(
      name === "next"
        ? "Step to the next older message (moves the current one to the back)"
        : "Step back to the previous message (brings the oldest to the front)"
    )
    .option("--json", "Output the record as JSON")
    .action(async (options: { json?: boolean }) => {
      await withTiming(
        `cli.${name}`,
        () =>
          withTrail(program, (trail) => {
            rotate(trail);
            const current = trail.current();
            printRecords(current ? [current] : [], options.json);
          }),
        globalOptions(program).verbose
      );
    });
}

export function registerBrowseCommands(program: Command): void {
  program
    .command("get")
    .description("Show a tracked message")
    .argument("<messageId>", "Message id", parseMessageId)
    .option("--raw", "Output raw JSON without formatting")
    .action(async (messageId: string, options: { raw?: boolean }) => {
      await withTiming(
        "cli.get",
        () =>
          withTrail(program, (trail) => {
            const record = trail.find(messageId);
            if (!record) {
              throw new CliError(`Message not tracked: ${messageId}`, { exitCode: EXIT_NOT_FOUND });
            }
            printJson(record, { raw: options.raw });
          }),
        globalOptions(program).verbose
      );
    });

  program
    .command("ls")
    .description("List tracked messages, most recent first")
    .option("--group <group>", "Only messages in this group")
    .option("--limit <n>", "Maximum number of results", countParser("--limit"))
    .option("--json", "Output as JSON array")
    .action(async (options: ListOptions) => {
      await withTiming(
        "cli.ls",
        () =>
          withTrail(program, (trail) => {
            let records = options.group ? trail.findAll(byGroup(options.group)) : trail.list();

            if (options.limit !== undefined) {
              records = records.slice(0, options.limit);
            }

            printRecords(records, options.json);
          }),
        globalOptions(program).verbose
      );
    });

  program
    .command("thread")
    .description("Show a message and every tracked reply to it")
    .argument("<messageId>", "Message id", parseMessageId)
    .option("--json", "Output as JSON array")
    .action(async (messageId: string, options: { json?: boolean }) => {
      await withTiming(
        "cli.thread",
        () =>
          withTrail(program, (trail) => {
            const records = trail.thread(messageId);
            if (records.length === 0) {
              throw new CliError(`No tracked messages in thread ${messageId}`, {
                exitCode: EXIT_NOT_FOUND,
              });
            }
            printRecords(records, options.json);
          }),
        globalOptions(program).verbose
      );
    });

  step(program, "next", (trail) => trail.rotateForward());
  step(program, "prev", (trail) => trail.rotateBackward());
}
