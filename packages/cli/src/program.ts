/**
 * Command tree for the msgtrail CLI
 */

import { Command } from "commander";
import { readFileSync } from "node:fs";
import { colorize } from "./lib/render.js";
import { registerTrackCommands } from "./commands/track.js";
import { registerBrowseCommands } from "./commands/browse.js";
import { registerMaintainCommands } from "./commands/maintain.js";

function readVersion(): string {
  const pkg: unknown = JSON.parse(readFileSync(new URL("../package.json", import.meta.url), "utf-8"));

  return typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string"
    ? pkg.version
    : "0.0.0";
}

/**
 * Build the program. Commander errors are thrown rather than exiting the
 * process; the entry point maps them to exit codes.
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .configureOutput({
      writeErr: (str) => process.stderr.write(colorize(str, "red", process.stderr)),
    })
    .exitOverride();

  program
    .name("msgtrail")
    .description("Durable trail of the messages you have read or sent")
    .version(readVersion())
    .option("--root <path>", "Trail directory (default: $MSGTRAIL_ROOT or ~/.msgtrail)")
    .option("--verbose", "Verbose diagnostics")
    .option("--quiet", "Suppress non-error output")
    .addHelpText(
      "after",
      `
Examples:
  $ msgtrail add --data '{"messageId":"<a1@example.org>","group":"INBOX"}'
  $ msgtrail mv a1@example.org Archive
  $ msgtrail ls --group INBOX --limit 10
  $ msgtrail thread a1@example.org
  $ msgtrail next`
    );

  registerTrackCommands(program);
  registerBrowseCommands(program);
  registerMaintainCommands(program);

  return program;
}
