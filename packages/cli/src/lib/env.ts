/**
 * Configuration from flags and the environment
 */

import * as path from "node:path";
import { homedir } from "node:os";

export const DEFAULT_ROOT = "~/.msgtrail";

/**
 * Expand `~` and `~/...` to the home directory. `~user` forms are left alone.
 */
export function expandTilde(input: string): string {
  if (input === "~") {
    return homedir();
  }
  if (input.startsWith("~/") || input.startsWith("~\\")) {
    return path.join(homedir(), input.slice(2));
  }
  return input;
}

/**
 * Trail root: --root, then MSGTRAIL_ROOT, then ~/.msgtrail
 */
export function resolveRoot(cliRoot?: string): string {
  const root = cliRoot ?? process.env.MSGTRAIL_ROOT ?? DEFAULT_ROOT;
  return path.resolve(expandTilde(root));
}

/**
 * Verbose when --verbose is given or MSGTRAIL_CLI_DEBUG=1
 */
export function isVerbose(cliVerbose?: boolean): boolean {
  return cliVerbose === true || process.env.MSGTRAIL_CLI_DEBUG === "1";
}
