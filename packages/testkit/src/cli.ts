/**
 * CLI testing utilities
 */

import { execa } from "execa";

/**
 * Result of a CLI command execution
 */
export interface CliResult {
  /** Standard output */
  stdout: string;
  /** Standard error */
  stderr: string;
  /** Exit code (null if process was killed by signal) */
  exitCode: number | null;
  /** Terminating signal when the process didn't exit normally */
  signal: NodeJS.Signals | null;
}

/**
 * Options for CLI execution
 */
export interface CliExecOptions {
  /** Current working directory; the tsx loader is resolved from here */
  cwd?: string;
  /** Extra environment variables */
  env?: Record<string, string>;
  /** Input to pass to stdin */
  input?: string;
  /** Kill the process after this many milliseconds (default: 20000) */
  timeout?: number;
}

/**
 * Run a TypeScript CLI entry point in a child process through the tsx loader.
 * Never rejects on a non-zero exit; inspect exitCode instead.
 * @param cliPath - Path to the CLI's .ts entry point
 * @param args - Command arguments
 */
export async function runCli(
  cliPath: string,
  args: string[],
  options: CliExecOptions = {}
): Promise<CliResult> {
  const { cwd, env, input, timeout = 20_000 } = options;

  const result = await execa("node", ["--import", "tsx", cliPath, ...args], {
    cwd,
    env,
    input: input ?? "",
    timeout,
    reject: false,
  });

  return {
    stdout: result.stdout,
    stderr: result.stderr,
    exitCode: result.exitCode ?? null,
    signal: result.signal ?? null,
  };
}

/**
 * Parse JSON output from CLI
 */
export function parseJsonOutput(stdout: string): unknown {
  return JSON.parse(stdout.trim());
}
