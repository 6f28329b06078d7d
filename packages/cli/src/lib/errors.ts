/**
 * CLI error handling and exit code mapping
 */

import { CommanderError } from "commander";
import { TrailError } from "@msgtrail/sdk";

/**
 * Exit codes
 * - 0: success
 * - 1: usage/validation/IO/unknown error
 * - 2: message not tracked
 * - 3: trail is empty
 */
export const EXIT_NOT_FOUND = 2;
export const EXIT_EMPTY = 3;

/**
 * Base CLI error class
 */
export class CliError extends Error {
  exitCode: number;

  constructor(message: string, options?: { exitCode?: number; cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = "CliError";
    this.exitCode = options?.exitCode ?? 1;
  }
}

/**
 * Map SDK and commander errors to CLI exit codes
 */
export function mapErrorToExitCode(error: unknown): number {
  if (error instanceof CliError) {
    return error.exitCode;
  }

  if (error instanceof CommanderError) {
    return error.exitCode;
  }

  if (error instanceof TrailError) {
    return error.code === "E_EMPTY" ? EXIT_EMPTY : 1;
  }

  return 1;
}

/**
 * Format an error for CLI output
 */
export function formatCliError(error: unknown, verbose = false): string {
  if (error instanceof Error) {
    let message = error.message;

    // Redact large payloads from error messages
    if (message.length > 2000) {
      message = message.substring(0, 2000) + "... (truncated)";
    }

    if (verbose && error.cause !== undefined) {
      const cause = error.cause instanceof Error ? error.cause.message : String(error.cause);
      message += `\n  Cause: ${cause}`;
    }

    if (verbose && error.stack) {
      message += `\n${error.stack}`;
    }

    return message;
  }

  return String(error);
}
