/**
 * Argument parsers
 */

import { InvalidArgumentError } from "commander";
import { CliError } from "./errors.js";

export const MAX_COUNT = 10_000;

/**
 * Commander parser for a bounded count option such as --limit
 */
export function countParser(name: string, max = MAX_COUNT): (value: string) => number {
  return (value) => {
    const trimmed = value.trim();
    if (!/^\d+$/.test(trimmed)) {
      throw new InvalidArgumentError(`${name} must be a non-negative integer`);
    }

    const count = Number(trimmed);
    if (count > max) {
      throw new InvalidArgumentError(`${name} must be <= ${max}`);
    }
    return count;
  };
}

/**
 * Parse JSON input, naming its source on failure. A leading BOM is ignored.
 */
export function parseJsonText(text: string, source: string): unknown {
  const body = text.startsWith("\uFEFF") ? text.slice(1) : text;

  try {
    return JSON.parse(body);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new CliError(`Invalid JSON in ${source}: ${reason}`, { cause: err });
  }
}

/**
 * Message ids are conventionally wrapped in angle brackets; accept them bare too
 */
export function parseMessageId(value: string): string {
  const trimmed = value.trim();

  if (!trimmed) {
    throw new InvalidArgumentError("message id must be non-empty");
  }

  return trimmed.startsWith("<") ? trimmed : `<${trimmed}>`;
}
