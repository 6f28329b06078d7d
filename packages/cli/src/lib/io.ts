/**
 * Terminal and file input for commands
 */

import { readFile } from "node:fs/promises";
import { parseJsonText } from "./arg.js";
import { CliError } from "./errors.js";

const MAX_STDIN_BYTES = 1024 * 1024;

/**
 * Read all of stdin as UTF-8, refusing more than maxBytes
 */
export async function readStdin(maxBytes = MAX_STDIN_BYTES): Promise<string> {
  const chunks: Buffer[] = [];
  let total = 0;

  for await (const chunk of process.stdin) {
    const buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk), "utf8");
    total += buffer.length;

    if (total > maxBytes) {
      process.stdin.destroy();
      throw new CliError(`stdin too large (max ${Math.floor(maxBytes / 1024)}KB)`);
    }
    chunks.push(buffer);
  }

  return Buffer.concat(chunks).toString("utf8");
}

/**
 * Read and parse a JSON file
 */
export async function readJsonFile(filePath: string): Promise<unknown> {
  let text: string;
  try {
    text = await readFile(filePath, "utf8");
  } catch (err) {
    throw new CliError(`Cannot read ${filePath}`, { cause: err });
  }
  return parseJsonText(text, filePath);
}

export function writeStderr(content: string): void {
  process.stderr.write(content);
}

/**
 * True when a person is typing on stdin rather than a pipe or file
 */
export function isStdinTTY(): boolean {
  return process.stdin.isTTY ?? false;
}
