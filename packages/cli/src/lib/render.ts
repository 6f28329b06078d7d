/**
 * Output rendering
 */

import type { MessageRecord } from "@msgtrail/sdk";

type Color = "red" | "green" | "yellow";

const ANSI: Record<Color, string> = {
  red: "\x1b[31m",
  green: "\x1b[32m",
  yellow: "\x1b[33m",
};
const ANSI_RESET = "\x1b[0m";

/**
 * Print JSON to stdout, indented unless raw
 */
export function printJson(data: unknown, options?: { raw?: boolean }): void {
  console.log(options?.raw ? JSON.stringify(data) : JSON.stringify(data, null, 2));
}

export function printLines(lines: string[]): void {
  for (const line of lines) {
    console.log(line);
  }
}

/**
 * One line per record: the collaborator's display line when it supplied one,
 * otherwise date, sender and subject, followed by the group
 */
export function formatRecordLine(record: MessageRecord): string {
  const summary =
    record.displayLine ||
    [record.date, record.sender, record.subject].filter(Boolean).join("  ") ||
    record.messageId;

  return `${summary}  [${record.group}]`;
}

/**
 * Color text only when it is headed for a terminal
 */
export function colorize(
  text: string,
  color: Color,
  stream: { isTTY?: boolean } = process.stdout
): string {
  return stream.isTTY ? `${ANSI[color]}${text}${ANSI_RESET}` : text;
}
