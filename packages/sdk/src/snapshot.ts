/**
 * Snapshot file: the whole ordered trail in one JSON document
 *
 * { "version": 1, "records": [ ...most recent first... ] }
 */

import { z } from "zod";
import { atomicWrite, readTextFile } from "./io.js";
import { stableStringify, RECORD_KEY_ORDER } from "./format.js";
import { decodeRecord } from "./record.js";
import { FileNotFoundError, SnapshotCorruptError } from "./errors.js";
import type { MessageRecord } from "./types.js";

export const SNAPSHOT_VERSION = 1;

const SnapshotSchema = z.object({
  version: z.literal(SNAPSHOT_VERSION),
  records: z.array(z.unknown()),
});

/**
 * Serialize records in order
 */
export function serializeSnapshot(records: readonly MessageRecord[]): string {
  return stableStringify({ version: SNAPSHOT_VERSION, records }, 2, RECORD_KEY_ORDER);
}

/**
 * Parse snapshot text
 * @throws {SnapshotCorruptError} If the text is not a valid snapshot
 */
export function parseSnapshot(snapshotPath: string, text: string): MessageRecord[] {
  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new SnapshotCorruptError(snapshotPath, reason, { cause: err });
  }

  const doc = SnapshotSchema.safeParse(value);
  if (!doc.success) {
    const issue = doc.error.issues[0];
    const reason = issue ? `${issue.path.join(".") || "root"}: ${issue.message}` : "invalid document";
    throw new SnapshotCorruptError(snapshotPath, reason, { cause: doc.error });
  }

  const records: MessageRecord[] = [];
  const seen = new Set<string>();

  doc.data.records.forEach((raw, i) => {
    const decoded = decodeRecord(raw);
    if (!decoded.ok) {
      throw new SnapshotCorruptError(snapshotPath, `records.${i}: ${decoded.issues.join("; ")}`);
    }
    if (seen.has(decoded.record.messageId)) {
      throw new SnapshotCorruptError(
        snapshotPath,
        `records.${i}: duplicate messageId ${decoded.record.messageId}`
      );
    }
    seen.add(decoded.record.messageId);
    records.push(decoded.record);
  });

  return records;
}

/**
 * Read the snapshot
 * @returns Records in order, or undefined when the file does not exist
 * @throws {SnapshotCorruptError} If the file exists but does not parse
 * @throws {FileReadError} If the file cannot be read
 */
export async function readSnapshot(snapshotPath: string): Promise<MessageRecord[] | undefined> {
  let text: string;
  try {
    text = await readTextFile(snapshotPath);
  } catch (err) {
    if (err instanceof FileNotFoundError) {
      return undefined;
    }
    throw err;
  }

  return parseSnapshot(snapshotPath, text);
}

/**
 * Atomically replace the snapshot
 * @throws {FileWriteError} If the file cannot be written; the previous snapshot stays intact
 */
export async function writeSnapshot(snapshotPath: string, content: string): Promise<void> {
  await atomicWrite(snapshotPath, content);
}
